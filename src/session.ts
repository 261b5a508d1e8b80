import type { IdentitySummary, ViewState } from './types';

export class SessionContext {
  accessToken?: string;
  identity?: IdentitySummary;
  openNoteId?: number;
  createNoteInProgress = false;
  showLogin = true;

  get authenticated(): boolean {
    return Boolean(this.accessToken && this.identity);
  }

  signIn(accessToken: string, identity: IdentitySummary): void {
    this.accessToken = accessToken;
    this.identity = identity;
    this.showLogin = false;
  }

  restoreViewState(viewState: ViewState): void {
    if (viewState.openNoteId !== undefined) {
      this.openNoteId = viewState.openNoteId;
    }
    if (viewState.createNoteInProgress !== undefined) {
      this.createNoteInProgress = viewState.createNoteInProgress;
    }
  }

  replaceViewState(viewState: ViewState): void {
    this.openNoteId = viewState.openNoteId;
    this.createNoteInProgress = viewState.createNoteInProgress ?? false;
  }

  snapshotViewState(): ViewState {
    const snapshot: ViewState = {};
    if (this.openNoteId !== undefined) {
      snapshot.openNoteId = this.openNoteId;
    }
    if (this.createNoteInProgress) {
      snapshot.createNoteInProgress = true;
    }
    return snapshot;
  }

  clear(): void {
    this.accessToken = undefined;
    this.identity = undefined;
    this.showLogin = true;
  }

  reset(): void {
    this.clear();
    this.openNoteId = undefined;
    this.createNoteInProgress = false;
  }
}
