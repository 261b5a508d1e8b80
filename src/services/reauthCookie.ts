import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Logger } from '../logger';
import type { SessionContext } from '../session';
import type { IdentitySummary, TokenAlgorithm, ViewState } from '../types';
import type { IdentityVerifier } from './identityVerifier';

export const REAUTH_COOKIE_NAME = 'notes_auth';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReauthCookieOptions {
  key: string;
  algorithm: TokenAlgorithm;
  ttlDays: number;
  clock?: () => number;
}

export interface IssuedCookie {
  value: string;
  expiresAt: Date;
}

export type NotAuthenticatedReason =
  | 'absent'
  | 'malformed'
  | 'expired'
  | 'incomplete'
  | 'rejected'
  | 'unavailable';

export type CookieValidation =
  | {
      authenticated: true;
      token: string;
      identity: IdentitySummary;
      viewState: ViewState;
      refreshed: IssuedCookie;
    }
  | { authenticated: false; reason: NotAuthenticatedReason; deleteCookie: boolean };

const requiredSchema = z.object({
  token: z.string().min(1),
  expires_at: z.number(),
  user: z.object({
    id: z.number().int().positive(),
    username: z.string().min(1),
    email: z.string().optional()
  })
});

const viewStateSchema = z.object({
  open_note_id: z.number().int().positive().optional().catch(undefined),
  create_note_in_progress: z.boolean().optional().catch(undefined)
});

/**
 * Long-lived login artifact. The payload is signed, not encrypted: whoever can
 * read the cookie can read the bearer token inside it.
 */
export class ReauthCookieManager {
  private readonly clock: () => number;

  constructor(
    private readonly options: ReauthCookieOptions,
    private readonly verifier: IdentityVerifier,
    private readonly logger: Logger
  ) {
    this.clock = options.clock ?? Date.now;
  }

  encode(
    bearerToken: string,
    expiresAt: Date,
    identity: IdentitySummary,
    viewState: ViewState
  ): string {
    const view: Record<string, number | boolean> = {};
    if (viewState.openNoteId !== undefined) {
      view.open_note_id = viewState.openNoteId;
    }
    if (viewState.createNoteInProgress !== undefined) {
      view.create_note_in_progress = viewState.createNoteInProgress;
    }
    return jwt.sign(
      {
        token: bearerToken,
        user: { id: identity.id, username: identity.username, email: identity.email },
        expires_at: Math.floor(expiresAt.getTime() / 1000),
        view_state: view
      },
      this.options.key,
      { algorithm: this.options.algorithm, noTimestamp: true }
    );
  }

  issue(bearerToken: string, identity: IdentitySummary, viewState: ViewState): IssuedCookie {
    const expiresAt = new Date(this.clock() + this.options.ttlDays * DAY_MS);
    return { value: this.encode(bearerToken, expiresAt, identity, viewState), expiresAt };
  }

  async validate(cookieValue: string | undefined, session: SessionContext): Promise<CookieValidation> {
    if (!cookieValue) {
      return { authenticated: false, reason: 'absent', deleteCookie: false };
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(cookieValue, this.options.key, { algorithms: [this.options.algorithm] });
    } catch (err) {
      this.logger.debug({ err }, 'reauth cookie failed signature check');
      return { authenticated: false, reason: 'malformed', deleteCookie: true };
    }
    if (typeof decoded === 'string') {
      return { authenticated: false, reason: 'malformed', deleteCookie: true };
    }

    const expiresAt = decoded.expires_at;
    if (typeof expiresAt === 'number' && expiresAt * 1000 < this.clock()) {
      return { authenticated: false, reason: 'expired', deleteCookie: true };
    }

    // A payload with missing fields may come from a partial read; keep the
    // cookie and let the next visit try again.
    const required = requiredSchema.safeParse(decoded);
    if (!required.success) {
      this.logger.debug({ issues: required.error.issues.length }, 'reauth cookie incomplete');
      return { authenticated: false, reason: 'incomplete', deleteCookie: false };
    }
    const payload = required.data;

    const rawView = viewStateSchema.safeParse(decoded.view_state ?? {});
    const viewState: ViewState = {};
    if (rawView.success) {
      if (rawView.data.open_note_id !== undefined) {
        viewState.openNoteId = rawView.data.open_note_id;
      }
      if (rawView.data.create_note_in_progress !== undefined) {
        viewState.createNoteInProgress = rawView.data.create_note_in_progress;
      }
    }

    session.signIn(payload.token, {
      id: payload.user.id,
      username: payload.user.username,
      email: payload.user.email ?? ''
    });
    session.restoreViewState(viewState);

    const check = await this.verifier.verify(payload.token);
    if (!check.ok) {
      session.clear();
      this.logger.info(
        { userId: payload.user.id, kind: check.kind, reason: check.reason },
        'reauth cookie identity check failed'
      );
      return {
        authenticated: false,
        reason: check.kind,
        deleteCookie: check.kind === 'rejected'
      };
    }

    session.signIn(payload.token, check.identity);
    const refreshed = this.issue(payload.token, check.identity, session.snapshotViewState());
    return {
      authenticated: true,
      token: payload.token,
      identity: check.identity,
      viewState,
      refreshed
    };
  }
}
