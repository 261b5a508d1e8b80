export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  createdAt: string;
}

export interface IdentitySummary {
  id: number;
  username: string;
  email: string;
}

export interface Note {
  id: number;
  title: string;
  content: string;
  isTranslated: boolean;
  originalContent: string | null;
  ownerId: number;
  createdAt: string;
  updatedAt: string;
}

export interface NewNote {
  title: string;
  content: string;
  ownerId: number;
  createdAt: string;
}

export interface NotePatch {
  title?: string;
  content?: string;
}

export interface TranslationWrite {
  expectedContent: string;
  translatedContent: string;
  updatedAt: string;
}

export interface ViewState {
  openNoteId?: number;
  createNoteInProgress?: boolean;
}

export interface AccessTokenClaims {
  sub: string;
  iat: number;
  exp: number;
}

export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';

export type DeploymentEnvironment = 'development' | 'production';
