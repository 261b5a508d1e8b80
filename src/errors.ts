export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export type AuthenticationFailure =
  | 'InvalidCredentials'
  | 'ExpiredToken'
  | 'MalformedToken'
  | 'InvalidToken'
  | 'InactiveIdentity';

const AUTHENTICATION_CODES: Record<AuthenticationFailure, number> = {
  InvalidCredentials: 40101,
  ExpiredToken: 40102,
  MalformedToken: 40103,
  InvalidToken: 40104,
  InactiveIdentity: 40105
};

export class AuthenticationError extends AppError {
  constructor(
    readonly reason: AuthenticationFailure,
    message: string
  ) {
    super(401, AUTHENTICATION_CODES[reason], message, { reason });
  }
}

export class AuthorizationError extends AppError {
  readonly reason = 'NotOwner';

  constructor(message = 'Note not found') {
    super(404, 40401, message);
  }
}

export type UniqueUserField = 'username' | 'email';

export class DuplicateUserError extends AppError {
  constructor(readonly field: UniqueUserField) {
    super(
      400,
      field === 'username' ? 40001 : 40002,
      field === 'username' ? 'Username already registered' : 'Email already registered'
    );
  }
}

export type TranslationFailure = 'Unavailable' | 'Timeout' | 'MalformedResponse';

const TRANSLATION_STATUS: Record<TranslationFailure, [number, number]> = {
  Unavailable: [503, 50301],
  Timeout: [504, 50401],
  MalformedResponse: [502, 50201]
};

export class TranslationProviderError extends AppError {
  constructor(
    readonly reason: TranslationFailure,
    message: string
  ) {
    const [status, code] = TRANSLATION_STATUS[reason];
    super(status, code, message, { reason });
  }
}

export type ConfigurationFailure = 'WeakProductionKey' | 'InvalidSetting' | 'MalformedHash';

export class ConfigurationError extends AppError {
  constructor(
    readonly reason: ConfigurationFailure,
    message: string
  ) {
    super(500, 50001, message, { reason });
  }
}
