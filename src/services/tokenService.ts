import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError } from '../errors';
import type { AccessTokenClaims, TokenAlgorithm } from '../types';
import { nowSeconds } from '../utils';

export interface TokenServiceOptions {
  secret: string;
  algorithm: TokenAlgorithm;
  ttlMinutes: number;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number(),
  exp: z.number()
});

// jsonwebtoken reports both unparsable tokens and signature mismatches as plain
// JsonWebTokenError; these messages are the structural ones.
const MALFORMED_MESSAGES = new Set([
  'jwt malformed',
  'jwt must be provided',
  'jwt must be a string',
  'invalid token',
  'invalid signature',
  'jwt signature is required'
]);

export class TokenService {
  constructor(private readonly options: TokenServiceOptions) {}

  get ttlSeconds(): number {
    return this.options.ttlMinutes * 60;
  }

  issue(subject: string | number, ttlSeconds = this.ttlSeconds, issuedAt = nowSeconds()): string {
    return jwt.sign(
      { sub: String(subject), iat: issuedAt, exp: issuedAt + ttlSeconds },
      this.options.secret,
      { algorithm: this.options.algorithm }
    );
  }

  verify(token: string, now = nowSeconds()): AccessTokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
        clockTimestamp: now
      });
    } catch (err) {
      throw this.classify(err);
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthenticationError('InvalidToken', 'Token is missing its subject');
    }
    return claims.data;
  }

  private classify(err: unknown): AuthenticationError {
    if (err instanceof jwt.TokenExpiredError) {
      return new AuthenticationError('ExpiredToken', 'Token has expired');
    }
    if (
      err instanceof jwt.JsonWebTokenError &&
      !(err instanceof jwt.NotBeforeError) &&
      MALFORMED_MESSAGES.has(err.message)
    ) {
      return new AuthenticationError('MalformedToken', 'Token is malformed');
    }
    return new AuthenticationError('InvalidToken', 'Could not validate credentials');
  }
}
