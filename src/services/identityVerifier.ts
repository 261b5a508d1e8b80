import { z } from 'zod';
import { AuthenticationError } from '../errors';
import type { IdentitySummary } from '../types';
import { withTimeout } from '../utils';
import type { AuthService } from './authService';

export type IdentityCheck =
  | { ok: true; identity: IdentitySummary }
  | { ok: false; kind: 'rejected' | 'unavailable'; reason: string };

/**
 * Live check that a bearer token still maps to an active identity.
 * `rejected` means the identity service said no; `unavailable` means it could
 * not answer (timeout, network, upstream failure).
 */
export interface IdentityVerifier {
  verify(token: string): Promise<IdentityCheck>;
}

class IdentityCheckTimeout extends Error {
  constructor(ms: number) {
    super(`identity check timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export class LocalIdentityVerifier implements IdentityVerifier {
  constructor(
    private readonly auth: AuthService,
    private readonly timeoutMs: number
  ) {}

  async verify(token: string): Promise<IdentityCheck> {
    try {
      const user = await withTimeout(
        this.auth.authenticate(token),
        this.timeoutMs,
        () => new IdentityCheckTimeout(this.timeoutMs)
      );
      return { ok: true, identity: { id: user.id, username: user.username, email: user.email } };
    } catch (err) {
      if (err instanceof AuthenticationError) {
        return { ok: false, kind: 'rejected', reason: err.reason };
      }
      return {
        ok: false,
        kind: 'unavailable',
        reason: err instanceof Error ? err.message : String(err)
      };
    }
  }
}

const meSchema = z.object({
  id: z.number().int().positive(),
  username: z.string().min(1),
  email: z.string()
});

export class HttpIdentityVerifier implements IdentityVerifier {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    fetchImpl?: typeof fetch
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async verify(token: string): Promise<IdentityCheck> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl.replace(/\/$/, '')}/auth/me`, {
        headers: { authorization: `Bearer ${token}` },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      return {
        ok: false,
        kind: 'unavailable',
        reason: err instanceof Error ? err.message : String(err)
      };
    }

    if (response.status === 401) {
      return { ok: false, kind: 'rejected', reason: 'unauthenticated' };
    }
    if (!response.ok) {
      return { ok: false, kind: 'unavailable', reason: `identity service status ${response.status}` };
    }

    try {
      const parsed = meSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { ok: false, kind: 'unavailable', reason: 'unexpected identity payload' };
      }
      return { ok: true, identity: parsed.data };
    } catch (err) {
      return {
        ok: false,
        kind: 'unavailable',
        reason: err instanceof Error ? err.message : String(err)
      };
    }
  }
}
