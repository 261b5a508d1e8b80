import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, DuplicateUserError } from '../src/errors';
import { AuthService } from '../src/services/authService';
import { PasswordService } from '../src/services/passwordService';
import { TokenService } from '../src/services/tokenService';
import { InMemoryStore } from '../src/store';

describe('auth service', () => {
  let store = new InMemoryStore();
  let passwords = new PasswordService(1024);
  let auth = new AuthService(
    store,
    passwords,
    new TokenService({ secret: 'test-secret', algorithm: 'HS256', ttlMinutes: 60 })
  );

  beforeEach(() => {
    store = new InMemoryStore();
    passwords = new PasswordService(1024);
    auth = new AuthService(
      store,
      passwords,
      new TokenService({ secret: 'test-secret', algorithm: 'HS256', ttlMinutes: 60 })
    );
  });

  it('registers a username only once under concurrent requests', async () => {
    const results = await Promise.allSettled([
      auth.register({ username: 'alice', email: 'alice@example.com', password: 'Secret123' }),
      auth.register({ username: 'alice', email: 'alice2@example.com', password: 'Secret123' })
    ]);

    expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    const rejected = results.find((result) => result.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toMatchObject({
      status: 400,
      code: 40001,
      message: 'Username already registered'
    });
    expect(store.usersById.size).toBe(1);
  });

  it('registers an email only once under concurrent requests', async () => {
    const results = await Promise.allSettled([
      auth.register({ username: 'alice', email: 'shared@example.com', password: 'Secret123' }),
      auth.register({ username: 'bob', email: 'shared@example.com', password: 'Secret123' })
    ]);

    const rejected = results.find((result) => result.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(DuplicateUserError);
    expect(rejected?.status === 'rejected' && rejected.reason).toMatchObject({ code: 40002 });
    expect(store.usersById.size).toBe(1);
  });

  it('runs the password check for unknown usernames too', async () => {
    await auth.register({ username: 'alice', email: 'alice@example.com', password: 'Secret123' });
    const verify = vi.spyOn(passwords, 'verify');

    await expect(auth.login('mallory', 'Secret123')).rejects.toMatchObject({
      reason: 'InvalidCredentials',
      code: 40101
    });
    expect(verify).toHaveBeenCalledTimes(1);
    expect(verify.mock.calls[0][1]).toMatch(/^scrypt:1024:/);

    await expect(auth.login('alice', 'Secret124')).rejects.toBeInstanceOf(AuthenticationError);
    expect(verify).toHaveBeenCalledTimes(2);

    const ok = await auth.login('alice', 'Secret123');
    expect(ok.user.username).toBe('alice');
  });
});
