import jwt from 'jsonwebtoken';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionContext } from '../src/session';
import type { IdentityVerifier } from '../src/services/identityVerifier';
import { ReauthCookieManager } from '../src/services/reauthCookie';
import { createTestLogger } from './helpers';

const COOKIE_KEY = 'test-cookie-secret';
const DAY_MS = 24 * 60 * 60 * 1000;
const alice = { id: 42, username: 'alice', email: 'alice@example.com' };

describe('reauthentication cookie', () => {
  const nowMs = new Date('2026-02-09T00:00:00.000Z').getTime();
  const verify = vi.fn<IdentityVerifier['verify']>();
  let cookies = new ReauthCookieManager(
    { key: COOKIE_KEY, algorithm: 'HS256', ttlDays: 30, clock: () => nowMs },
    { verify },
    createTestLogger()
  );

  beforeEach(() => {
    verify.mockReset();
    verify.mockResolvedValue({ ok: true, identity: alice });
    cookies = new ReauthCookieManager(
      { key: COOKIE_KEY, algorithm: 'HS256', ttlDays: 30, clock: () => nowMs },
      { verify },
      createTestLogger()
    );
  });

  function signPayload(payload: object, key = COOKIE_KEY) {
    return jwt.sign(payload, key, { algorithm: 'HS256', noTimestamp: true });
  }

  it('restores alice and her open note from a valid cookie', async () => {
    const issued = cookies.issue('T', alice, { openNoteId: 7 });
    expect(issued.expiresAt.getTime()).toBe(nowMs + 30 * DAY_MS);

    const session = new SessionContext();
    const result = await cookies.validate(issued.value, session);

    expect(result).toMatchObject({
      authenticated: true,
      token: 'T',
      identity: alice,
      viewState: { openNoteId: 7 }
    });
    expect(verify).toHaveBeenCalledWith('T');
    expect(session.authenticated).toBe(true);
    expect(session.accessToken).toBe('T');
    expect(session.identity).toEqual(alice);
    expect(session.openNoteId).toBe(7);
    expect(session.createNoteInProgress).toBe(false);
    expect(session.showLogin).toBe(false);
  });

  it('encodes the documented payload', () => {
    const value = cookies.encode('T', new Date(nowMs + DAY_MS), alice, {
      openNoteId: 3,
      createNoteInProgress: true
    });
    expect(jwt.verify(value, COOKIE_KEY)).toEqual({
      token: 'T',
      user: alice,
      expires_at: nowMs / 1000 + 86400,
      view_state: { open_note_id: 3, create_note_in_progress: true }
    });
  });

  it('does nothing without a cookie', async () => {
    const session = new SessionContext();

    expect(await cookies.validate(undefined, session)).toEqual({
      authenticated: false,
      reason: 'absent',
      deleteCookie: false
    });
    expect(await cookies.validate('', session)).toEqual({
      authenticated: false,
      reason: 'absent',
      deleteCookie: false
    });
    expect(verify).not.toHaveBeenCalled();
    expect(session.showLogin).toBe(true);
  });

  it('deletes cookies that fail the signature check', async () => {
    const forged = signPayload(
      { token: 'T', user: alice, expires_at: nowMs / 1000 + 60, view_state: {} },
      'other-secret'
    );

    for (const value of ['not-a-cookie', forged]) {
      expect(await cookies.validate(value, new SessionContext())).toEqual({
        authenticated: false,
        reason: 'malformed',
        deleteCookie: true
      });
    }
    expect(verify).not.toHaveBeenCalled();
  });

  it('deletes expired cookies without asking the identity service', async () => {
    const expired = cookies.encode('T', new Date(nowMs - 1000), alice, {});

    expect(await cookies.validate(expired, new SessionContext())).toEqual({
      authenticated: false,
      reason: 'expired',
      deleteCookie: true
    });
    expect(verify).not.toHaveBeenCalled();
  });

  it('still accepts a cookie in its final second', async () => {
    const lastSecond = cookies.encode('T', new Date(nowMs), alice, {});
    const result = await cookies.validate(lastSecond, new SessionContext());
    expect(result.authenticated).toBe(true);
  });

  it('keeps incomplete cookies', async () => {
    const future = nowMs / 1000 + 3600;
    const incomplete = [
      signPayload({ user: alice, expires_at: future }),
      signPayload({ token: 'T', user: alice }),
      signPayload({ token: 'T', user: { username: 'alice' }, expires_at: future }),
      signPayload({ token: 'T', user: { id: 42 }, expires_at: future })
    ];

    for (const value of incomplete) {
      expect(await cookies.validate(value, new SessionContext())).toEqual({
        authenticated: false,
        reason: 'incomplete',
        deleteCookie: false
      });
    }
    expect(verify).not.toHaveBeenCalled();
  });

  it('ignores view-state entries it cannot read', async () => {
    const value = signPayload({
      token: 'T',
      user: alice,
      expires_at: nowMs / 1000 + 3600,
      view_state: { open_note_id: 'abc', create_note_in_progress: true }
    });

    const result = await cookies.validate(value, new SessionContext());
    expect(result).toMatchObject({
      authenticated: true,
      viewState: { createNoteInProgress: true }
    });
    expect(result.authenticated && result.viewState.openNoteId).toBeUndefined();
  });

  it('refreshes the identity summary from the live check', async () => {
    verify.mockResolvedValue({ ok: true, identity: { ...alice, email: 'alice@new.example.com' } });
    const session = new SessionContext();
    const result = await cookies.validate(cookies.issue('T', alice, {}).value, session);

    expect(session.identity?.email).toBe('alice@new.example.com');
    if (!result.authenticated) {
      throw new Error('expected an authenticated session');
    }
    expect(jwt.verify(result.refreshed.value, COOKIE_KEY)).toMatchObject({
      token: 'T',
      user: { id: 42, username: 'alice', email: 'alice@new.example.com' }
    });
  });

  it('signs out and deletes the cookie when the identity service rejects the token', async () => {
    verify.mockResolvedValue({ ok: false, kind: 'rejected', reason: 'InactiveIdentity' });
    const session = new SessionContext();

    const result = await cookies.validate(cookies.issue('T', alice, { openNoteId: 7 }).value, session);

    expect(result).toEqual({ authenticated: false, reason: 'rejected', deleteCookie: true });
    expect(session.authenticated).toBe(false);
    expect(session.accessToken).toBeUndefined();
    expect(session.identity).toBeUndefined();
    expect(session.showLogin).toBe(true);
  });

  it('signs out but keeps the cookie when the identity service is unavailable', async () => {
    verify.mockResolvedValue({ ok: false, kind: 'unavailable', reason: 'timeout' });
    const session = new SessionContext();

    const result = await cookies.validate(cookies.issue('T', alice, {}).value, session);

    expect(result).toEqual({ authenticated: false, reason: 'unavailable', deleteCookie: false });
    expect(session.authenticated).toBe(false);
    expect(session.showLogin).toBe(true);
  });
});

describe('session context', () => {
  it('tracks view-state snapshots', () => {
    const session = new SessionContext();
    expect(session.snapshotViewState()).toEqual({});

    session.restoreViewState({ openNoteId: 5 });
    session.restoreViewState({ createNoteInProgress: true });
    expect(session.snapshotViewState()).toEqual({ openNoteId: 5, createNoteInProgress: true });

    session.replaceViewState({ openNoteId: 9 });
    expect(session.snapshotViewState()).toEqual({ openNoteId: 9 });
  });

  it('drops credentials on clear and everything on reset', () => {
    const session = new SessionContext();
    session.signIn('T', alice);
    session.restoreViewState({ openNoteId: 5 });

    session.clear();
    expect(session.authenticated).toBe(false);
    expect(session.snapshotViewState()).toEqual({ openNoteId: 5 });

    session.signIn('T', alice);
    session.reset();
    expect(session.authenticated).toBe(false);
    expect(session.showLogin).toBe(true);
    expect(session.snapshotViewState()).toEqual({});
  });
});
