import { describe, it, expect } from 'vitest';
import { statusFor, toHttpResponse } from '../../server/src/app.js';
import { SessionStore } from '../../server/src/sessions.js';

describe('statusFor', () => {
  it.each([
    ['InvalidInput', 400],
    ['InvalidAmount', 400],
    ['InvalidKind', 400],
    ['InvalidPeriod', 400],
    ['NoOpUpdate', 400],
    ['InvalidCredentials', 401],
    ['NotAuthenticated', 401],
    ['OwnershipMismatch', 403],
    ['NotFound', 404],
    ['DuplicateUser', 409],
    ['StorageFailure', 500],
  ] as const)('maps %s to %i', (code, status) => {
    expect(statusFor(code)).toBe(status);
  });
});

describe('toHttpResponse', () => {
  it('sends the value on success', () => {
    expect(toHttpResponse({ ok: true, value: { id: 7 }, message: 'add transaction' }, 201)).toEqual({
      status: 201,
      body: { id: 7 },
    });
  });

  it('acknowledges operations that return nothing', () => {
    expect(toHttpResponse({ ok: true, value: undefined, message: 'delete transaction' })).toEqual({
      status: 200,
      body: { ok: true },
    });
  });

  it('sends the error message and code on failure', () => {
    expect(toHttpResponse({ ok: false, code: 'NotFound', message: 'Transaction not found.' }, 201)).toEqual({
      status: 404,
      body: { error: 'Transaction not found.', code: 'NotFound' },
    });
  });
});

describe('SessionStore', () => {
  const session = { userId: 1, username: 'alice' };

  it('issues a token that resolves to the session until closed', () => {
    const store = new SessionStore();
    const token = store.open(session);

    expect(store.get(token)).toEqual(session);
    expect(store.close(token)).toBe(true);
    expect(store.get(token)).toBeUndefined();
    expect(store.close(token)).toBe(false);
  });

  it('issues a distinct token per login', () => {
    const store = new SessionStore();
    expect(store.open(session)).not.toBe(store.open(session));
  });

  it('reads bearer tokens from the Authorization header', () => {
    expect(SessionStore.tokenFrom('Bearer abc-123')).toBe('abc-123');
    expect(SessionStore.tokenFrom('bearer  abc-123 ')).toBe('abc-123');
    expect(SessionStore.tokenFrom('Basic abc')).toBeUndefined();
    expect(SessionStore.tokenFrom(undefined)).toBeUndefined();
  });
});
