import { describe, it, expect } from 'vitest';
import { CsrfStore, CSRF_TOKEN_TTL_MS } from '../src/csrf.js';

describe('CsrfStore', () => {
  it('should accept a token only for the user it was issued to', () => {
    const store = new CsrfStore();
    const token = store.issue('user-1');

    expect(store.validate('user-1', token)).toBe(true);
    expect(store.validate('user-2', token)).toBe(false);
    expect(store.validate('user-1', undefined)).toBe(false);
    expect(store.validate('user-1', 'made-up')).toBe(false);
  });

  it('should expire tokens after thirty minutes', () => {
    let now = 1_000_000;
    const store = new CsrfStore({ now: () => now });
    const token = store.issue('user-1');

    now += CSRF_TOKEN_TTL_MS - 1;
    expect(store.validate('user-1', token)).toBe(true);

    now += 1;
    expect(store.validate('user-1', token)).toBe(false);
  });

  it('should forget revoked tokens', () => {
    const store = new CsrfStore();
    const token = store.issue('user-1');

    store.revoke(token);

    expect(store.validate('user-1', token)).toBe(false);
  });
});
