import { describe, it, expect } from 'vitest';
import { isEmailAllowed, parseAllowedEmails } from '../allowlist';
import { resolveAuthState } from '../useAuth';

describe('Allowlist - parseAllowedEmails', () => {
  it('should split on commas, trim entries and drop blanks', () => {
    expect(parseAllowedEmails('ops@example.com, lead@example.com,,  ')).toEqual(['ops@example.com', 'lead@example.com']);
  });

  it('should return an empty list for an empty string', () => {
    expect(parseAllowedEmails('')).toEqual([]);
  });
});

describe('Allowlist - isEmailAllowed', () => {
  const allowed = ['ops@example.com', 'lead@example.com'];

  it('should admit listed emails', () => {
    expect(isEmailAllowed('lead@example.com', allowed)).toBe(true);
  });

  it('should refuse unlisted, differently-cased or missing emails', () => {
    expect(isEmailAllowed('someone@example.com', allowed)).toBe(false);
    expect(isEmailAllowed('Ops@example.com', allowed)).toBe(false);
    expect(isEmailAllowed('', allowed)).toBe(false);
    expect(isEmailAllowed(null, allowed)).toBe(false);
    expect(isEmailAllowed(undefined, allowed)).toBe(false);
  });
});

describe('Auth - resolveAuthState', () => {
  const allowed = ['ops@example.com'];

  it('should be signed out without a session', () => {
    expect(resolveAuthState(null, allowed)).toEqual({ status: 'signed-out' });
  });

  it('should allow a listed email', () => {
    expect(resolveAuthState({ user: { email: 'ops@example.com' } }, allowed)).toEqual({ status: 'allowed', email: 'ops@example.com' });
  });

  it('should deny an unlisted or missing email', () => {
    expect(resolveAuthState({ user: { email: 'guest@example.com' } }, allowed)).toEqual({ status: 'denied', email: 'guest@example.com' });
    expect(resolveAuthState({ user: {} }, allowed)).toEqual({ status: 'denied', email: '' });
  });
});
