/**
 * Comma-separated allowlist → list of emails. Entries are trimmed and blanks dropped.
 */
export function parseAllowedEmails(raw: string): string[] {
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean);
}

// Exact match, like the identifiers in the compliance reports
export function isEmailAllowed(email: string | null | undefined, allowedEmails: readonly string[]): boolean {
  if (!email) return false;
  return allowedEmails.includes(email);
}
