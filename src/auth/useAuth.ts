import { useCallback, useEffect, useState } from 'react';
import { getSupabaseClient } from '../utils/supabase';
import { isEmailAllowed } from './allowlist';
import { debug, logEvent } from '../utils/logger';

export type AuthState =
  | { status: 'loading' }
  | { status: 'signed-out'; error?: string }
  | { status: 'denied'; email: string }
  | { status: 'allowed'; email: string };

type SessionLike = { user: { email?: string } };

export function resolveAuthState(session: SessionLike | null, allowedEmails: readonly string[]): AuthState {
  if (!session) return { status: 'signed-out' };
  const email = session.user.email ?? '';
  return isEmailAllowed(email, allowedEmails)
    ? { status: 'allowed', email }
    : { status: 'denied', email };
}

/**
 * Google sign-in through Supabase Auth, gated by the email allowlist.
 */
export function useAuth(allowedEmails: readonly string[]) {
  const [state, setState] = useState<AuthState>({ status: 'loading' });

  useEffect(() => {
    const supabase = getSupabaseClient();
    let active = true;

    supabase.auth.getSession().then(({ data, error }) => {
      if (!active) return;
      if (error) {
        setState({ status: 'signed-out', error: error.message });
        return;
      }
      setState(resolveAuthState(data.session, allowedEmails));
    }).catch((error: unknown) => {
      if (active) setState({ status: 'signed-out', error: String(error) });
    });

    const { data: { subscription } } = supabase.auth.onAuthStateChange((event, session) => {
      debug('Auth', `State change: ${event}`);
      const next = resolveAuthState(session, allowedEmails);
      if (next.status === 'denied') {
        logEvent('access_denied', { email: next.email });
      }
      setState(next);
    });

    return () => {
      active = false;
      subscription.unsubscribe();
    };
  }, [allowedEmails]);

  const signIn = useCallback(async () => {
    const { error } = await getSupabaseClient().auth.signInWithOAuth({
      provider: 'google',
      options: {
        redirectTo: window.location.origin,
        scopes: 'openid email profile',
      },
    });
    if (error) setState({ status: 'signed-out', error: error.message });
  }, []);

  const signOut = useCallback(async () => {
    const { error } = await getSupabaseClient().auth.signOut();
    setState(error ? { status: 'signed-out', error: error.message } : { status: 'signed-out' });
  }, []);

  return { state, signIn, signOut };
}
