import { LogIn, ShieldAlert } from 'lucide-react';
import type { AuthState } from '../auth/useAuth';
import Notice from './Notice';

interface LoginScreenProps {
  state: Exclude<AuthState, { status: 'allowed' }>;
  onSignIn: () => void;
  onSignOut: () => void;
}

export default function LoginScreen({ state, onSignIn, onSignOut }: LoginScreenProps) {
  return (
    <div className="min-h-screen flex items-center justify-center bg-slate-50">
      <div className="w-full max-w-md bg-white border border-slate-200 rounded-xl p-8 shadow-sm">
        <h1 className="text-2xl font-semibold text-slate-900 mb-2">Driver Compliance Dashboard</h1>

        {state.status === 'loading' && <p className="text-slate-500">Checking your session…</p>}

        {state.status === 'signed-out' && (
          <>
            <Notice tone="warning">Please log in to access the app.</Notice>
            {state.error && <Notice tone="error">Sign-in error: {state.error}</Notice>}
            <button
              onClick={onSignIn}
              className="w-full flex items-center justify-center gap-2 px-4 py-2 bg-blue-600 text-white rounded-lg hover:bg-blue-700"
            >
              <LogIn className="w-4 h-4" />
              Login with Google
            </button>
          </>
        )}

        {state.status === 'denied' && (
          <>
            <Notice tone="error">
              <span className="flex items-center gap-1">
                <ShieldAlert className="w-4 h-4" />
                Access denied. Your email ({state.email}) is not allowed.
              </span>
            </Notice>
            <button
              onClick={onSignOut}
              className="w-full px-4 py-2 bg-slate-200 text-slate-700 rounded-lg hover:bg-slate-300"
            >
              Sign out
            </button>
          </>
        )}
      </div>
    </div>
  );
}
