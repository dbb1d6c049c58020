import { useCallback, useEffect, useMemo, useState } from 'react';
import { BarChart3, Menu } from 'lucide-react';
import { getConfig, type AppConfig } from './config';
import { useAuth } from './auth/useAuth';
import { createMetabaseClient } from './services/metabase';
import { loadDashboardData, type DashboardData } from './services/dashboardData';
import { generateCorrelationId, logCaughtError, logEvent } from './utils/logger';
import { toError } from './utils/errors';
import type { QuerySettings } from './types';
import Dashboard from './components/Dashboard';
import LoginScreen from './components/LoginScreen';
import Notice from './components/Notice';
import QuerySidebar from './components/QuerySidebar';

function readAppConfig(): { config: AppConfig } | { error: string } {
  try {
    return { config: getConfig() };
  } catch (error) {
    return { error: toError(error).message };
  }
}

export default function App() {
  const configResult = useMemo(readAppConfig, []);

  if ('error' in configResult) {
    return (
      <div className="max-w-xl mx-auto mt-16">
        <Notice tone="error">{configResult.error}</Notice>
      </div>
    );
  }

  return <AuthenticatedApp config={configResult.config} />;
}

function AuthenticatedApp({ config }: { config: AppConfig }) {
  const { state, signIn, signOut } = useAuth(config.allowedEmails);

  const handleSignIn = useCallback(() => {
    signIn().catch(error => logCaughtError('auth', 'sign_in', error));
  }, [signIn]);

  const handleSignOut = useCallback(() => {
    signOut().catch(error => logCaughtError('auth', 'sign_out', error));
  }, [signOut]);

  if (state.status !== 'allowed') {
    return <LoginScreen state={state} onSignIn={handleSignIn} onSignOut={handleSignOut} />;
  }

  return <DashboardPage config={config} email={state.email} onSignOut={handleSignOut} />;
}

interface DashboardPageProps {
  config: AppConfig;
  email: string;
  onSignOut: () => void;
}

function DashboardPage({ config, email, onSignOut }: DashboardPageProps) {
  const [settings, setSettings] = useState<QuerySettings>(config.defaultQueries);
  const [refreshCount, setRefreshCount] = useState(0);
  const [data, setData] = useState<DashboardData | null>(null);
  const [correlationId, setCorrelationId] = useState('');
  const [isLoading, setIsLoading] = useState(false);
  const [isSidebarOpen, setIsSidebarOpen] = useState(true);
  const [loadError, setLoadError] = useState<string | null>(null);

  useEffect(() => {
    let current = true;
    const id = generateCorrelationId();
    const client = createMetabaseClient(config.metabase, undefined, id);

    setCorrelationId(id);
    setIsLoading(true);
    setLoadError(null);
    logEvent('dashboard_refresh', { correlationId: id, ...settings });

    loadDashboardData(client, settings)
      .then(result => {
        // a newer refresh has started; drop this one
        if (current) setData(result);
      })
      .catch(error => {
        logCaughtError(id, 'dashboard_refresh', error);
        if (current) setLoadError(toError(error).message);
      })
      .finally(() => {
        if (current) setIsLoading(false);
      });

    return () => {
      current = false;
    };
  }, [config.metabase, settings, refreshCount]);

  const handleApply = (next: QuerySettings) => {
    setSettings(next);
    setRefreshCount(count => count + 1);
  };

  return (
    <div className="flex h-screen bg-white">
      {isSidebarOpen && (
        <QuerySidebar
          settings={settings}
          email={email}
          isLoading={isLoading}
          onApply={handleApply}
          onSignOut={onSignOut}
        />
      )}

      <main className="flex-1 overflow-y-auto">
        <header className="flex items-center gap-3 px-6 py-4 border-b border-slate-200">
          <button
            onClick={() => setIsSidebarOpen(open => !open)}
            className="p-2 rounded-lg text-slate-500 hover:bg-slate-100"
            title="Toggle sidebar"
          >
            <Menu className="w-5 h-5" />
          </button>
          <BarChart3 className="w-5 h-5 text-blue-600" />
          <h1 className="text-xl font-semibold text-slate-900">Metabase Data Viewer &amp; Driver Analysis</h1>
        </header>

        <div className="px-6 py-6">
          <Notice tone="success">Welcome, {email}!</Notice>
          {loadError && <Notice tone="error">Failed to load data: {loadError}</Notice>}
          {isLoading && !data && <p className="text-slate-500">Loading datasets…</p>}
          {data && (
            <Dashboard
              schedule={data.schedule}
              trips={data.trips}
              report={data.report}
              correlationId={correlationId}
            />
          )}
        </div>
      </main>
    </div>
  );
}
