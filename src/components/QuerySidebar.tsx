import { useState } from 'react';
import { LogOut, RefreshCw, Search } from 'lucide-react';
import type { QuerySettings } from '../types';
import { parseQueryId } from '../config';

interface QuerySidebarProps {
  settings: QuerySettings;
  email: string;
  isLoading: boolean;
  onApply: (settings: QuerySettings) => void;
  onSignOut: () => void;
}

export default function QuerySidebar({ settings, email, isLoading, onApply, onSignOut }: QuerySidebarProps) {
  const [scheduleInput, setScheduleInput] = useState(String(settings.scheduleQueryId));
  const [tripInput, setTripInput] = useState(String(settings.tripQueryId));

  const scheduleQueryId = parseQueryId(scheduleInput);
  const tripQueryId = parseQueryId(tripInput);
  const isValid = scheduleQueryId !== null && tripQueryId !== null;

  const handleApply = () => {
    if (scheduleQueryId === null || tripQueryId === null) return;
    onApply({ scheduleQueryId, tripQueryId });
  };

  return (
    <div className="w-72 bg-slate-50 border-r border-slate-200 flex flex-col h-full">
      <div className="p-4 border-b border-slate-200">
        <h2 className="text-lg font-semibold text-slate-900 flex items-center gap-2">
          <Search className="w-4 h-4" />
          Query Settings
        </h2>
      </div>

      <div className="p-4 space-y-4 flex-1">
        <label className="block text-sm font-medium text-slate-700">
          Metabase Query ID (First Dataset)
          <input
            type="number"
            min={1}
            step={1}
            value={scheduleInput}
            onChange={e => setScheduleInput(e.target.value)}
            className="mt-1 w-full px-3 py-2 border border-slate-300 rounded-lg text-sm"
          />
        </label>

        <label className="block text-sm font-medium text-slate-700">
          Metabase Query ID (Second Dataset)
          <input
            type="number"
            min={1}
            step={1}
            value={tripInput}
            onChange={e => setTripInput(e.target.value)}
            className="mt-1 w-full px-3 py-2 border border-slate-300 rounded-lg text-sm"
          />
        </label>

        {!isValid && <p className="text-xs text-red-600">Query IDs must be whole numbers of at least 1.</p>}

        <button
          onClick={handleApply}
          disabled={!isValid || isLoading}
          className="w-full flex items-center justify-center gap-2 px-4 py-2 bg-blue-600 text-white text-sm rounded-lg hover:bg-blue-700 disabled:opacity-50"
        >
          <RefreshCw className={`w-4 h-4 ${isLoading ? 'animate-spin' : ''}`} />
          {isLoading ? 'Loading…' : 'Refresh data'}
        </button>
      </div>

      <div className="p-4 border-t border-slate-200 text-xs text-slate-500">
        <div className="truncate mb-2">Signed in as {email}</div>
        <button onClick={onSignOut} className="flex items-center gap-1 text-slate-700 hover:text-slate-900">
          <LogOut className="w-3 h-3" />
          Sign out
        </button>
      </div>
    </div>
  );
}
