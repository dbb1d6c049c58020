import { AlertTriangle, CheckCircle2, XCircle } from 'lucide-react';
import type { ReactNode } from 'react';

export type NoticeTone = 'success' | 'warning' | 'error';

const TONES: Record<NoticeTone, { className: string; Icon: typeof AlertTriangle }> = {
  success: { className: 'bg-green-50 border-green-200 text-green-800', Icon: CheckCircle2 },
  warning: { className: 'bg-amber-50 border-amber-200 text-amber-800', Icon: AlertTriangle },
  error: { className: 'bg-red-50 border-red-200 text-red-800', Icon: XCircle },
};

export default function Notice({ tone, children }: { tone: NoticeTone; children: ReactNode }) {
  const { className, Icon } = TONES[tone];
  return (
    <div className={`flex items-start gap-2 px-4 py-3 my-3 border rounded-lg text-sm ${className}`}>
      <Icon className="w-4 h-4 mt-0.5 shrink-0" />
      <div>{children}</div>
    </div>
  );
}
