/* ------------------------------------------------------------------ */
/*  Toasts: transient info / success / error notices                   */
/* ------------------------------------------------------------------ */

import { createContext, useCallback, useContext, useEffect, useRef, useState, type ReactNode } from 'react';

export type ToastVariant = 'info' | 'success' | 'error';

export interface ToastMessage {
  id: number;
  variant: ToastVariant;
  title: string;
  message: string;
}

type ShowToast = (variant: ToastVariant, title: string, message: string) => void;

const ToastContext = createContext<ShowToast | null>(null);

const DISMISS_MS = 5_000;

export function ToastProvider({ children }: { children: ReactNode }) {
  const [toasts, setToasts] = useState<ToastMessage[]>([]);
  const nextId = useRef(1);
  const timers = useRef(new Set<ReturnType<typeof setTimeout>>());

  const dismiss = useCallback((id: number) => {
    setToasts((prev) => prev.filter((t) => t.id !== id));
  }, []);

  const show = useCallback<ShowToast>((variant, title, message) => {
    const id = nextId.current++;
    setToasts((prev) => [...prev, { id, variant, title, message }]);
    const timer = setTimeout(() => {
      timers.current.delete(timer);
      dismiss(id);
    }, DISMISS_MS);
    timers.current.add(timer);
  }, [dismiss]);

  useEffect(() => {
    const pending = timers.current;
    return () => {
      for (const t of pending) clearTimeout(t);
      pending.clear();
    };
  }, []);

  return (
    <ToastContext.Provider value={show}>
      {children}
      <div className="toast-stack">
        {toasts.map((t) => (
          <div key={t.id} className={`toast toast-${t.variant}`} role="status">
            <strong>{t.title}</strong>
            <span>{t.message}</span>
            <button className="toast-close" onClick={() => dismiss(t.id)}>×</button>
          </div>
        ))}
      </div>
    </ToastContext.Provider>
  );
}

export function useToast(): ShowToast {
  const show = useContext(ToastContext);
  if (!show) throw new Error('useToast must be used inside ToastProvider');
  return show;
}
