/**
 * Module-level toast queue for simulator errors and notices
 */

export type ToastType = 'error' | 'warning' | 'info';

export interface Toast {
  id: number;
  message: string;
  type: ToastType;
}

const TOAST_DURATION_MS = 4000;

let toastId = 0;
let toasts: Toast[] = [];
let listeners: Array<() => void> = [];

export function showToast(message: string, type: ToastType = 'error'): number {
  const id = toastId++;
  toasts = [...toasts, { id, message, type }];

  setTimeout(() => dismissToast(id), TOAST_DURATION_MS);

  notifyListeners();
  return id;
}

export function dismissToast(id: number) {
  const next = toasts.filter(t => t.id !== id);
  if (next.length !== toasts.length) {
    toasts = next;
    notifyListeners();
  }
}

export function clearToasts() {
  toasts = [];
  notifyListeners();
}

/** Stable snapshot; a new array only after a change (safe for useSyncExternalStore) */
export function getToasts(): readonly Toast[] {
  return toasts;
}

export function subscribe(callback: () => void) {
  listeners.push(callback);
  return () => {
    listeners = listeners.filter(l => l !== callback);
  };
}

function notifyListeners() {
  listeners.forEach(l => l());
}
