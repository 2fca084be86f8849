import type { ToastType } from '@/components/Toast/Toast';
import { showToast } from '@/utils/toast';

const DEFAULT_DURATIONS: Record<ToastType, number> = {
  success: 5000,
  error: 10000,
  info: 5000,
  warning: 5000,
};

export const notificationStore = {
  success: (message: string, duration: number = DEFAULT_DURATIONS.success) =>
    showToast('success', message, undefined, duration),

  error: (message: string, duration: number = DEFAULT_DURATIONS.error) =>
    showToast('error', message, undefined, duration),

  info: (message: string, duration: number = DEFAULT_DURATIONS.info) =>
    showToast('info', message, undefined, duration),

  warning: (message: string, duration: number = DEFAULT_DURATIONS.warning) =>
    showToast('warning', message, undefined, duration),
};
