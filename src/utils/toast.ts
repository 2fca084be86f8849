import type { ToastType } from '@/components/Toast/Toast';
import { logger } from '@/utils/logger';

// window.showToast is registered by a mounted ToastContainer
export const showToast = (
  type: ToastType,
  title: string,
  message?: string,
  duration?: number,
): string | undefined => {
  if (typeof window !== 'undefined' && window.showToast) {
    return window.showToast(type, title, message, duration);
  }

  logger.info(`[toast:${type}] ${title}${message ? `: ${message}` : ''}`);
  return undefined;
};

export const showSuccess = (title: string, message?: string, duration?: number) =>
  showToast('success', title, message, duration);
export const showError = (title: string, message?: string, duration?: number) =>
  showToast('error', title, message, duration);
