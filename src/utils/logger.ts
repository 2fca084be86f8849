import { STORAGE_KEYS } from '@/constants';

const isDev = import.meta.env.DEV;

// Verbose output can be switched on in production builds from the console:
// localStorage.setItem('proxmoxDebug', 'true')
const debugEnabled = (): boolean => {
  if (isDev) return true;
  try {
    return typeof localStorage !== 'undefined' && localStorage.getItem(STORAGE_KEYS.DEBUG) === 'true';
  } catch {
    return false;
  }
};

export const logger = {
  debug: (message: string, data?: unknown) => {
    if (debugEnabled()) console.log(`[DEBUG] ${message}`, data ?? '');
  },

  info: (message: string, data?: unknown) => {
    if (debugEnabled()) console.log(`[INFO] ${message}`, data ?? '');
  },

  warn: (message: string, data?: unknown) => {
    console.warn(`[WARN] ${message}`, data ?? '');
  },

  error: (message: string, error?: unknown) => {
    console.error(`[ERROR] ${message}`, error ?? '');
  },
};

export const logError = logger.error;
