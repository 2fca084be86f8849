// Constants shared by the API client, stores and components

export const API_PREFIX = '/api2/extjs';

// Polling and update intervals (in milliseconds)
export const POLLING_INTERVALS = {
  AUTH_REFRESH_CHECK: 5000, // ticket age check
  TASK_STATUS: 1000,
  LOG_TAIL: 1000,
  JOURNAL_TAIL: 1000,
  PENDING_RELOAD: 3000,
  ACCESS_RELOAD: 5000, // ACL and API token lists
  ACME_DOMAINS_RELOAD: 3000,
  RUNNING_TASKS: 5000,
  TOAST_DURATION: 5000,
} as const;

export const ANIMATIONS = {
  TOAST_SLIDE: 300,
} as const;

export const TASK_POLL = {
  INITIAL_SLEEP: 100,
  MAX_SLEEP: 1600,
} as const;

// Ticket lifetime as issued by the API server (seconds)
export const TICKET_LIFETIME = 7200;
export const TICKET_EXPIRE_MARGIN = 60;
export const TICKET_REFRESH_AGE = 3600;

export const LIMITS = {
  TASK_PAGE_SIZE: 500,
  TASK_PREFETCH_MARGIN: 600, // px, about 20 rows
  LOG_PAGE_SIZE: 500,
  LOG_MAX_LINES: 17_000_000,
  JOURNAL_PAGE_SIZE: 500,
  JOURNAL_LOAD_ZONE: 50, // px
  RUNNING_TASKS_SHOWN: 10,
  ACME_DOMAIN_SLOTS: 5,
  TOTP_SECRET_LENGTH: 32,
  RECOVERY_KEY_WARN_THRESHOLD: 13,
} as const;

export const DEBOUNCE = {
  TASK_FILTER: 150,
} as const;

export const STORAGE_KEYS = {
  LOGIN_SAVE_USERNAME: 'ProxmoxLoginPanelSaveUsername',
  LOGIN_USERNAME: 'ProxmoxLoginPanelUsername',
  TASKS_SHOW_FILTER: 'ProxmoxTasksShowFilter',
  RRD_TIMEFRAME: 'ProxmoxRRDTimeframe',
  DEBUG: 'proxmoxDebug',
  CSRF_TOKEN: 'CSRFToken', // session storage
} as const;

export const EVENTS = {
  LOCAL_STORAGE_SYNC: 'proxmox-localstorage-sync',
  RRD_TIMEFRAME_CHANGED: 'proxmox-rrd-timeframe-changed',
} as const;

export const DEFAULT_SUBSCRIPTION_URL = 'https://www.proxmox.com';
