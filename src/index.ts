// proxmox-console-kit public entry

// HTTP client, authentication and configuration
export * from './constants';
export * from './config/product';
export * from './utils/apiClient';
export * from './utils/ticket';
export * from './stores/session';
export * from './stores/rrdTimeframe';
export * from './stores/notifications';

// API objects
export * from './api/access';
export * from './api/acme';
export * from './api/apt';
export * from './api/node';
export * from './api/subscription';
export * from './api/tasks';
export * from './api/tfa';

// View-model types
export type * from './types/api';
export type * from './types/access';
export type * from './types/acme';
export type * from './types/apt';
export type * from './types/network';
export type * from './types/node';
export type * from './types/pending';
export type * from './types/subscription';
export type * from './types/tasks';
export type * from './types/tfa';

// Utilities
export * from './utils/acme';
export * from './utils/aptRepositories';
export * from './utils/authRealm';
export * from './utils/calendarEvent';
export * from './utils/clipboard';
export * from './utils/errorHandler';
export * from './utils/format';
export * from './utils/humanByte';
export * from './utils/journal';
export * from './utils/forms';
export * from './utils/localStorage';
export * from './utils/logger';
export * from './utils/markdown';
export * from './utils/network';
export * from './utils/pending';
export * from './utils/nodeInfo';
export * from './utils/subscription';
export * from './utils/taskDescriptions';
export * from './utils/toast';
export * from './utils/totp';
export * from './utils/upid';
export * from './utils/url';
export * from './utils/webauthn';
export * from './utils/rrd/graphSpace';
export * from './utils/rrd/series';
export * from './utils/rrd/units';
export * from './utils/rrd/view';

// Hooks
export * from './hooks/useDebouncedValue';
export * from './hooks/useLoader';
export * from './hooks/usePersistentSignal';

// Building blocks
export * from './components/ErrorBoundary';
export * from './components/Toast/Toast';
export * from './components/shared/AlertDialog';
export * from './components/shared/BandwidthSelector';
export * from './components/shared/Button';
export * from './components/shared/CalendarEventSelector';
export * from './components/shared/ConfirmButton';
export * from './components/shared/CopyButton';
export * from './components/shared/DataTable';
export * from './components/shared/Dialog';
export * from './components/shared/EditWindow';
export * from './components/shared/Form';
export * from './components/shared/FormFields';
export * from './components/shared/formContext';
export * from './components/shared/HelpButton';
export * from './components/shared/KVGrid';
export * from './components/shared/Markdown';
export * from './components/shared/MenuButton';
export * from './components/shared/MeterLabel';
export * from './components/shared/ObjectGrid';
export * from './components/shared/PendingPropertyGrid';
export * from './components/shared/SafeConfirmDialog';
export * from './components/shared/StatusRow';
export * from './components/shared/TabPanel';
export * from './components/shared/Toolbar';
export * from './components/shared/Wizard';

// Panels
export * from './components/Access/AclEdit';
export * from './components/Access/AclView';
export * from './components/Access/AuthEditLdap';
export * from './components/Access/AuthEditOpenId';
export * from './components/Access/AuthView';
export * from './components/Access/AuthidSelector';
export * from './components/Access/PermissionPanel';
export * from './components/Access/RoleSelector';
export * from './components/Access/TokenPanel';
export * from './components/Access/TokenSecretDialog';
export * from './components/Access/UserPanel';
export * from './components/Access/accessRows';
export * from './components/Acme/AcmeAccountsPanel';
export * from './components/Acme/AcmeDomainsPanel';
export * from './components/Acme/AcmePluginsPanel';
export * from './components/Acme/AcmeRegisterAccount';
export * from './components/Acme/AcmeSelectors';
export * from './components/Acme/CertificateList';
export * from './components/Apt/AptPackageManager';
export * from './components/Apt/AptRepositories';
export * from './components/Login/LoginPanel';
export * from './components/Login/RealmSelector';
export * from './components/Login/TfaDialog';
export * from './components/Network/NetworkEdit';
export * from './components/Network/NetworkView';
export * from './components/Node/DnsPanel';
export * from './components/Node/NodeStatusPanel';
export * from './components/Node/NotesView';
export * from './components/Node/TimePanel';
export * from './components/RRD/RRDGraph';
export * from './components/RRD/RRDTimeframeSelector';
export * from './components/Subscription/SubscriptionAlert';
export * from './components/Subscription/SubscriptionInfo';
export * from './components/Subscription/SubscriptionPanel';
export * from './components/Tasks/JournalView';
export * from './components/Tasks/LogView';
export * from './components/Tasks/RunningTasks';
export * from './components/Tasks/RunningTasksButton';
export * from './components/Tasks/Syslog';
export * from './components/Tasks/TaskProgress';
export * from './components/Tasks/TaskStatusSelector';
export * from './components/Tasks/TaskTypeSelector';
export * from './components/Tasks/TaskViewer';
export * from './components/Tasks/Tasks';
export * from './components/Tasks/taskRows';
export * from './components/Tfa/TfaAddRecovery';
export * from './components/Tfa/TfaAddTotp';
export * from './components/Tfa/TfaAddWebauthn';
export * from './components/Tfa/TfaConfirmRemove';
export * from './components/Tfa/TfaEdit';
export * from './components/Tfa/TfaView';
