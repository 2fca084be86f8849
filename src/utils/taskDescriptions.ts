import pveTaskDescriptions from '@/data/pveTaskDescriptions.json';
import type { TaskStatusClass } from '@/types/tasks';
import { parseUpid } from '@/utils/upid';

export type TaskDescriptionRenderer = (workerType: string, workerId?: string) => string;

/**
 * A fixed text, a `[objectType, action]` pair rendered as
 * `objectType id action`, or a render function.
 */
export type TaskDescription = string | readonly [string, string] | TaskDescriptionRenderer;

const descriptions = new Map<string, TaskDescriptionRenderer>();

function toRenderer(description: TaskDescription): TaskDescriptionRenderer {
  if (typeof description === 'function') return description;
  if (typeof description === 'string') return () => description;
  const [objectType, action] = description;
  return (_type, id) => `${objectType} ${id ?? 'unknown'} ${action}`;
}

export function registerTaskDescription(workerType: string, description: TaskDescription): void {
  descriptions.set(workerType, toRenderer(description));
}

export function lookupTaskDescription(workerType: string, workerId?: string): string | undefined {
  return descriptions.get(workerType)?.(workerType, workerId);
}

export function registeredTaskTypes(): string[] {
  return Array.from(descriptions.keys());
}

export function clearTaskDescriptions(): void {
  descriptions.clear();
}

/** Descriptions shared by all products. */
export function registerBaseTaskDescriptions(): void {
  registerTaskDescription('aptupdate', 'Update package database');
  registerTaskDescription('spiceshell', 'Shell (Spice)');
  registerTaskDescription('vncshell', 'Shell (VNC)');
  registerTaskDescription('termproxy', 'Console (xterm.js)');

  registerTaskDescription('diskinit', ['Disk', 'Initialize Disk with GPT']);
  registerTaskDescription('srvstart', ['Service', 'Start']);
  registerTaskDescription('srvstop', ['Service', 'Stop']);
  registerTaskDescription('srvrestart', ['Service', 'Restart']);
  registerTaskDescription('srvreload', ['Service', 'Reload']);
}

const isDescriptionEntry = (value: unknown): value is string | [string, string] =>
  typeof value === 'string' ||
  (Array.isArray(value) && value.length === 2 && value.every((part) => typeof part === 'string'));

/** Virtual environment task types (guests, storage, Ceph, HA, ...). */
export function registerPveTaskDescriptions(): void {
  for (const [workerType, description] of Object.entries(pveTaskDescriptions)) {
    if (isDescriptionEntry(description)) registerTaskDescription(workerType, description);
  }
  registerTaskDescription('vzdump', (_type, id) => (id ? `VM/CT ${id} - Backup` : 'Backup Job'));
}

export function formatTaskDescription(workerType: string, workerId?: string | null): string {
  const id = workerId ?? undefined;
  const text = lookupTaskDescription(workerType, id);
  if (text !== undefined) return text;
  return id !== undefined ? `${workerType} ${id}` : workerType;
}

/** Task description for a UPID; unparsable values are returned unchanged. */
export function formatUpid(upid: string): string {
  const parsed = parseUpid(upid);
  return parsed ? formatTaskDescription(parsed.workerType, parsed.workerId) : upid;
}

export function taskStatusClass(status: string): TaskStatusClass {
  if (status === 'OK') return 'ok';
  if (status.startsWith('WARNINGS:')) return 'warning';
  return 'error';
}
