import { beforeEach, describe, expect, it } from 'vitest';
import {
  clearTaskDescriptions,
  formatTaskDescription,
  formatUpid,
  registerBaseTaskDescriptions,
  registerPveTaskDescriptions,
  registerTaskDescription,
  registeredTaskTypes,
  taskStatusClass,
} from '../taskDescriptions';

describe('task descriptions', () => {
  beforeEach(() => {
    clearTaskDescriptions();
    registerBaseTaskDescriptions();
  });

  it('renders fixed texts and object/action pairs', () => {
    expect(formatTaskDescription('aptupdate')).toBe('Update package database');
    expect(formatTaskDescription('srvstart', 'ssh')).toBe('Service ssh Start');
    expect(formatTaskDescription('diskinit')).toBe('Disk unknown Initialize Disk with GPT');
  });

  it('falls back to type and id', () => {
    expect(formatTaskDescription('garbage_collection', 'store1')).toBe('garbage_collection store1');
    expect(formatTaskDescription('garbage_collection', null)).toBe('garbage_collection');
  });

  it('accepts render functions', () => {
    registerTaskDescription('verify', (_type, id) => `Verify ${id ?? 'all'}`);
    expect(formatTaskDescription('verify', 'store1')).toBe('Verify store1');
    expect(registeredTaskTypes()).toContain('verify');
  });

  it('loads the virtual environment table', () => {
    registerPveTaskDescriptions();
    expect(formatTaskDescription('acmeregister', 'default')).toBe('ACME Account default Register');
    expect(formatTaskDescription('vzdump', '100')).toBe('VM/CT 100 - Backup');
    expect(formatTaskDescription('vzdump')).toBe('Backup Job');
  });

  it('describes a UPID', () => {
    expect(formatUpid('UPID:pve1:000004D2:0000162E:6512BC00:srvrestart:pveproxy:root@pam:')).toBe(
      'Service pveproxy Restart',
    );
    expect(formatUpid('not-a-upid')).toBe('not-a-upid');
  });
});

describe('taskStatusClass', () => {
  it('classifies exit states', () => {
    expect(taskStatusClass('OK')).toBe('ok');
    expect(taskStatusClass('WARNINGS: 2')).toBe('warning');
    expect(taskStatusClass('command failed')).toBe('error');
  });
});
