import { describe, expect, it } from 'vitest';
import { hasPendingChange, pendingConfigToObjects } from '../pending';

describe('pendingConfigToObjects', () => {
  const config = pendingConfigToObjects([
    { key: 'memory', value: 2048, pending: 4096 },
    { key: 'cores', value: 2 },
    { key: 'name', value: 'vm1', delete: 1 },
    { key: 'onboot', pending: 1 },
  ]);

  it('separates current and pending values', () => {
    expect(config.current).toEqual({ memory: 2048, cores: 2, name: 'vm1' });
    expect(config.pending).toEqual({ memory: 4096, cores: 2, onboot: 1 });
    expect([...config.keys]).toEqual(['memory', 'cores', 'name', 'onboot']);
  });

  it('detects changed, deleted and added properties', () => {
    expect(hasPendingChange(config, 'memory')).toBe(true);
    expect(hasPendingChange(config, 'name')).toBe(true);
    expect(hasPendingChange(config, 'onboot')).toBe(true);
    expect(hasPendingChange(config, 'cores')).toBe(false);
    expect(hasPendingChange(config, 'missing')).toBe(false);
  });

  it('keeps a forced delete out of the pending values', () => {
    expect(pendingConfigToObjects([{ key: 'net0', value: 'virtio', delete: 2 }]).pending).toEqual({});
  });
});
