import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { AptAPI } from '@/api/apt';
import type { AptUpdateInfo } from '@/types/apt';
import { AptPackageManager } from '../AptPackageManager';

vi.mock('@/api/apt', () => ({
  AptAPI: {
    listUpdates: vi.fn(),
    changelog: vi.fn(),
    refresh: vi.fn(),
  },
}));

const update = (Package: string, Origin: string, Description: string): AptUpdateInfo => ({
  Package,
  Title: Package,
  Arch: 'amd64',
  Description,
  Version: '2.0',
  OldVersion: '1.0',
  Origin,
  Priority: 'optional',
  Section: 'admin',
});

describe('AptPackageManager', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(AptAPI.listUpdates).mockResolvedValue([
      update('libc6', 'Debian', 'GNU C Library: Shared libraries\nContains the standard libraries.'),
      update('proxmox-backup-server', 'Proxmox', 'Backup server daemon'),
      update('bash', 'Debian', 'GNU Bourne Again SHell'),
    ]);
  });

  afterEach(cleanup);

  it('groups updates by origin', async () => {
    render(() => <AptPackageManager />);

    expect(await screen.findByText('Origin: Debian (2 items)')).toBeInTheDocument();
    expect(screen.getByText('Origin: Proxmox (One item)')).toBeInTheDocument();
    expect(screen.getByText('GNU C Library: Shared libraries')).toHaveAttribute(
      'title',
      'Contains the standard libraries.',
    );
  });

  it('collapses an origin', async () => {
    render(() => <AptPackageManager />);

    fireEvent.click(await screen.findByText('Origin: Debian (2 items)'));
    expect(screen.queryByText('libc6')).toBeNull();
    expect(screen.getByText('proxmox-backup-server')).toBeInTheDocument();
  });

  it('shows the changelog of the selected package', async () => {
    vi.mocked(AptAPI.changelog).mockResolvedValueOnce('bash (2.0) unstable; urgency=medium');
    render(() => <AptPackageManager baseUrl="/nodes/pbs1/apt" />);

    const changelog = screen.getByRole('button', { name: 'Changelog' });
    expect(changelog).toBeDisabled();

    fireEvent.click(await screen.findByText('bash'));
    fireEvent.click(changelog);

    expect(await screen.findByText('bash (2.0) unstable; urgency=medium')).toBeInTheDocument();
    expect(screen.getByText('Changelog: bash')).toBeInTheDocument();
    expect(AptAPI.changelog).toHaveBeenCalledWith('bash', '/nodes/pbs1/apt');
  });

  it('offers the upgrade only with a handler', async () => {
    const onUpgrade = vi.fn();
    render(() => <AptPackageManager onUpgrade={onUpgrade} />);
    await screen.findByText('libc6');

    fireEvent.click(screen.getByRole('button', { name: 'Upgrade' }));
    expect(onUpgrade).toHaveBeenCalledTimes(1);
  });

  it('reports a failed refresh', async () => {
    vi.mocked(AptAPI.refresh).mockRejectedValueOnce(new Error('apt lock held'));
    render(() => <AptPackageManager />);

    fireEvent.click(screen.getByText('Refresh'));
    expect(await screen.findByText('apt lock held')).toBeInTheDocument();
  });
});
