import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { SubscriptionAPI } from '@/api/subscription';
import { SubscriptionPanel } from '../SubscriptionPanel';

vi.mock('@/api/subscription', () => ({
  SubscriptionAPI: {
    get: vi.fn(),
    setKey: vi.fn(),
    check: vi.fn(),
    remove: vi.fn(),
    systemReport: vi.fn(),
  },
}));

describe('SubscriptionPanel', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(SubscriptionAPI.get).mockResolvedValue({
      status: 'active',
      message: 'subscription is valid',
      productname: 'Backup Server Basic',
      key: 'pbsb-0123456789',
      serverid: 'TEST-SERVER-ID',
      nextduedate: '2030-01-01',
    });
  });

  afterEach(cleanup);

  it('shows the subscription details', async () => {
    render(() => <SubscriptionPanel />);

    expect(await screen.findByText('ACTIVE: subscription is valid')).toBeInTheDocument();
    expect(screen.getByText('pbsb-0123456789')).toBeInTheDocument();
    expect(screen.getByText('TEST-SERVER-ID')).toBeInTheDocument();
    expect(screen.queryByText('Last checked')).toBeNull();
  });

  it('forces a check and reloads', async () => {
    vi.mocked(SubscriptionAPI.check).mockResolvedValueOnce(null);
    render(() => <SubscriptionPanel />);
    await screen.findByText('ACTIVE: subscription is valid');

    fireEvent.click(screen.getByRole('button', { name: 'Check' }));

    await vi.waitFor(() => expect(SubscriptionAPI.get).toHaveBeenCalledTimes(2));
    expect(SubscriptionAPI.check).toHaveBeenCalledWith(undefined);
  });

  it('removes the key after confirmation', async () => {
    vi.mocked(SubscriptionAPI.remove).mockResolvedValueOnce(null);
    render(() => <SubscriptionPanel url="/nodes/pbs1/subscription" />);
    await screen.findByText('ACTIVE: subscription is valid');

    fireEvent.click(screen.getByRole('button', { name: 'Remove Subscription' }));
    expect(screen.getByText('Are you sure you want to remove the subscription key?')).toBeInTheDocument();
    fireEvent.click(screen.getByRole('button', { name: 'Yes' }));

    await vi.waitFor(() => expect(SubscriptionAPI.remove).toHaveBeenCalledWith('/nodes/pbs1/subscription'));
  });

  it('shows the system report', async () => {
    vi.mocked(SubscriptionAPI.systemReport).mockResolvedValueOnce('# report\nuptime: 1 day');
    render(() => <SubscriptionPanel />);

    fireEvent.click(screen.getByRole('button', { name: 'System Report' }));

    expect(await screen.findByText(/uptime: 1 day/)).toBeInTheDocument();
  });
});
