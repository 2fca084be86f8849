import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import type { PendingConfigValue } from '@/types/pending';
import { NumberField } from '../FormFields';
import type { FormContext } from '../formContext';
import { PendingPropertyGrid } from '../PendingPropertyGrid';
import type { PendingPropertyRow } from '../PendingPropertyGrid';

const CONFIG: PendingConfigValue[] = [
  { key: 'memory', value: 2048, pending: 4096 },
  { key: 'cores', value: 2 },
  { key: 'name', value: 'vm1', delete: 1 },
];

const rows: PendingPropertyRow[] = [
  {
    name: 'memory',
    header: 'Memory',
    editor: (form: FormContext) => <NumberField form={form} name="memory" label="Memory (MiB)" />,
    editorTitle: 'Edit: Memory',
  },
  { name: 'cores', header: 'Cores' },
  { name: 'name', header: 'Name', deletable: true },
  { name: 'ostype', header: 'OS Type', required: true, placeholder: 'other' },
  { name: 'description', header: 'Description' },
];

describe('PendingPropertyGrid', () => {
  let loader: Mock<() => Promise<PendingConfigValue[]>>;
  let onSubmit: Mock<(data: Record<string, unknown>) => Promise<unknown>>;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    loader = vi.fn<() => Promise<PendingConfigValue[]>>(async () => CONFIG);
    onSubmit = vi.fn<(data: Record<string, unknown>) => Promise<unknown>>(async () => null);
  });

  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  const renderGrid = () => render(() => <PendingPropertyGrid rows={rows} loader={loader} onSubmit={onSubmit} />);

  it('shows pending values below the current ones', async () => {
    renderGrid();

    expect(await screen.findByText('4096')).toHaveAttribute('data-pending');
    expect(screen.getByText('2048')).not.toHaveAttribute('data-pending');
    expect(screen.getAllByText('vm1')).toHaveLength(2);
    expect(screen.getByText('other')).toBeInTheDocument();
    expect(screen.queryByText('Description')).toBeNull();
  });

  it('reverts the selected property', async () => {
    renderGrid();
    fireEvent.click(await screen.findByText('Cores'));
    expect(screen.getByRole('button', { name: 'Revert' })).toBeDisabled();

    fireEvent.click(screen.getByText('Memory'));
    fireEvent.click(screen.getByRole('button', { name: 'Revert' }));

    await vi.waitFor(() => expect(loader).toHaveBeenCalledTimes(2));
    expect(onSubmit).toHaveBeenCalledWith({ revert: 'memory' });
  });

  it('reports a failed delete', async () => {
    onSubmit.mockRejectedValueOnce(new Error('property is locked'));
    renderGrid();

    fireEvent.click(await screen.findByText('Name'));
    fireEvent.click(screen.getByRole('button', { name: 'Delete' }));

    expect(await screen.findByRole('dialog', { name: 'Delete property failed' })).toBeInTheDocument();
    expect(screen.getByText('property is locked')).toBeInTheDocument();
    expect(onSubmit).toHaveBeenCalledWith({ delete: 'name' });
  });

  it('edits the pending value after Space', async () => {
    renderGrid();
    fireEvent.click(await screen.findByText('Memory'));
    expect(screen.getByRole('button', { name: 'Delete' })).toBeDisabled();

    fireEvent.keyDown(screen.getByRole('table'), { key: ' ' });

    expect(await screen.findByRole('dialog', { name: 'Edit: Memory' })).toBeInTheDocument();
    const input = screen.getByLabelText('Memory (MiB)');
    await vi.waitFor(() => expect(input).toHaveValue(4096));
    fireEvent.input(input, { target: { value: '8192' } });
    fireEvent.click(screen.getByRole('button', { name: 'Update' }));

    await vi.waitFor(() => expect(onSubmit).toHaveBeenCalledWith({ memory: '8192' }));
  });
});
