import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { ConfirmButton, RemoveButton } from '../ConfirmButton';
import { SafeConfirmDialog } from '../SafeConfirmDialog';

describe('ConfirmButton', () => {
  afterEach(cleanup);

  it('acts at once without a confirm message', () => {
    const onActivate = vi.fn();
    render(() => <ConfirmButton onActivate={onActivate}>Apply</ConfirmButton>);

    fireEvent.click(screen.getByRole('button', { name: 'Apply' }));
    expect(onActivate).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole('dialog')).toBeNull();
  });

  it('asks before removing', () => {
    const onActivate = vi.fn();
    render(() => <RemoveButton name="store1" onActivate={onActivate} />);

    fireEvent.click(screen.getByRole('button', { name: 'Remove' }));
    expect(screen.getByText('Are you sure you want to remove entry store1')).toBeInTheDocument();

    fireEvent.click(screen.getByRole('button', { name: 'Yes' }));
    expect(onActivate).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole('dialog')).toBeNull();
  });

  it('does nothing when declined', () => {
    const onActivate = vi.fn();
    render(() => <RemoveButton onActivate={onActivate} />);

    fireEvent.click(screen.getByRole('button', { name: 'Remove' }));
    expect(screen.getByText('Are you sure you want to remove this entry?')).toBeInTheDocument();
    fireEvent.click(screen.getByRole('button', { name: 'No' }));

    expect(onActivate).not.toHaveBeenCalled();
    expect(screen.queryByRole('dialog')).toBeNull();
  });
});

describe('SafeConfirmDialog', () => {
  afterEach(cleanup);

  it('confirms only after the ID is typed', () => {
    const onConfirm = vi.fn();
    render(() => <SafeConfirmDialog verifyId="store1" onConfirm={onConfirm} onClose={() => {}} />);

    const input = screen.getByLabelText('Please enter the ID to confirm (store1)');
    const submit = screen.getByRole('button', { name: 'Remove' });
    expect(submit).toBeDisabled();

    fireEvent.input(input, { target: { value: 'store' } });
    expect(screen.getByText('Value does not match!')).toBeInTheDocument();
    expect(submit).toBeDisabled();

    fireEvent.input(input, { target: { value: 'store1' } });
    expect(screen.queryByText('Value does not match!')).toBeNull();
    fireEvent.click(submit);
    expect(onConfirm).toHaveBeenCalledTimes(1);
  });

  it('closes on Escape', () => {
    const onClose = vi.fn();
    render(() => <SafeConfirmDialog verifyId="vm-100" onConfirm={() => {}} onClose={onClose} />);

    fireEvent.keyDown(document, { key: 'Escape' });
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
