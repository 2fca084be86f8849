import { afterEach, describe, expect, it, vi } from 'vitest';
import { batch } from 'solid-js';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { Toast, ToastContainer } from '@/components/Toast/Toast';
import { showToast } from '@/utils/toast';

describe('Toast', () => {
  afterEach(() => {
    cleanup();
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it('keeps all toasts created within a batch', () => {
    render(() => <ToastContainer />);

    batch(() => {
      showToast('info', 'First toast');
      showToast('success', 'Second toast');
    });

    expect(screen.getByText('First toast')).toBeInTheDocument();
    expect(screen.getByText('Second toast')).toBeInTheDocument();
  });

  it('unregisters the global handler on unmount', () => {
    const { unmount } = render(() => <ToastContainer />);
    expect(window.showToast).toBeTypeOf('function');
    unmount();
    expect(window.showToast).toBeUndefined();
    expect(showToast('info', 'Nobody listens')).toBeUndefined();
  });

  it('does not schedule a second removal after manual close', () => {
    vi.useFakeTimers();
    const onRemove = vi.fn();

    render(() => (
      <Toast
        toast={{ id: 'toast-1', type: 'info', title: 'Manual close toast', duration: 1000 }}
        onRemove={onRemove}
      />
    ));

    fireEvent.click(screen.getByRole('button', { name: 'Dismiss' }));

    vi.advanceTimersByTime(300);
    expect(onRemove).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(2000);
    expect(onRemove).toHaveBeenCalledTimes(1);
  });

  it('removes itself after its duration', () => {
    vi.useFakeTimers();
    const onRemove = vi.fn();

    render(() => (
      <Toast toast={{ id: 'toast-2', type: 'error', title: 'Auto close', duration: 1000 }} onRemove={onRemove} />
    ));

    vi.advanceTimersByTime(1000);
    expect(onRemove).not.toHaveBeenCalled();
    vi.advanceTimersByTime(300);
    expect(onRemove).toHaveBeenCalledWith('toast-2');
  });
});
