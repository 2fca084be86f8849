import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { NodeAPI } from '@/api/node';
import { JournalView } from '../JournalView';

vi.mock('@/api/node', () => ({
  NodeAPI: { journal: vi.fn() },
}));

const setScroll = (el: HTMLElement, scrollTop: number) => {
  Object.defineProperty(el, 'scrollHeight', { value: 2000, configurable: true });
  Object.defineProperty(el, 'clientHeight', { value: 400, configurable: true });
  Object.defineProperty(el, 'scrollTop', { value: scrollTop, writable: true, configurable: true });
};

const shownLines = () => screen.getByTestId('journal-view').querySelector('pre')?.textContent;

describe('JournalView', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.mocked(NodeAPI.journal)
      .mockResolvedValueOnce(['s=1', 'line a', 'line b', 's=2'])
      .mockResolvedValueOnce(['s=2', 'line c', 's=3'])
      .mockResolvedValue(['s=3', 's=3']);
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('loads the last entries', async () => {
    const onLoadingChange = vi.fn();
    render(() => <JournalView onLoadingChange={onLoadingChange} />);
    await vi.advanceTimersByTimeAsync(0);

    expect(NodeAPI.journal).toHaveBeenCalledWith({ lastentries: 500 }, undefined);
    expect(shownLines()).toBe('line aline b');
    expect(onLoadingChange.mock.calls).toEqual([
      [true, true],
      [false, true],
    ]);
  });

  it('follows new entries at the bottom', async () => {
    render(() => <JournalView url="/nodes/pbs1/journal" />);
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(1000);

    expect(NodeAPI.journal).toHaveBeenNthCalledWith(2, { startcursor: 's=2' }, '/nodes/pbs1/journal');
    expect(shownLines()).toBe('line aline bline c');

    await vi.advanceTimersByTimeAsync(1000);
    expect(NodeAPI.journal).toHaveBeenNthCalledWith(3, { startcursor: 's=3' }, '/nodes/pbs1/journal');
  });

  it('stops following in the middle and reads older entries at the top', async () => {
    vi.mocked(NodeAPI.journal)
      .mockReset()
      .mockResolvedValueOnce(['s=1', 'line a', 'line b', 's=2'])
      .mockResolvedValueOnce(['s=0', 'line z', 's=1']);
    render(() => <JournalView />);
    await vi.advanceTimersByTimeAsync(0);

    const view = screen.getByTestId('journal-view');
    setScroll(view, 1000);
    fireEvent.scroll(view);
    await vi.advanceTimersByTimeAsync(3000);
    expect(NodeAPI.journal).toHaveBeenCalledTimes(1);

    view.scrollTop = 0;
    fireEvent.scroll(view);
    await vi.advanceTimersByTimeAsync(0);

    expect(NodeAPI.journal).toHaveBeenLastCalledWith({ endcursor: 's=1', lastentries: 500 }, undefined);
    expect(shownLines()).toBe('line zline aline b');
    await vi.advanceTimersByTimeAsync(3000);
    expect(NodeAPI.journal).toHaveBeenCalledTimes(2);
  });

  it('reports a response without cursors', async () => {
    vi.mocked(NodeAPI.journal).mockReset().mockResolvedValue(['s=1']);
    render(() => <JournalView />);
    await vi.advanceTimersByTimeAsync(0);

    expect(screen.getByRole('alert')).toHaveTextContent('invalid response');
  });
});
