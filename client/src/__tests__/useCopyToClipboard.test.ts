/**
 * @vitest-environment jsdom
 */

import { act, renderHook } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { COPIED_RESET_MS, useCopyToClipboard } from '../hooks/useCopyToClipboard.js';
import { ClipboardError } from '../utils/clipboard.js';

const execCommand = vi.fn((_command: string) => true);

describe('useCopyToClipboard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    execCommand.mockReset();
    execCommand.mockReturnValue(true);
    Object.defineProperty(document, 'execCommand', { value: execCommand, configurable: true, writable: true });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('starts idle', () => {
    const { result } = renderHook(() => useCopyToClipboard());

    expect(result.current.status).toBe('idle');
    expect(result.current.isCopied).toBe(false);
  });

  it('shows copied and resets after 2.5 seconds', () => {
    const { result } = renderHook(() => useCopyToClipboard());

    act(() => {
      result.current.copy('Dear Sir, ...');
    });
    expect(result.current.isCopied).toBe(true);
    expect(execCommand).toHaveBeenCalledWith('copy');

    act(() => {
      vi.advanceTimersByTime(COPIED_RESET_MS - 1);
    });
    expect(result.current.isCopied).toBe(true);

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(result.current.status).toBe('idle');
  });

  it('restarts the copied window on a second copy', () => {
    const { result } = renderHook(() => useCopyToClipboard());

    act(() => {
      result.current.copy('first');
    });
    act(() => {
      vi.advanceTimersByTime(2000);
    });
    act(() => {
      result.current.copy('second');
    });
    act(() => {
      vi.advanceTimersByTime(2000);
    });
    expect(result.current.isCopied).toBe(true);

    act(() => {
      vi.advanceTimersByTime(500);
    });
    expect(result.current.isCopied).toBe(false);
  });

  it('stays idle and logs when copying fails', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    execCommand.mockReturnValue(false);
    const { result } = renderHook(() => useCopyToClipboard());

    let copied = true;
    act(() => {
      copied = result.current.copy('text');
    });

    expect(copied).toBe(false);
    expect(result.current.status).toBe('idle');
    expect(consoleError).toHaveBeenCalledWith('Failed to copy text:', expect.any(ClipboardError));
  });

  it('returns to idle on reset and drops the pending timer', () => {
    const { result } = renderHook(() => useCopyToClipboard());

    act(() => {
      result.current.copy('text');
    });
    expect(result.current.isCopied).toBe(true);

    act(() => {
      result.current.reset();
    });
    expect(result.current.status).toBe('idle');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('cancels the pending reset on unmount', () => {
    const { result, unmount } = renderHook(() => useCopyToClipboard());

    act(() => {
      result.current.copy('text');
    });
    expect(vi.getTimerCount()).toBe(1);

    unmount();
    expect(vi.getTimerCount()).toBe(0);
  });
});
