import { useCallback, useEffect, useRef, useState } from 'react';
import type { CopyStatus } from '../types/index.js';
import { copyText } from '../utils/clipboard.js';

export const COPIED_RESET_MS = 2500;

export function useCopyToClipboard(resetMs: number = COPIED_RESET_MS) {
    const [status, setStatus] = useState<CopyStatus>('idle');
    const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

    const clearTimer = useCallback(() => {
        if (timerRef.current !== null) {
            clearTimeout(timerRef.current);
            timerRef.current = null;
        }
    }, []);

    // No reset may fire after unmount.
    useEffect(() => clearTimer, [clearTimer]);

    const copy = useCallback((text: string): boolean => {
        clearTimer();
        try {
            copyText(text);
        } catch (err) {
            console.error('Failed to copy text:', err);
            setStatus('idle');
            return false;
        }
        setStatus('copied');
        timerRef.current = setTimeout(() => {
            timerRef.current = null;
            setStatus('idle');
        }, resetMs);
        return true;
    }, [clearTimer, resetMs]);

    // "Copied" belongs to the text that was copied; a new result starts idle.
    const reset = useCallback(() => {
        clearTimer();
        setStatus('idle');
    }, [clearTimer]);

    return { copy, reset, status, isCopied: status === 'copied' };
}
