/**
 * Bounded retry with exponential backoff, and per-call timeouts.
 * Both honour an AbortSignal so callers can abandon a call without waiting.
 */

import { TransientReviewerError } from './errors';

export class AbortedError extends Error {
    constructor() {
        super('Operation aborted');
        this.name = 'AbortedError';
    }
}

export interface BackoffOptions {
    maxAttempts: number;
    initialDelayMs: number;
    isRetryable: (error: unknown) => boolean;
    signal?: AbortSignal;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortedError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

/**
 * Run `fn` up to `maxAttempts` times. Delays double from `initialDelayMs`.
 * Non-retryable errors and the final failure are rethrown unchanged.
 */
export async function withBackoff<T>(fn: (attempt: number) => Promise<T>, options: BackoffOptions): Promise<T> {
    const { maxAttempts, initialDelayMs, isRetryable, signal, onRetry } = options;
    let delay = initialDelayMs;

    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) throw new AbortedError();
        try {
            return await fn(attempt);
        } catch (error) {
            if (error instanceof AbortedError || !isRetryable(error) || attempt >= maxAttempts) throw error;
            onRetry?.(error, attempt, delay);
            await sleep(delay, signal);
            delay *= 2;
        }
    }
}

/**
 * Reject with a TransientReviewerError after `timeoutMs`, or AbortedError when
 * `signal` fires. The abort signal handed to `fn` fires in both cases.
 */
export function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    signal?: AbortSignal,
): Promise<T> {
    if (signal?.aborted) return Promise.reject(new AbortedError());

    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        const cleanup = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        };
        const onAbort = () => {
            cleanup();
            controller.abort();
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            cleanup();
            controller.abort();
            reject(new TransientReviewerError(`Timed out after ${timeoutMs}ms`));
        }, timeoutMs);
        signal?.addEventListener('abort', onAbort, { once: true });

        fn(controller.signal).then(
            value => {
                cleanup();
                resolve(value);
            },
            (error: unknown) => {
                cleanup();
                reject(error);
            },
        );
    });
}
