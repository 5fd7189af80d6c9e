import { ChainTimeoutError } from '../types/errors';

/**
 * Races `operation` against a timer. The timer is always cleared, and the
 * losing promise is left to settle on its own.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ChainTimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}
