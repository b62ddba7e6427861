import { setTimeout as sleepFor } from 'node:timers/promises';
import type { PitrLogger } from '../logging/logger';
import type { SqlClient } from '../tools/mysql-client';

export interface ReadinessOptions {
    maxAttempts: number;
    intervalMs: number;
    sleep?: (ms: number) => Promise<void>;
}

export type ReadinessResult =
    | { ready: true; attempts: number }
    | { ready: false; attempts: number };

/**
 * Polls the server a bounded number of times; never waits forever.
 */
export async function waitForDatabase(
    client: SqlClient,
    logger: PitrLogger,
    options: ReadinessOptions,
): Promise<ReadinessResult> {
    const sleep = options.sleep || ((ms: number) => sleepFor(ms));
    const maxAttempts = Math.max(1, options.maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (await client.ping()) {
            logger.info('database is ready', { attempts: attempt });

            return { ready: true, attempts: attempt };
        }

        if (attempt < maxAttempts) {
            await sleep(options.intervalMs);
        }
    }

    logger.warn('database did not become ready', {
        attempts: maxAttempts,
        intervalMs: options.intervalMs,
    });

    return { ready: false, attempts: maxAttempts };
}
