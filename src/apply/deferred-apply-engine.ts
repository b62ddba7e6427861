import { stat } from 'node:fs/promises';
import type { PitrLogger } from '../logging/logger';
import type { SqlClient } from '../tools/mysql-client';
import { ReadinessOptions, waitForDatabase } from './database-readiness';
import { classifyReplayOutput, ReplayErrorSummary } from './error-classifier';
import type { PendingApplyMarkerStore } from './pending-apply-marker';

export interface DeferredApplyOptions {
    replayTimeoutMs: number;
    /** When set, the server is polled before anything is replayed. */
    readiness?: ReadinessOptions;
}

export interface DeferredApplyDeps {
    markerStore: PendingApplyMarkerStore;
    client: SqlClient;
    logger: PitrLogger;
}

export type DeferredApplyResult =
    | { status: 'no_pending' }
    | { status: 'invalid_marker'; reason: string; replayFile?: string }
    | { status: 'database_unavailable'; replayFile: string; attempts: number }
    | {
        status: 'applied';
        replayFile: string;
        exitCode: number;
        summary: ReplayErrorSummary;
    }
    | {
        status: 'failed';
        replayFile: string;
        reason: 'timeout' | 'critical_errors';
        exitCode: number;
        summary: ReplayErrorSummary;
    };

async function fileSize(path: string): Promise<number | null> {
    try {
        const info = await stat(path);

        return info.isFile() ? info.size : null;
    } catch {
        return null;
    }
}

/**
 * Consumes the pending-apply marker once the server is up. The replay file
 * is never deleted; the marker is removed only after a successful replay or
 * when it is unusable.
 */
export class DeferredApplyEngine {
    constructor(
        private readonly deps: DeferredApplyDeps,
        private readonly options: DeferredApplyOptions,
    ) {}

    async applyPending(): Promise<DeferredApplyResult> {
        const { markerStore, client, logger } = this.deps;
        const read = await markerStore.peek();

        if (read.state === 'empty') {
            logger.info('no pending binlog replay');

            return { status: 'no_pending' };
        }

        if (read.state === 'malformed') {
            await markerStore.discard();
            logger.warn('discarded malformed pending apply marker', {
                reason: read.reason,
            });

            return { status: 'invalid_marker', reason: read.reason };
        }

        const { marker } = read;
        const size = await fileSize(marker.replayFile);

        if (size === null) {
            await markerStore.discard();
            logger.warn('discarded pending apply marker for missing replay file', {
                replayFile: marker.replayFile,
            });

            return {
                status: 'invalid_marker',
                reason: 'replay file does not exist',
                replayFile: marker.replayFile,
            };
        }

        if (this.options.readiness) {
            const readiness = await waitForDatabase(
                client,
                logger,
                this.options.readiness,
            );

            if (!readiness.ready) {
                logger.warn('replay postponed, marker kept for the next run', {
                    replayFile: marker.replayFile,
                });

                return {
                    status: 'database_unavailable',
                    replayFile: marker.replayFile,
                    attempts: readiness.attempts,
                };
            }
        }

        logger.info('replaying binlog extract', {
            replayFile: marker.replayFile,
            bytes: size,
        });

        const execution = await client.applyFile(
            marker.replayFile,
            this.options.replayTimeoutMs,
        );
        const summary = classifyReplayOutput(execution.output);

        if (execution.timedOut) {
            logger.error('binlog replay timed out', {
                replayFile: marker.replayFile,
                timeoutMs: this.options.replayTimeoutMs,
            });

            return {
                status: 'failed',
                replayFile: marker.replayFile,
                reason: 'timeout',
                exitCode: execution.exitCode,
                summary,
            };
        }

        if (execution.exitCode !== 0 && summary.critical.length > 0) {
            logger.error('binlog replay hit critical errors, marker kept', {
                replayFile: marker.replayFile,
                exitCode: execution.exitCode,
                critical: summary.critical.slice(0, 10),
            });

            return {
                status: 'failed',
                replayFile: marker.replayFile,
                reason: 'critical_errors',
                exitCode: execution.exitCode,
                summary,
            };
        }

        if (summary.ignorable.length > 0) {
            logger.info('ignored expected replay errors', summary.counts);
        }

        await markerStore.acknowledge(marker);
        logger.info('binlog replay applied', {
            replayFile: marker.replayFile,
            exitCode: execution.exitCode,
        });

        return {
            status: 'applied',
            replayFile: marker.replayFile,
            exitCode: execution.exitCode,
            summary,
        };
    }
}
