import { randomInt } from 'node:crypto';
import { appendFile, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { PendingApplyMarkerStore } from '../apply/pending-apply-marker';
import { REPLAY_FILE_PREFIX } from '../constants';
import { describeError, isPitrError, PitrError } from '../errors';
import type { PitrLogger } from '../logging/logger';
import type { BinlogFiles } from '../restore/binlog-files';
import { BackupTimestamp, TargetSpec } from '../time/timestamp';
import type { LogExtractionTool } from '../tools/mysqlbinlog';
import {
    BinlogWindow,
    computeBinlogWindow,
    toExtractionBounds,
} from './binlog-window';

export interface BinlogExtractorDeps {
    tool: LogExtractionTool;
    binlogFiles: BinlogFiles;
    markerStore: PendingApplyMarkerStore;
    logger: PitrLogger;
    now?: () => Date;
    randomSuffix?: () => number;
}

export type ExtractionOutcome =
    | { status: 'skipped'; backupInstant: Date; targetInstant: Date }
    | { status: 'no_segments'; window: BinlogWindow }
    | { status: 'empty'; window: BinlogWindow; segments: string[] }
    | {
        status: 'extracted';
        mode: 'batched' | 'per_segment';
        window: BinlogWindow;
        replayFile: string;
        segments: string[];
        failedSegments: string[];
        bytes: number;
    }
    | { status: 'failed'; error: PitrError };

function defaultSuffix(): number {
    return randomInt(1000, 10000);
}

/**
 * Cuts the `[backup, target + 1s)` slice out of the live binlog segments
 * into a replay file and records it as the pending apply.
 */
export class BinlogExtractor {
    private readonly now: () => Date;

    private readonly randomSuffix: () => number;

    constructor(
        private readonly deps: BinlogExtractorDeps,
        private readonly backupRoot: string,
    ) {
        this.now = deps.now || (() => new Date());
        this.randomSuffix = deps.randomSuffix || defaultSuffix;
    }

    replayFilePath(): string {
        const stamp = BackupTimestamp.fromInstant(this.now()).toString();

        return join(
            this.backupRoot,
            `${REPLAY_FILE_PREFIX}${stamp}_${this.randomSuffix()}.sql`,
        );
    }

    async extract(
        backupInstant: Date | null,
        target: TargetSpec,
    ): Promise<ExtractionOutcome> {
        const { logger } = this.deps;
        const decision = computeBinlogWindow(backupInstant, target);

        if (decision.kind === 'skip') {
            logger.info('target is not after the restored backup, no binlog replay needed', {
                backup: decision.backupInstant.toISOString(),
                target: decision.targetInstant.toISOString(),
            });

            return {
                status: 'skipped',
                backupInstant: decision.backupInstant,
                targetInstant: decision.targetInstant,
            };
        }

        const { window } = decision;

        try {
            return await this.extractWindow(window);
        } catch (error) {
            const pitrError = isPitrError(error)
                ? error
                : new PitrError('extraction_failed', describeError(error));

            logger.error('binlog extraction failed', {
                code: pitrError.code,
                error: pitrError.message,
            });

            return { status: 'failed', error: pitrError };
        }
    }

    private async extractWindow(window: BinlogWindow): Promise<ExtractionOutcome> {
        const { logger, tool } = this.deps;
        const segments = await this.deps.binlogFiles.listSegments();

        if (segments.length === 0) {
            logger.warn('no binlog segments found, nothing to replay');

            return { status: 'no_segments', window };
        }

        const bounds = toExtractionBounds(window);
        const replayFile = this.replayFilePath();

        logger.info('extracting binlog window', {
            start: bounds.startUtc || 'first segment',
            stop: bounds.stopUtc,
            segments: segments.length,
            replayFile,
        });

        let mode: 'batched' | 'per_segment' = 'batched';
        const failedSegments: string[] = [];
        const batched = await tool.extract(segments, bounds, replayFile);

        if (!batched.ok) {
            logger.warn('batched binlog extraction failed, retrying per segment', {
                error: batched.message,
            });
            mode = 'per_segment';
            await writeFile(replayFile, '');

            const partFile = `${replayFile}.part`;

            for (const segment of segments) {
                const status = await tool.extract([segment], bounds, partFile);

                if (!status.ok) {
                    failedSegments.push(segment);
                    logger.warn('skipping unreadable binlog segment', {
                        segment: basename(segment),
                        error: status.message,
                    });
                    continue;
                }

                await appendFile(replayFile, await readFile(partFile));
            }

            await rm(partFile, { force: true });

            if (failedSegments.length === segments.length) {
                await rm(replayFile, { force: true });
                throw new PitrError(
                    'extraction_failed',
                    `every binlog segment failed to extract: ${batched.message}`,
                    { segments: segments.length },
                );
            }
        }

        const bytes = (await stat(replayFile)).size;

        if (bytes === 0) {
            await rm(replayFile, { force: true });
            logger.info('binlog window holds no events, nothing to replay');

            return { status: 'empty', window, segments };
        }

        await this.deps.markerStore.enqueue(replayFile);
        logger.info('binlog replay file ready, pending apply recorded', {
            replayFile,
            bytes,
            mode,
        });

        return {
            status: 'extracted',
            mode,
            window,
            replayFile,
            segments,
            failedSegments,
            bytes,
        };
    }
}
