import type { DeferredApplyEngine, DeferredApplyResult } from '../apply/deferred-apply-engine';
import type { BinlogExtractor, ExtractionOutcome } from '../binlog/binlog-extractor';
import type { BackupCatalog, CatalogSnapshot } from '../catalog/backup-catalog';
import { describeEntry } from '../catalog/models';
import {
    BackupChain,
    BackupSet,
    ChainOverrides,
    resolveBackupSet,
    resolveChain,
} from '../chain/chain-resolver';
import { describeError, isPitrError, PitrError } from '../errors';
import type { PitrLogger } from '../logging/logger';
import type {
    ApplyPreparedOutcome,
    PrepareOutcome,
    RestoreFailureOutcome,
    RestoreOutcome,
    RestorePipeline,
} from '../restore/restore-pipeline';
import { parseTargetSpec, TargetSpec } from '../time/timestamp';

export interface PitrServiceDeps {
    catalog: BackupCatalog;
    pipeline: RestorePipeline;
    extractor: BinlogExtractor;
    applyEngine: DeferredApplyEngine;
    logger: PitrLogger;
}

export interface PitrServiceSettings {
    timeZone: string;
    /** Where `prepareBackup` works when no directory is given. */
    restoreDir: string;
}

export interface PitrRestoreRequest {
    targetTime: string;
    fullBackup?: string;
    incrementals?: string[];
}

export interface PrepareBackupRequest {
    fullBackup: string;
    incrementals?: string[];
    restoreDir?: string;
}

type RestoreSuccess = Extract<RestoreOutcome, { success: true }>;

export type PrepareBackupResult =
    | {
        success: true;
        status: 'prepared';
        set: BackupSet;
        prepare: Extract<PrepareOutcome, { success: true }>;
    }
    | {
        success: false;
        status: 'resolution_failed';
        error: PitrError;
    }
    | {
        success: false;
        status: 'prepare_failed';
        error: PitrError;
        set: BackupSet;
        prepare: RestoreFailureOutcome;
    };

export type PitrRestoreResult =
    | {
        success: true;
        status: 'restored';
        target: TargetSpec;
        chain: BackupChain;
        restore: RestoreSuccess;
        binlog: Exclude<ExtractionOutcome, { status: 'failed' }>;
        pendingReplayFile: string | null;
    }
    | {
        success: false;
        status: 'invalid_request' | 'resolution_failed';
        error: PitrError;
    }
    | {
        success: false;
        status: 'restore_failed';
        error: PitrError;
        chain: BackupChain;
        restore: RestoreFailureOutcome;
    }
    | {
        success: false;
        status: 'extraction_failed';
        error: PitrError;
        chain: BackupChain;
        restore: RestoreSuccess;
    };

function asPitrError(error: unknown): PitrError {
    if (isPitrError(error)) {
        return error;
    }

    return new PitrError('restore_interrupted', describeError(error));
}

/**
 * Top-level flow: resolve a chain, restore it, cut the binlog window and
 * leave the replay pending for the next start of the server.
 */
export class PitrService {
    constructor(
        private readonly deps: PitrServiceDeps,
        private readonly settings: PitrServiceSettings,
    ) {}

    async restoreToPointInTime(
        request: PitrRestoreRequest,
    ): Promise<PitrRestoreResult> {
        const { logger } = this.deps;
        let target: TargetSpec;

        try {
            target = parseTargetSpec(request.targetTime, this.settings.timeZone);
        } catch (error) {
            return {
                success: false,
                status: 'invalid_request',
                error: asPitrError(error),
            };
        }

        logger.info('point-in-time restore requested', {
            target: target.localString,
            timeZone: target.timeZone,
            targetUtc: target.instant.toISOString(),
        });

        let chain: BackupChain;

        try {
            const snapshot = await this.deps.catalog.scan();
            const overrides: ChainOverrides = {
                fullBackup: request.fullBackup,
                incrementals: request.incrementals,
            };

            chain = resolveChain(snapshot, target, overrides);
        } catch (error) {
            const pitrError = asPitrError(error);

            logger.error('backup chain resolution failed', {
                code: pitrError.code,
                error: pitrError.message,
            });

            return {
                success: false,
                status: 'resolution_failed',
                error: pitrError,
            };
        }

        for (const warning of chain.warnings) {
            logger.warn(warning.message, { code: warning.code });
        }

        logger.info('backup chain resolved', {
            selection: chain.selection,
            base: describeEntry(chain.base),
            incrementals: chain.incrementals.map(describeEntry),
        });

        const restore = await this.deps.pipeline.run(chain);

        if (!restore.success) {
            return {
                success: false,
                status: 'restore_failed',
                error: restore.error,
                chain,
                restore,
            };
        }

        const binlog = await this.deps.extractor.extract(
            restore.lastAppliedBackup.timestamp.toInstant(),
            target,
        );

        if (binlog.status === 'failed') {
            return {
                success: false,
                status: 'extraction_failed',
                error: binlog.error,
                chain,
                restore,
            };
        }

        return {
            success: true,
            status: 'restored',
            target,
            chain,
            restore,
            binlog,
            pendingReplayFile: binlog.status === 'extracted'
                ? binlog.replayFile
                : null,
        };
    }

    /**
     * Merges named backups into a restore directory without touching the
     * data directory; `applyPreparedRestore` swaps the result in later.
     */
    async prepareBackup(request: PrepareBackupRequest): Promise<PrepareBackupResult> {
        const { logger } = this.deps;
        const restoreDir = request.restoreDir || this.settings.restoreDir;
        let set: BackupSet;

        try {
            const snapshot = await this.deps.catalog.scan();

            set = resolveBackupSet(snapshot, request.fullBackup, request.incrementals);
        } catch (error) {
            const pitrError = asPitrError(error);

            logger.error('backup set resolution failed', {
                code: pitrError.code,
                error: pitrError.message,
            });

            return {
                success: false,
                status: 'resolution_failed',
                error: pitrError,
            };
        }

        logger.info('preparing backup set', {
            base: describeEntry(set.base),
            incrementals: set.incrementals.map(describeEntry),
            restoreDir,
        });

        const prepare = await this.deps.pipeline.prepareBackup(set, restoreDir);

        if (!prepare.success) {
            return {
                success: false,
                status: 'prepare_failed',
                error: prepare.error,
                set,
                prepare,
            };
        }

        return {
            success: true,
            status: 'prepared',
            set,
            prepare,
        };
    }

    async applyPreparedRestore(sourceDir?: string): Promise<ApplyPreparedOutcome> {
        return this.deps.pipeline.applyPrepared(sourceDir || this.settings.restoreDir);
    }

    async applyPendingBinlog(): Promise<DeferredApplyResult> {
        return this.deps.applyEngine.applyPending();
    }

    async listBackups(): Promise<CatalogSnapshot> {
        return this.deps.catalog.scan();
    }
}
