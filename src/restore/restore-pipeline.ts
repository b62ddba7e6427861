import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BackupMaterializer } from '../catalog/backup-materializer';
import { BackupEntry, describeEntry } from '../catalog/models';
import type { BackupChain, BackupSet } from '../chain/chain-resolver';
import {
    BACKUP_CONFIG_FILE,
    BINLOG_SCRATCH_DIR_PREFIX,
    CHECKPOINTS_FILE,
    EXISTING_DATA_BACKUP_PREFIX,
} from '../constants';
import { describeError, isPitrError, PitrError } from '../errors';
import type { PitrLogger } from '../logging/logger';
import { BackupTimestamp } from '../time/timestamp';
import type { ToolStatus } from '../tools/command-runner';
import type { DataDirPermissions } from '../tools/permissions';
import type { BackupEngine } from '../tools/xtrabackup';
import type { BinlogFiles, PreservedLogs } from './binlog-files';
import { DataDirectory } from './data-dir';
import {
    RestorePhase,
    RestoreSnapshot,
    RestoreStateMachine,
} from './restore-state';

export interface RestorePipelineOptions {
    backupRoot: string;
    backupExistingData: boolean;
    /** Use `--move-back` when applying a prepared directory. */
    useMoveBack?: boolean;
}

export interface RestorePipelineDeps {
    materializer: BackupMaterializer;
    engine: BackupEngine;
    permissions: DataDirPermissions;
    binlogFiles: BinlogFiles;
    dataDir: DataDirectory;
    logger: PitrLogger;
    now?: () => Date;
}

export interface RestoreFailureOutcome {
    success: false;
    state: RestoreSnapshot;
    error: PitrError;
    failedPhase: RestorePhase;
    needsManualRestore: boolean;
    preservedLogsDir: string | null;
    existingDataBackup: string | null;
}

export type RestoreOutcome =
    | {
        success: true;
        state: RestoreSnapshot;
        lastAppliedBackup: BackupEntry;
        restoredLogFiles: string[];
        existingDataBackup: string | null;
    }
    | RestoreFailureOutcome;

export type PrepareOutcome =
    | {
        success: true;
        state: RestoreSnapshot;
        restoreDir: string;
        lastAppliedBackup: BackupEntry;
    }
    | RestoreFailureOutcome;

export type ApplyPreparedOutcome =
    | {
        success: true;
        state: RestoreSnapshot;
        sourceDir: string;
        restoredLogFiles: string[];
        existingDataBackup: string | null;
    }
    | RestoreFailureOutcome;

type TransferMode = 'copy' | 'move';

interface SwapProgress {
    preserved: PreservedLogs | null;
    existingDataBackup: string | null;
}

function requireOk(status: ToolStatus, action: string): void {
    if (!status.ok) {
        throw new PitrError(
            'tool_failed',
            `${action} failed: ${status.message}`,
            { exitCode: status.exitCode },
        );
    }
}

function toPitrError(error: unknown): PitrError {
    if (isPitrError(error)) {
        return error;
    }

    return new PitrError('restore_interrupted', describeError(error));
}

function lastApplied(set: BackupSet): BackupEntry {
    return set.incrementals.length > 0
        ? set.incrementals[set.incrementals.length - 1]
        : set.base;
}

function readBackupType(checkpoints: string): string | null {
    const match = /^backup_type\s*=\s*(\S+)\s*$/m.exec(checkpoints);

    return match ? match[1] : null;
}

/**
 * Merges a backup chain and swaps the result into the data directory.
 * Strictly sequential; the first failure stops the run and is reported
 * with the phase it happened in.
 *
 * `run` does both halves in place for a point-in-time restore.
 * `prepareBackup` only merges, into a separate restore directory, and
 * `applyPrepared` swaps such a directory in later.
 */
export class RestorePipeline {
    private readonly now: () => Date;

    constructor(
        private readonly deps: RestorePipelineDeps,
        private readonly options: RestorePipelineOptions,
    ) {
        this.now = deps.now || (() => new Date());
    }

    async run(chain: BackupChain): Promise<RestoreOutcome> {
        const state = new RestoreStateMachine(this.now);
        const progress: SwapProgress = { preserved: null, existingDataBackup: null };

        try {
            const baseDir = await this.mergeChain(state, chain, null);
            const restoredLogFiles = await this.swapIn(state, baseDir, progress, 'copy');

            state.advance('done');
            this.deps.logger.info('restore finished', {
                base: describeEntry(chain.base),
                incrementals: chain.incrementals.length,
            });

            return {
                success: true,
                state: state.snapshot(),
                lastAppliedBackup: lastApplied(chain),
                restoredLogFiles,
                existingDataBackup: progress.existingDataBackup,
            };
        } catch (error) {
            return this.failed(state, error, progress);
        }
    }

    async prepareBackup(set: BackupSet, restoreDir: string): Promise<PrepareOutcome> {
        const state = new RestoreStateMachine(this.now);

        try {
            await this.mergeChain(state, set, restoreDir);
            state.advance('done');
            this.deps.logger.info('backup prepared', {
                base: describeEntry(set.base),
                incrementals: set.incrementals.length,
                restoreDir,
            });

            return {
                success: true,
                state: state.snapshot(),
                restoreDir,
                lastAppliedBackup: lastApplied(set),
            };
        } catch (error) {
            return this.failed(state, error, { preserved: null, existingDataBackup: null });
        }
    }

    async applyPrepared(sourceDir: string): Promise<ApplyPreparedOutcome> {
        const state = new RestoreStateMachine(this.now);
        const progress: SwapProgress = { preserved: null, existingDataBackup: null };

        try {
            state.advance('prepared_verified', sourceDir);
            await this.verifyPrepared(sourceDir);

            const restoredLogFiles = await this.swapIn(
                state,
                sourceDir,
                progress,
                this.options.useMoveBack ? 'move' : 'copy',
            );

            state.advance('done');
            this.deps.logger.info('prepared backup applied', {
                sourceDir,
                dataDir: this.deps.dataDir.path,
            });

            return {
                success: true,
                state: state.snapshot(),
                sourceDir,
                restoredLogFiles,
                existingDataBackup: progress.existingDataBackup,
            };
        } catch (error) {
            return this.failed(state, error, progress);
        }
    }

    /**
     * Materializes the base, merges every incremental into it and runs the
     * final prepare. With a `workDir` the base is copied there first and the
     * catalog's copy stays untouched.
     */
    private async mergeChain(
        state: RestoreStateMachine,
        set: BackupSet,
        workDir: string | null,
    ): Promise<string> {
        const { engine, logger, materializer } = this.deps;

        state.advance('base_materializing', describeEntry(set.base));
        const sourceDir = await materializer.ensureReady(set.base);
        const baseDir = workDir || sourceDir;

        if (workDir) {
            await this.copyBase(sourceDir, workDir);
        }

        state.advance('base_merging');
        logger.info('preparing base backup', { baseDir });
        requireOk(
            await engine.prepare(baseDir, { applyLogOnly: true }),
            `preparing base backup ${describeEntry(set.base)}`,
        );

        for (const incremental of set.incrementals) {
            state.advance('incrementals_merging', describeEntry(incremental));

            const incrementalDir = await materializer.ensureReady(incremental);

            logger.info('merging incremental backup', {
                backup: describeEntry(incremental),
                incrementalDir,
            });
            requireOk(
                await engine.prepare(baseDir, {
                    applyLogOnly: true,
                    incrementalDir,
                }),
                `merging incremental backup ${describeEntry(incremental)}`,
            );
        }

        state.advance('final_apply');
        logger.info('running final prepare', { baseDir });
        requireOk(
            await engine.prepare(baseDir, { applyLogOnly: false }),
            'final prepare',
        );

        return baseDir;
    }

    private async copyBase(sourceDir: string, workDir: string): Promise<void> {
        const target = new DataDirectory(workDir);

        if (!(await target.isEmpty())) {
            throw new PitrError(
                'restore_dir_not_empty',
                `restore directory ${workDir} is not empty`,
                { restoreDir: workDir },
            );
        }

        const copied = await new DataDirectory(sourceDir).copyTo(workDir, () => true);

        this.deps.logger.info('copied base backup into restore directory', {
            sourceDir,
            restoreDir: workDir,
            entries: copied.length,
        });
    }

    private async verifyPrepared(sourceDir: string): Promise<void> {
        let checkpoints: string;

        try {
            await access(join(sourceDir, BACKUP_CONFIG_FILE));
            checkpoints = await readFile(join(sourceDir, CHECKPOINTS_FILE), 'utf8');
        } catch (error) {
            throw new PitrError(
                'backup_not_prepared',
                `${sourceDir} is not a prepared backup: ${describeError(error)}`,
                { sourceDir },
            );
        }

        const backupType = readBackupType(checkpoints);

        if (backupType !== 'full-prepared') {
            throw new PitrError(
                'backup_not_prepared',
                `${sourceDir} is not fully prepared `
                    + `(backup_type = ${backupType || 'unknown'})`,
                { sourceDir, backupType },
            );
        }
    }

    private async swapIn(
        state: RestoreStateMachine,
        preparedDir: string,
        progress: SwapProgress,
        mode: TransferMode,
    ): Promise<string[]> {
        const { binlogFiles, dataDir, engine, logger, permissions } = this.deps;
        const runStamp = BackupTimestamp.fromInstant(this.now()).toString();
        const preserved = await binlogFiles.preserve(
            join(this.options.backupRoot, `${BINLOG_SCRATCH_DIR_PREFIX}${runStamp}`),
        );

        progress.preserved = preserved;

        if (this.options.backupExistingData) {
            progress.existingDataBackup = await this.backupExistingData(runStamp);
        }

        state.advance('data_dir_purge');
        const purged = await dataDir.purge();

        logger.info('purged data directory', {
            dataDir: dataDir.path,
            entries: purged,
        });

        state.advance('data_dir_copy');
        requireOk(
            mode === 'move'
                ? await engine.moveBack(preparedDir, dataDir.path)
                : await engine.copyBack(preparedDir, dataDir.path),
            `${mode === 'move' ? 'moving' : 'copying'} backup into the data directory`,
        );

        state.advance('permissions_fix');
        requireOk(
            await permissions.fix(dataDir.path),
            'fixing data directory permissions',
        );

        state.advance('log_files_restored');
        await binlogFiles.removeSnapshotLogs();
        const restoredLogFiles = await binlogFiles.restore(preserved);

        if (restoredLogFiles.length > 0) {
            requireOk(
                await permissions.fix(dataDir.path),
                'fixing permissions of restored binlog files',
            );
        }

        return restoredLogFiles;
    }

    private failed(
        state: RestoreStateMachine,
        error: unknown,
        progress: SwapProgress,
    ): RestoreFailureOutcome {
        const pitrError = toPitrError(error);
        const failure = state.fail(pitrError.message);
        const { preserved, existingDataBackup } = progress;

        this.deps.logger.error('restore failed', {
            phase: failure.phase,
            code: pitrError.code,
            error: pitrError.message,
            needsManualRestore: failure.needsManualRestore,
            preservedLogsDir: preserved ? preserved.scratchDir : null,
            existingDataBackup,
        });

        return {
            success: false,
            state: state.snapshot(),
            error: pitrError,
            failedPhase: failure.phase,
            needsManualRestore: failure.needsManualRestore,
            preservedLogsDir: preserved && preserved.files.length > 0
                ? preserved.scratchDir
                : null,
            existingDataBackup,
        };
    }

    private async backupExistingData(runStamp: string): Promise<string | null> {
        const destination = join(
            this.options.backupRoot,
            `${EXISTING_DATA_BACKUP_PREFIX}${runStamp}`,
        );
        const copied = await this.deps.dataDir.copyTo(
            destination,
            (name) => !this.deps.binlogFiles.isLogFile(name),
        );

        if (copied.length === 0) {
            return null;
        }

        this.deps.logger.info('backed up existing data directory', {
            destination,
            entries: copied.length,
        });

        return destination;
    }
}
