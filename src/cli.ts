import { Command, CommanderError } from 'commander';
import type { DeferredApplyResult } from './apply/deferred-apply-engine';
import type { ExtractionOutcome } from './binlog/binlog-extractor';
import { describeEntry, describeLocation } from './catalog/models';
import { describeError } from './errors';
import type {
    PitrRestoreResult,
    PitrService,
    PrepareBackupResult,
} from './pitr/pitr-service';
import type { ApplyPreparedOutcome, RestoreFailureOutcome } from './restore/restore-pipeline';
import { BackupTimestamp } from './time/timestamp';

export type PitrOperations = Pick<
    PitrService,
    | 'restoreToPointInTime'
    | 'prepareBackup'
    | 'applyPreparedRestore'
    | 'applyPendingBinlog'
    | 'listBackups'
>;

export interface CliIo {
    out(line: string): void;
    err(line: string): void;
}

export interface CliRuntime {
    /** Built on first use so configuration errors surface as exit code 1. */
    operations(): PitrOperations;
    io: CliIo;
}

export const CLI_NAME = 'pitr-restore';

/**
 * A leading `YYYYMMDD_HHMMSS` names the full backup; everything else is an
 * incremental reference.
 */
export function splitBackupArguments(args: string[]): {
    fullBackup?: string;
    incrementals: string[];
} {
    if (args.length > 0 && BackupTimestamp.isValid(args[0])) {
        return {
            fullBackup: args[0],
            incrementals: args.slice(1),
        };
    }

    return { incrementals: [...args] };
}

/**
 * `[restore_dir] <full_backup> [incremental...]`: a leading absolute path
 * is the restore directory when more arguments follow it.
 */
export function splitPrepareArguments(args: string[]): {
    restoreDir?: string;
    fullBackup?: string;
    incrementals: string[];
} {
    if (args.length > 1 && args[0].startsWith('/')) {
        return {
            restoreDir: args[0],
            fullBackup: args[1],
            incrementals: args.slice(2),
        };
    }

    return {
        fullBackup: args[0],
        incrementals: args.slice(1),
    };
}

function describeBinlog(binlog: Exclude<ExtractionOutcome, { status: 'failed' }>): string {
    switch (binlog.status) {
        case 'extracted':
            return `binlog replay pending: ${binlog.replayFile} `
                + `(${binlog.bytes} bytes, ${binlog.mode}); `
                + `run "${CLI_NAME} binlog apply-pitr" once MySQL is up`;
        case 'skipped':
            return 'target is not after the restored backup, no binlog replay needed';
        case 'no_segments':
            return 'no binlog segments found, restored to the backup only';
        case 'empty':
            return 'binlog window holds no events, restored to the backup only';
    }
}

function reportRestore(result: PitrRestoreResult, io: CliIo): number {
    if (result.success) {
        const incrementals = result.chain.incrementals.map(describeEntry);

        io.out(`restore complete: base ${describeEntry(result.chain.base)}, `
            + `incrementals: ${incrementals.length > 0 ? incrementals.join(', ') : 'none'}`);
        io.out(describeBinlog(result.binlog));

        return 0;
    }

    io.err(`restore failed [${result.error.code}]: ${result.error.message}`);

    if (result.status === 'restore_failed') {
        reportFailedRun(result.restore, io);
    }

    return 1;
}

function reportFailedRun(run: RestoreFailureOutcome, io: CliIo): void {
    io.err(`failed phase: ${run.failedPhase}`);

    if (run.needsManualRestore) {
        io.err('the data directory was modified and needs a manual restore');
    }

    if (run.existingDataBackup) {
        io.err(`previous data copied to ${run.existingDataBackup}`);
    }

    if (run.preservedLogsDir) {
        io.err(`live binlog files kept in ${run.preservedLogsDir}`);
    }
}

function reportPrepare(result: PrepareBackupResult, io: CliIo): number {
    if (result.success) {
        const { restoreDir } = result.prepare;
        const incrementals = result.set.incrementals.map(describeEntry);

        io.out(`backup prepared in ${restoreDir}: base ${describeEntry(result.set.base)}, `
            + `incrementals: ${incrementals.length > 0 ? incrementals.join(', ') : 'none'}`);
        io.out(`stop MySQL, then run "${CLI_NAME} restore apply ${restoreDir}"`);

        return 0;
    }

    io.err(`prepare failed [${result.error.code}]: ${result.error.message}`);

    if (result.status === 'prepare_failed') {
        reportFailedRun(result.prepare, io);
    }

    return 1;
}

function reportApplyRestore(result: ApplyPreparedOutcome, io: CliIo): number {
    if (result.success) {
        io.out(`prepared backup ${result.sourceDir} applied to the data directory`);

        if (result.existingDataBackup) {
            io.out(`previous data copied to ${result.existingDataBackup}`);
        }

        return 0;
    }

    io.err(`restore apply failed [${result.error.code}]: ${result.error.message}`);
    reportFailedRun(result, io);

    return 1;
}

function reportApply(result: DeferredApplyResult, io: CliIo): number {
    switch (result.status) {
        case 'no_pending':
            io.out('no pending binlog replay');
            return 0;
        case 'invalid_marker':
            io.err(`discarded invalid pending apply marker: ${result.reason}`);
            return 0;
        case 'database_unavailable':
            io.err(`MySQL not reachable after ${result.attempts} attempts, `
                + `replay of ${result.replayFile} postponed`);
            return 1;
        case 'applied':
            io.out(`binlog replay applied from ${result.replayFile}`);
            return 0;
        case 'failed':
            io.err(result.reason === 'timeout'
                ? `binlog replay timed out: ${result.replayFile}`
                : `binlog replay failed with ${result.summary.critical.length} `
                    + `critical errors: ${result.replayFile}`);

            for (const line of result.summary.critical.slice(0, 10)) {
                io.err(`  ${line}`);
            }

            io.err('the SQL file and marker were kept for a manual retry');
            return 1;
    }
}

export function buildCli(runtime: CliRuntime, setExitCode: (code: number) => void): Command {
    const { io } = runtime;
    const program = new Command()
        .name(CLI_NAME)
        .description('MySQL point-in-time restore from xtrabackup chains and binlogs');

    const restore = new Command('restore')
        .description('Restore the data directory');

    restore
        .command('pitr')
        .description('Restore to a point in time')
        .argument('<target_time>', 'target as "YYYY-MM-DD HH:MM:SS" in RESTORE_TZ')
        .argument(
            '[backups...]',
            'optional full backup timestamp followed by incremental backups',
        )
        .action(async (targetTime: string, backups: string[]) => {
            const result = await runtime.operations().restoreToPointInTime({
                targetTime,
                ...splitBackupArguments(backups),
            });

            setExitCode(reportRestore(result, io));
        });

    restore
        .command('backup')
        .description('Prepare named backups in a restore directory')
        .argument(
            '<backups...>',
            'optional absolute restore directory, the full backup, then incrementals',
        )
        .action(async (backups: string[]) => {
            const { restoreDir, fullBackup, incrementals } = splitPrepareArguments(backups);

            if (!fullBackup) {
                io.err('error: a full backup is required');
                setExitCode(1);
                return;
            }

            setExitCode(reportPrepare(
                await runtime.operations().prepareBackup({
                    fullBackup,
                    incrementals,
                    restoreDir,
                }),
                io,
            ));
        });

    restore
        .command('apply')
        .description('Copy a prepared restore directory into the stopped data directory')
        .argument('[restore_dir]', 'prepared directory, RESTORE_DIR by default')
        .action(async (restoreDir: string | undefined) => {
            setExitCode(reportApplyRestore(
                await runtime.operations().applyPreparedRestore(restoreDir),
                io,
            ));
        });

    const binlog = new Command('binlog')
        .description('Binlog replay');

    binlog
        .command('apply-pitr')
        .description('Replay the pending binlog extract once MySQL is up')
        .action(async () => {
            setExitCode(reportApply(
                await runtime.operations().applyPendingBinlog(),
                io,
            ));
        });

    const backup = new Command('backup')
        .description('Backup catalog');

    backup
        .command('list')
        .description('List full and incremental backups')
        .action(async () => {
            const snapshot = await runtime.operations().listBackups();

            if (snapshot.remoteStatus === 'unavailable') {
                io.err('remote backup store unavailable, showing local backups only');
            }

            for (const entry of [...snapshot.full, ...snapshot.incremental]) {
                io.out([
                    entry.kind.padEnd(11),
                    entry.timestamp.toString(),
                    describeLocation(entry.location),
                ].join('  '));
            }

            setExitCode(0);
        });

    program.addCommand(restore);
    program.addCommand(binlog);
    program.addCommand(backup);

    return program;
}

function applyToAll(command: Command, apply: (command: Command) => void): void {
    apply(command);

    for (const child of command.commands) {
        applyToAll(child, apply);
    }
}

export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
    let exitCode = 0;
    const program = buildCli(runtime, (code) => {
        exitCode = code;
    });

    applyToAll(program, (command) => {
        command.exitOverride();
        command.configureOutput({
            writeOut: (text) => runtime.io.out(text.trimEnd()),
            writeErr: (text) => runtime.io.err(text.trimEnd()),
        });
    });

    try {
        await program.parseAsync(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }

        runtime.io.err(`error: ${describeError(error)}`);

        return 1;
    }

    return exitCode;
}
