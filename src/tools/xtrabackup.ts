import {
    CommandRunner,
    toToolStatus,
    type ToolStatus,
} from './command-runner';

export interface PrepareOptions {
    applyLogOnly: boolean;
    incrementalDir?: string;
}

/**
 * Physical backup engine: merges incrementals into a base image and
 * materializes the image into a data directory.
 */
export interface BackupEngine {
    prepare(baseDir: string, options: PrepareOptions): Promise<ToolStatus>;
    copyBack(baseDir: string, dataDir: string): Promise<ToolStatus>;
    moveBack(baseDir: string, dataDir: string): Promise<ToolStatus>;
    decompress(dir: string): Promise<ToolStatus>;
}

export class XtrabackupEngine implements BackupEngine {
    constructor(
        private readonly runner: CommandRunner,
        private readonly binary = 'xtrabackup',
    ) {}

    async prepare(
        baseDir: string,
        options: PrepareOptions,
    ): Promise<ToolStatus> {
        const args = ['--prepare'];

        if (options.applyLogOnly) {
            args.push('--apply-log-only');
        }

        args.push(`--target-dir=${baseDir}`);

        if (options.incrementalDir) {
            args.push(`--incremental-dir=${options.incrementalDir}`);
        }

        return toToolStatus(await this.runner.run({
            command: this.binary,
            args,
            cwd: baseDir,
        }));
    }

    async copyBack(baseDir: string, dataDir: string): Promise<ToolStatus> {
        return this.transfer('--copy-back', baseDir, dataDir);
    }

    async moveBack(baseDir: string, dataDir: string): Promise<ToolStatus> {
        return this.transfer('--move-back', baseDir, dataDir);
    }

    async decompress(dir: string): Promise<ToolStatus> {
        return toToolStatus(await this.runner.run({
            command: this.binary,
            args: ['--decompress', '--remove-original', `--target-dir=${dir}`],
        }));
    }

    private async transfer(
        mode: '--copy-back' | '--move-back',
        baseDir: string,
        dataDir: string,
    ): Promise<ToolStatus> {
        return toToolStatus(await this.runner.run({
            command: this.binary,
            args: [mode, `--target-dir=${baseDir}`, `--datadir=${dataDir}`],
        }));
    }
}
