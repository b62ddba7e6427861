import {
    CommandRunner,
    toToolStatus,
    type ToolStatus,
} from './command-runner';

export interface ExtractionBounds {
    startUtc: string | null;
    stopUtc: string;
}

export interface LogExtractionTool {
    extract(
        segments: string[],
        bounds: ExtractionBounds,
        outputFile: string,
    ): Promise<ToolStatus>;
}

export class MysqlbinlogTool implements LogExtractionTool {
    constructor(
        private readonly runner: CommandRunner,
        private readonly binary = 'mysqlbinlog',
    ) {}

    async extract(
        segments: string[],
        bounds: ExtractionBounds,
        outputFile: string,
    ): Promise<ToolStatus> {
        const args = ['--skip-gtids'];

        if (bounds.startUtc !== null) {
            args.push('--start-datetime', bounds.startUtc);
        }

        args.push('--stop-datetime', bounds.stopUtc, ...segments);

        // --start/--stop-datetime are read in the process zone; the bounds are UTC.
        return toToolStatus(await this.runner.run({
            command: this.binary,
            args,
            env: { TZ: 'UTC' },
            stdoutFile: outputFile,
        }));
    }
}
