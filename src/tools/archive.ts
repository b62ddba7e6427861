import {
    CommandRunner,
    toToolStatus,
    type ToolStatus,
} from './command-runner';

export interface ArchiveTool {
    extractTarGz(archive: string, targetDir: string): Promise<ToolStatus>;
}

export class TarArchiveTool implements ArchiveTool {
    constructor(
        private readonly runner: CommandRunner,
        private readonly binary = 'tar',
    ) {}

    async extractTarGz(
        archive: string,
        targetDir: string,
    ): Promise<ToolStatus> {
        return toToolStatus(await this.runner.run({
            command: this.binary,
            args: ['-xzf', archive, '-C', targetDir],
        }));
    }
}
