import {
    CommandRunner,
    toToolStatus,
    type ToolStatus,
} from './command-runner';

export interface DataDirPermissions {
    fix(dataDir: string): Promise<ToolStatus>;
}

export class ChownDataDirPermissions implements DataDirPermissions {
    constructor(
        private readonly runner: CommandRunner,
        private readonly owner = 'mysql:mysql',
        private readonly binaries: { chown: string; chmod: string } = {
            chown: 'chown',
            chmod: 'chmod',
        },
    ) {}

    async fix(dataDir: string): Promise<ToolStatus> {
        const chown = toToolStatus(await this.runner.run({
            command: this.binaries.chown,
            args: ['-R', this.owner, dataDir],
        }));

        if (!chown.ok) {
            return chown;
        }

        return toToolStatus(await this.runner.run({
            command: this.binaries.chmod,
            args: ['700', dataDir],
        }));
    }
}
