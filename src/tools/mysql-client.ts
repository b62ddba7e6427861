import { CommandRunner } from './command-runner';

export interface MysqlConnection {
    host: string;
    port: number;
    user: string;
    password: string;
}

export interface ReplayExecution {
    exitCode: number;
    output: string;
    timedOut: boolean;
}

export interface SqlClient {
    ping(): Promise<boolean>;
    applyFile(sqlFile: string, timeoutMs: number): Promise<ReplayExecution>;
}

const PING_TIMEOUT_MS = 5000;

export class MysqlCliClient implements SqlClient {
    constructor(
        private readonly runner: CommandRunner,
        private readonly connection: MysqlConnection,
        private readonly binaries: {
            mysql: string;
            mysqladmin: string;
        } = {
            mysql: 'mysql',
            mysqladmin: 'mysqladmin',
        },
    ) {}

    async ping(): Promise<boolean> {
        const result = await this.runner.run({
            command: this.binaries.mysqladmin,
            args: [...this.connectionArgs(), 'ping', '--silent'],
            env: this.passwordEnv(),
            timeoutMs: PING_TIMEOUT_MS,
        });

        return result.exitCode === 0 && !result.timedOut;
    }

    async applyFile(
        sqlFile: string,
        timeoutMs: number,
    ): Promise<ReplayExecution> {
        const result = await this.runner.run({
            command: this.binaries.mysql,
            args: [...this.connectionArgs(), '--force'],
            env: this.passwordEnv(),
            stdinFile: sqlFile,
            timeoutMs,
        });
        const output = [result.stdout, result.stderr]
            .filter((chunk) => chunk.length > 0)
            .join('\n');

        return {
            exitCode: result.exitCode,
            output,
            timedOut: result.timedOut,
        };
    }

    private connectionArgs(): string[] {
        return [
            '-h',
            this.connection.host,
            '-P',
            String(this.connection.port),
            '-u',
            this.connection.user,
        ];
    }

    private passwordEnv(): Record<string, string> {
        return { MYSQL_PWD: this.connection.password };
    }
}
