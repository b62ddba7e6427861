import { spawn } from 'node:child_process';
import { open, type FileHandle } from 'node:fs/promises';

export interface CommandInvocation {
    command: string;
    args: string[];
    cwd?: string;
    env?: Record<string, string>;
    stdinFile?: string;
    stdoutFile?: string;
    timeoutMs?: number;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface CommandRunner {
    run(invocation: CommandInvocation): Promise<CommandResult>;
}

export type ToolStatus =
    | { ok: true }
    | { ok: false; exitCode: number; message: string };

// Shell convention for "command not found".
const SPAWN_FAILURE_EXIT_CODE = 127;

export function toToolStatus(result: CommandResult): ToolStatus {
    if (result.exitCode === 0 && !result.timedOut) {
        return { ok: true };
    }

    const stderr = result.stderr.trim();
    const message = result.timedOut
        ? 'timed out'
        : stderr || `exited with code ${result.exitCode}`;

    return {
        ok: false,
        exitCode: result.exitCode,
        message,
    };
}

export class SpawnCommandRunner implements CommandRunner {
    async run(invocation: CommandInvocation): Promise<CommandResult> {
        let stdinHandle: FileHandle | undefined;
        let stdoutHandle: FileHandle | undefined;

        try {
            if (invocation.stdinFile) {
                stdinHandle = await open(invocation.stdinFile, 'r');
            }

            if (invocation.stdoutFile) {
                stdoutHandle = await open(invocation.stdoutFile, 'w');
            }

            return await this.spawnAndWait(
                invocation,
                stdinHandle,
                stdoutHandle,
            );
        } finally {
            await stdinHandle?.close();

            if (stdoutHandle) {
                await stdoutHandle.sync();
                await stdoutHandle.close();
            }
        }
    }

    private spawnAndWait(
        invocation: CommandInvocation,
        stdinHandle: FileHandle | undefined,
        stdoutHandle: FileHandle | undefined,
    ): Promise<CommandResult> {
        return new Promise<CommandResult>((resolve) => {
            const stdoutChunks: Buffer[] = [];
            const stderrChunks: Buffer[] = [];
            let timedOut = false;
            let settled = false;
            const child = spawn(invocation.command, invocation.args, {
                cwd: invocation.cwd,
                env: {
                    ...process.env,
                    ...(invocation.env || {}),
                },
                stdio: [
                    stdinHandle ? stdinHandle.fd : 'ignore',
                    stdoutHandle ? stdoutHandle.fd : 'pipe',
                    'pipe',
                ],
            });
            const timer = invocation.timeoutMs
                ? setTimeout(() => {
                    timedOut = true;
                    child.kill('SIGKILL');
                }, invocation.timeoutMs)
                : undefined;
            const finish = (exitCode: number, extraStderr?: string): void => {
                if (settled) {
                    return;
                }

                settled = true;

                if (timer) {
                    clearTimeout(timer);
                }

                const stderr = Buffer.concat(stderrChunks).toString('utf8');

                resolve({
                    exitCode,
                    stdout: Buffer.concat(stdoutChunks).toString('utf8'),
                    stderr: extraStderr ? `${stderr}${extraStderr}` : stderr,
                    timedOut,
                });
            };

            child.stdout?.on('data', (chunk: Buffer) => {
                stdoutChunks.push(chunk);
            });
            child.stderr?.on('data', (chunk: Buffer) => {
                stderrChunks.push(chunk);
            });
            child.on('error', (error) => {
                finish(SPAWN_FAILURE_EXIT_CODE, error.message);
            });
            child.on('close', (code, signal) => {
                if (code !== null) {
                    finish(code);
                    return;
                }

                finish(1, signal ? `terminated by ${signal}` : undefined);
            });
        });
    }
}
