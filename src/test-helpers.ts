import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
    CommandInvocation,
    CommandResult,
    CommandRunner,
} from './tools/command-runner';

export const FIXED_NOW = new Date('2025-11-26T08:00:00.000Z');

export function fixedNow(): Date {
    return new Date(FIXED_NOW.getTime());
}

export type CommandHandler = (
    invocation: CommandInvocation,
) => Partial<CommandResult> | void | Promise<Partial<CommandResult> | void>;

interface RegisteredHandler {
    command: string;
    matches: (args: string[]) => boolean;
    handle: CommandHandler;
}

/**
 * In-process stand-in for the external tools. Handlers registered later
 * take precedence; stdout returned for an invocation with `stdoutFile` is
 * written to that file the way a shell redirect would.
 */
export class FakeCommandRunner implements CommandRunner {
    readonly invocations: CommandInvocation[] = [];

    private readonly handlers: RegisteredHandler[] = [];

    on(
        command: string,
        handle: CommandHandler,
        matches: (args: string[]) => boolean = () => true,
    ): this {
        this.handlers.unshift({
            command,
            matches,
            handle,
        });

        return this;
    }

    calls(command: string): CommandInvocation[] {
        return this.invocations.filter(
            (invocation) => invocation.command === command,
        );
    }

    async run(invocation: CommandInvocation): Promise<CommandResult> {
        this.invocations.push({
            ...invocation,
            args: [...invocation.args],
        });

        const handler = this.handlers.find((candidate) =>
            candidate.command === invocation.command &&
            candidate.matches(invocation.args),
        );
        const partial = handler ? await handler.handle(invocation) : undefined;
        const result: CommandResult = {
            exitCode: partial?.exitCode ?? 0,
            stdout: partial?.stdout ?? '',
            stderr: partial?.stderr ?? '',
            timedOut: partial?.timedOut ?? false,
        };

        if (invocation.stdoutFile) {
            await writeFile(invocation.stdoutFile, result.stdout, 'utf8');

            return {
                ...result,
                stdout: '',
            };
        }

        return result;
    }
}

export function argValue(args: string[], prefix: string): string | undefined {
    const match = args.find((arg) => arg.startsWith(prefix));

    return match === undefined ? undefined : match.slice(prefix.length);
}

export async function createTempDir(label: string): Promise<string> {
    return mkdtemp(join(tmpdir(), `pitr-${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, {
        recursive: true,
        force: true,
    });
}

export async function writeFixture(
    path: string,
    content: string,
): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
}
