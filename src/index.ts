#!/usr/bin/env node
import { createS3Client, S3BlobStore } from './catalog/blob-store';
import { CliRuntime, PitrOperations, runCli } from './cli';
import { parsePitrEnv } from './env';
import { createConsoleLogger } from './logging/logger';
import { createPitrService } from './pitr/create-pitr-service';
import { SpawnCommandRunner } from './tools/command-runner';

export * from './constants';
export { createPitrService } from './pitr/create-pitr-service';
export { PitrService } from './pitr/pitr-service';
export { parsePitrEnv } from './env';
export { runCli } from './cli';

function createOperations(): PitrOperations {
    const env = parsePitrEnv(process.env);
    const logger = createConsoleLogger('pitr-restore');

    if (env.s3ConfigIncomplete) {
        logger.warn('S3_BACKUP_ENABLED is set but the S3 settings are incomplete, using local backups only');
    }

    const blobStore = env.s3
        ? new S3BlobStore(createS3Client(env.s3), env.s3.bucket)
        : null;

    return createPitrService(env, {
        runner: new SpawnCommandRunner(),
        blobStore,
    });
}

async function main(): Promise<void> {
    let operations: PitrOperations | null = null;
    const runtime: CliRuntime = {
        operations: () => {
            operations = operations || createOperations();

            return operations;
        },
        io: {
            out: (line) => console.log(line),
            err: (line) => console.error(line),
        },
    };

    process.exitCode = await runCli(process.argv.slice(2), runtime);
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('pitr-restore failed', error);
        process.exitCode = 1;
    });
}
