import { access, mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as sleepFor } from 'node:timers/promises';
import { CHECKPOINTS_FILE, LOCAL_ARCHIVE_FILE } from '../constants';
import { describeError, PitrError } from '../errors';
import type { PitrLogger } from '../logging/logger';
import type { ArchiveTool } from '../tools/archive';
import type { BackupEngine } from '../tools/xtrabackup';
import type { BlobStore } from './blob-store';
import {
    BackupEntry,
    describeEntry,
    localBackupDir,
    remoteArchiveKey,
} from './models';

export interface MaterializerOptions {
    fetchMaxAttempts: number;
    fetchRetryDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

async function pathExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

async function hasCompressedFiles(dir: string): Promise<boolean> {
    const names = await readdir(dir, { recursive: true });

    return names.some((name) => name.endsWith('.zst'));
}

/**
 * Turns a catalog entry into a prepared-for-merge directory on local disk:
 * a checkpoints file and no `.zst` files left. Archives are only unpacked
 * when the checkpoints file is missing.
 */
export class BackupMaterializer {
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly backupRoot: string,
        private readonly blobStore: BlobStore | null,
        private readonly archive: ArchiveTool,
        private readonly engine: BackupEngine,
        private readonly logger: PitrLogger,
        private readonly options: MaterializerOptions,
    ) {
        this.sleep = options.sleep || ((ms) => sleepFor(ms));
    }

    backupDir(entry: BackupEntry): string {
        return entry.location.type === 'local'
            ? entry.location.path
            : localBackupDir(this.backupRoot, entry.kind, entry.timestamp);
    }

    async ensureReady(entry: BackupEntry): Promise<string> {
        const dir = this.backupDir(entry);
        const label = describeEntry(entry);

        await mkdir(dir, { recursive: true });

        if (await this.isReady(dir)) {
            return dir;
        }

        if (!(await this.hasCheckpoints(dir))) {
            await this.unpack(entry, dir);
        }

        if (await hasCompressedFiles(dir)) {
            this.logger.info('decompressing backup', { backup: label, dir });

            const status = await this.engine.decompress(dir);

            if (!status.ok) {
                throw new PitrError(
                    'tool_failed',
                    `decompressing ${label} failed: ${status.message}`,
                    { backup: label, exitCode: status.exitCode },
                );
            }
        }

        if (!(await this.hasCheckpoints(dir))) {
            throw new PitrError(
                'backup_incomplete',
                `backup ${label} in ${dir} has no ${CHECKPOINTS_FILE}`,
                { backup: label, dir },
            );
        }

        if (await hasCompressedFiles(dir)) {
            throw new PitrError(
                'backup_incomplete',
                `backup ${label} in ${dir} still holds compressed files`,
                { backup: label, dir },
            );
        }

        return dir;
    }

    private async unpack(entry: BackupEntry, dir: string): Promise<void> {
        const label = describeEntry(entry);
        const localArchive = join(dir, LOCAL_ARCHIVE_FILE);

        if (await pathExists(localArchive)) {
            this.logger.info('extracting local backup archive', {
                backup: label,
                archive: localArchive,
            });
            await this.extract(entry, localArchive, dir);
        } else if (this.blobStore) {
            await this.fetchRemote(entry, dir);
        } else if (entry.location.type === 'remote') {
            throw new PitrError(
                'backup_unavailable',
                `backup ${label} is remote but no blob store is configured`,
                { backup: label },
            );
        }
    }

    private async hasCheckpoints(dir: string): Promise<boolean> {
        return pathExists(join(dir, CHECKPOINTS_FILE));
    }

    // xtrabackup --compress leaves the checkpoints file uncompressed, so its
    // presence alone does not mean the image is usable.
    private async isReady(dir: string): Promise<boolean> {
        return await this.hasCheckpoints(dir) && !(await hasCompressedFiles(dir));
    }

    private async extract(
        entry: BackupEntry,
        archive: string,
        dir: string,
    ): Promise<void> {
        const status = await this.archive.extractTarGz(archive, dir);

        if (!status.ok) {
            throw new PitrError(
                'tool_failed',
                `extracting ${describeEntry(entry)} failed: ${status.message}`,
                { archive, exitCode: status.exitCode },
            );
        }
    }

    private async fetchRemote(entry: BackupEntry, dir: string): Promise<void> {
        const store = this.blobStore;

        if (!store) {
            return;
        }

        const key = entry.location.type === 'remote'
            ? entry.location.key
            : remoteArchiveKey(entry.kind, entry.timestamp);
        const attempts = Math.max(1, this.options.fetchMaxAttempts);
        let lastError: unknown;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const bytes = await store.get(key);
                const archive = join(dir, LOCAL_ARCHIVE_FILE);

                await writeFile(archive, bytes);
                this.logger.info('downloaded backup archive', {
                    backup: describeEntry(entry),
                    key,
                    bytes: bytes.byteLength,
                });
                await this.extract(entry, archive, dir);
                await rm(archive, { force: true });
                return;
            } catch (error) {
                if (error instanceof PitrError) {
                    throw error;
                }

                lastError = error;
                this.logger.warn('backup download attempt failed', {
                    key,
                    attempt,
                    attempts,
                    error: describeError(error),
                });

                if (attempt < attempts) {
                    await this.sleep(this.options.fetchRetryDelayMs);
                }
            }
        }

        // A local directory without an archive may still hold a compressed
        // image; only a purely remote entry is lost here.
        if (entry.location.type === 'remote') {
            throw new PitrError(
                'backup_unavailable',
                `downloading ${key} failed after ${attempts} attempts: `
                    + describeError(lastError),
                { key, attempts },
            );
        }
    }
}
