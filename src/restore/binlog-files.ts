import {
    access,
    copyFile,
    mkdir,
    readdir,
    readFile,
    rm,
} from 'node:fs/promises';
import { basename, isAbsolute, join } from 'node:path';
import type { PitrLogger } from '../logging/logger';

export interface PreservedLogs {
    scratchDir: string;
    files: string[];
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Knows where the server keeps its replication log segments and moves them
 * around a data directory wipe.
 */
export class BinlogFiles {
    private readonly segmentPattern: RegExp;

    constructor(
        private readonly dataDir: string,
        private readonly binlogBasename: string,
        private readonly logger: PitrLogger,
    ) {
        this.segmentPattern = new RegExp(
            `^${escapeRegExp(binlogBasename)}\\.\\d+$`,
        );
    }

    get indexFile(): string {
        return join(this.dataDir, `${this.binlogBasename}.index`);
    }

    isLogFile(name: string): boolean {
        return name === basename(this.indexFile) ||
            this.segmentPattern.test(name);
    }

    /**
     * Segments named by the index file, in index order. Entries may be
     * absolute or relative to the data directory; an entry whose path no
     * longer exists is looked up by file name in the data directory. When
     * the index yields nothing the directory is scanned by name.
     */
    async listSegments(): Promise<string[]> {
        const fromIndex = await this.segmentsFromIndex();

        if (fromIndex.length > 0) {
            return fromIndex;
        }

        const scanned = await this.scanSegments();

        if (scanned.length > 0) {
            this.logger.warn('binlog index missing or stale, using segments found by name', {
                indexFile: this.indexFile,
                segments: scanned.length,
            });
        }

        return scanned;
    }

    async preserve(scratchDir: string): Promise<PreservedLogs> {
        const segments = await this.listSegments();
        const files: string[] = [];

        if (segments.length === 0) {
            this.logger.warn('no binlog files to preserve before restore', {
                dataDir: this.dataDir,
            });

            return { scratchDir, files };
        }

        await mkdir(scratchDir, { recursive: true });

        const sources = await fileExists(this.indexFile)
            ? [this.indexFile, ...segments]
            : segments;

        for (const source of sources) {
            const name = basename(source);

            await copyFile(source, join(scratchDir, name));
            files.push(name);
        }

        this.logger.info('preserved live binlog files', {
            scratchDir,
            files: files.length,
        });

        return { scratchDir, files };
    }

    /**
     * Removes log files a backup snapshot carried into the data directory;
     * they describe history up to the backup, not the live history.
     */
    async removeSnapshotLogs(): Promise<string[]> {
        const names = await this.readDataDir();
        const removed = names.filter((name) => this.isLogFile(name)).sort();

        for (const name of removed) {
            await rm(join(this.dataDir, name), { force: true });
        }

        if (removed.length > 0) {
            this.logger.info('removed binlog files restored from backup', {
                files: removed,
            });
        }

        return removed;
    }

    async restore(preserved: PreservedLogs): Promise<string[]> {
        for (const name of preserved.files) {
            await copyFile(
                join(preserved.scratchDir, name),
                join(this.dataDir, name),
            );
        }

        await rm(preserved.scratchDir, {
            recursive: true,
            force: true,
        });

        if (preserved.files.length > 0) {
            this.logger.info('restored live binlog files', {
                files: preserved.files.length,
            });
        }

        return [...preserved.files];
    }

    private async segmentsFromIndex(): Promise<string[]> {
        let content: string;

        try {
            content = await readFile(this.indexFile, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error &&
                error.code === 'ENOENT') {
                return [];
            }

            throw error;
        }

        const segments: string[] = [];

        for (const line of content.split(/\r?\n/)) {
            const entry = line.trim();

            if (entry === '') {
                continue;
            }

            const direct = isAbsolute(entry)
                ? entry
                : join(this.dataDir, entry);
            const byName = join(this.dataDir, basename(entry));

            if (await fileExists(direct)) {
                segments.push(direct);
            } else if (await fileExists(byName)) {
                segments.push(byName);
            } else {
                this.logger.warn('binlog index entry not found', { entry });
            }
        }

        return segments;
    }

    private async scanSegments(): Promise<string[]> {
        return (await this.readDataDir())
            .filter((name) => this.segmentPattern.test(name))
            .sort()
            .map((name) => join(this.dataDir, name));
    }

    private async readDataDir(): Promise<string[]> {
        try {
            return await readdir(this.dataDir);
        } catch (error) {
            if (error instanceof Error && 'code' in error &&
                error.code === 'ENOENT') {
                return [];
            }

            throw error;
        }
    }
}
