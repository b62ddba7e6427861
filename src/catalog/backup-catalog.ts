import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { describeError } from '../errors';
import type { PitrLogger } from '../logging/logger';
import { BackupTimestamp } from '../time/timestamp';
import type { BlobStore } from './blob-store';
import {
    BackupEntry,
    BackupKind,
    compareEntries,
    parseRemoteArchiveName,
} from './models';

export type RemoteCatalogStatus = 'ok' | 'disabled' | 'unavailable';

export interface CatalogSnapshot {
    full: BackupEntry[];
    incremental: BackupEntry[];
    remoteStatus: RemoteCatalogStatus;
}

interface KindListing {
    kind: BackupKind;
    entries: BackupEntry[];
    remoteStatus: RemoteCatalogStatus;
    remoteError: string | null;
}

function isMissingDirectory(error: unknown): boolean {
    return error instanceof Error &&
        'code' in error &&
        (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Merges backups found under `<root>/full|incremental/<timestamp>/` with
 * archives in the blob store. A local copy wins over a remote archive with
 * the same timestamp; remote failures leave the catalog local-only.
 */
export class BackupCatalog {
    constructor(
        private readonly backupRoot: string,
        private readonly blobStore: BlobStore | null,
        private readonly logger: PitrLogger,
    ) {}

    async listBackups(kind: BackupKind): Promise<BackupEntry[]> {
        const listing = await this.listKind(kind);

        if (listing.remoteError !== null) {
            this.warnRemoteFailure([kind], listing.remoteError);
        }

        return listing.entries;
    }

    async scan(): Promise<CatalogSnapshot> {
        const full = await this.listKind('full');
        const incremental = await this.listKind('incremental');
        const statuses = [full.remoteStatus, incremental.remoteStatus];
        let remoteStatus: RemoteCatalogStatus = 'ok';
        const failures = [full, incremental].filter(
            (listing) => listing.remoteError !== null,
        );

        if (failures.length > 0) {
            this.warnRemoteFailure(
                failures.map((listing) => listing.kind),
                Array.from(new Set(failures.map((listing) => listing.remoteError))).join('; '),
            );
        }

        if (statuses.includes('disabled')) {
            remoteStatus = 'disabled';
        } else if (statuses.includes('unavailable')) {
            remoteStatus = 'unavailable';
        }

        return {
            full: full.entries,
            incremental: incremental.entries,
            remoteStatus,
        };
    }

    private async listKind(kind: BackupKind): Promise<KindListing> {
        const byTimestamp = new Map<string, BackupEntry>();

        for (const entry of await this.listLocal(kind)) {
            byTimestamp.set(entry.timestamp.toString(), entry);
        }

        const remote = await this.listRemote(kind);

        for (const entry of remote.entries) {
            const key = entry.timestamp.toString();

            if (!byTimestamp.has(key)) {
                byTimestamp.set(key, entry);
            }
        }

        return {
            kind,
            entries: Array.from(byTimestamp.values()).sort(compareEntries),
            remoteStatus: remote.remoteStatus,
            remoteError: remote.remoteError,
        };
    }

    private async listLocal(kind: BackupKind): Promise<BackupEntry[]> {
        const kindDir = join(this.backupRoot, kind);
        let names: string[];

        try {
            const dirents = await readdir(kindDir, { withFileTypes: true });

            names = dirents
                .filter((dirent) => dirent.isDirectory())
                .map((dirent) => dirent.name);
        } catch (error) {
            if (isMissingDirectory(error)) {
                return [];
            }

            throw error;
        }

        const entries: BackupEntry[] = [];

        for (const name of names) {
            const timestamp = BackupTimestamp.tryParse(name);

            if (!timestamp || timestamp.toString() !== name) {
                continue;
            }

            entries.push({
                kind,
                timestamp,
                location: {
                    type: 'local',
                    path: join(kindDir, name),
                },
            });
        }

        return entries;
    }

    private warnRemoteFailure(kinds: BackupKind[], error: string): void {
        this.logger.warn('remote backup listing failed, using local backups only', {
            kinds,
            error,
        });
    }

    // Failures are reported by the caller so one scan warns once.
    private async listRemote(kind: BackupKind): Promise<KindListing> {
        if (!this.blobStore) {
            return {
                kind,
                entries: [],
                remoteStatus: 'disabled',
                remoteError: null,
            };
        }

        let keys: string[];

        try {
            keys = await this.blobStore.list(`${kind}/`);
        } catch (error) {
            return {
                kind,
                entries: [],
                remoteStatus: 'unavailable',
                remoteError: describeError(error),
            };
        }

        const entries: BackupEntry[] = [];

        for (const key of keys) {
            const timestamp = parseRemoteArchiveName(key);

            if (!timestamp) {
                continue;
            }

            entries.push({
                kind,
                timestamp,
                location: {
                    type: 'remote',
                    key,
                },
            });
        }

        return {
            kind,
            entries,
            remoteStatus: 'ok',
            remoteError: null,
        };
    }
}
