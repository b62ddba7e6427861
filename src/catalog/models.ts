import { basename, join } from 'node:path';
import { BackupTimestamp } from '../time/timestamp';

export const BACKUP_KINDS = ['full', 'incremental'] as const;

export type BackupKind = (typeof BACKUP_KINDS)[number];

export type BackupLocation =
    | { type: 'local'; path: string }
    | { type: 'remote'; key: string };

export interface BackupEntry {
    readonly kind: BackupKind;
    readonly timestamp: BackupTimestamp;
    readonly location: BackupLocation;
}

const REMOTE_ARCHIVE_PATTERN = /^backup_(\d{8}_\d{6})\.tar\.gz$/;

export function remoteArchiveKey(
    kind: BackupKind,
    timestamp: BackupTimestamp,
): string {
    return `${kind}/backup_${timestamp.toString()}.tar.gz`;
}

export function localBackupDir(
    backupRoot: string,
    kind: BackupKind,
    timestamp: BackupTimestamp,
): string {
    return join(backupRoot, kind, timestamp.toString());
}

/**
 * Accepts a blob key or bare file name of the form
 * `backup_YYYYMMDD_HHMMSS.tar.gz`.
 */
export function parseRemoteArchiveName(
    keyOrName: string,
): BackupTimestamp | null {
    const match = REMOTE_ARCHIVE_PATTERN.exec(basename(keyOrName));

    if (!match) {
        return null;
    }

    return BackupTimestamp.tryParse(match[1]);
}

export function compareEntries(left: BackupEntry, right: BackupEntry): number {
    return left.timestamp.compare(right.timestamp);
}

export function describeLocation(location: BackupLocation): string {
    return location.type === 'local'
        ? location.path
        : `remote:${location.key}`;
}

export function describeEntry(entry: BackupEntry): string {
    return `${entry.kind}@${entry.timestamp.toString()}`;
}
