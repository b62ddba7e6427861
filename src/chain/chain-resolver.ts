import { basename } from 'node:path';
import type { BackupEntry } from '../catalog/models';
import { describeEntry, parseRemoteArchiveName } from '../catalog/models';
import { PitrError } from '../errors';
import {
    BackupTimestamp,
    TargetSpec,
    targetBackupTimestamp,
} from '../time/timestamp';

export interface CatalogListing {
    full: BackupEntry[];
    incremental: BackupEntry[];
}

export interface ChainOverrides {
    fullBackup?: string;
    incrementals?: string[];
}

export type ChainWarning = {
    code: 'newer_full_backup_ignored';
    message: string;
    ignored: string;
};

export type ChainSelection =
    | 'anchor_full'
    | 'anchor_incremental'
    | 'explicit_full'
    | 'explicit_incrementals';

/** A base full backup and the incrementals to merge into it, in order. */
export interface BackupSet {
    base: BackupEntry;
    incrementals: BackupEntry[];
}

export interface BackupChain extends BackupSet {
    target: TargetSpec;
    selection: ChainSelection;
    warnings: ChainWarning[];
}

/**
 * Accepts `YYYYMMDD_HHMMSS`, `backup_YYYYMMDD_HHMMSS.tar.gz` or a path
 * ending in either.
 */
export function parseBackupReference(raw: string): BackupTimestamp {
    const name = basename(raw.trim().replace(/\/+$/, ''));
    const timestamp = BackupTimestamp.tryParse(name) ||
        parseRemoteArchiveName(name);

    if (!timestamp) {
        throw new PitrError(
            'invalid_chain_override',
            `"${raw}" does not name a backup, expected YYYYMMDD_HHMMSS `
                + 'or backup_YYYYMMDD_HHMMSS.tar.gz',
            { reference: raw },
        );
    }

    return timestamp;
}

function sortAscending(entries: BackupEntry[]): BackupEntry[] {
    return [...entries].sort((left, right) =>
        left.timestamp.compare(right.timestamp));
}

function latest(entries: BackupEntry[]): BackupEntry | undefined {
    const sorted = sortAscending(entries);

    return sorted[sorted.length - 1];
}

function findByTimestamp(
    entries: BackupEntry[],
    timestamp: BackupTimestamp,
): BackupEntry | undefined {
    return entries.find((entry) => entry.timestamp.equals(timestamp));
}

function incrementalsBetween(
    catalog: CatalogListing,
    base: BackupEntry,
    targetTs: BackupTimestamp,
): BackupEntry[] {
    return sortAscending(catalog.incremental.filter((entry) =>
        entry.timestamp.isAfter(base.timestamp) &&
        entry.timestamp.isBefore(targetTs)));
}

function newerFullWarnings(
    catalog: CatalogListing,
    base: BackupEntry,
): ChainWarning[] {
    const newest = latest(catalog.full);

    if (!newest || !newest.timestamp.isAfter(base.timestamp)) {
        return [];
    }

    return [{
        code: 'newer_full_backup_ignored',
        message: `full backup ${newest.timestamp.toString()} is newer than `
            + `the chosen base ${base.timestamp.toString()} and was not used`,
        ignored: newest.timestamp.toString(),
    }];
}

function latestFullAtOrBefore(
    catalog: CatalogListing,
    limit: BackupTimestamp,
): BackupEntry | undefined {
    return latest(catalog.full.filter((entry) =>
        entry.timestamp.compare(limit) <= 0));
}

function resolveExplicitIncrementals(
    catalog: CatalogListing,
    base: BackupEntry,
    targetTs: BackupTimestamp | null,
    references: string[],
): BackupEntry[] {
    const selected = new Map<string, BackupEntry>();

    for (const reference of references) {
        const timestamp = parseBackupReference(reference);
        const entry = findByTimestamp(catalog.incremental, timestamp);

        if (!entry) {
            throw new PitrError(
                'invalid_chain_override',
                `incremental backup ${timestamp.toString()} is not in the catalog`,
                { reference },
            );
        }

        if (!timestamp.isAfter(base.timestamp)) {
            throw new PitrError(
                'invalid_chain_override',
                `incremental backup ${timestamp.toString()} is not newer than `
                    + `base ${base.timestamp.toString()}`,
                { reference },
            );
        }

        if (targetTs && !timestamp.isBefore(targetTs)) {
            throw new PitrError(
                'invalid_chain_override',
                `incremental backup ${timestamp.toString()} must lie strictly `
                    + `between base ${base.timestamp.toString()} and target `
                    + targetTs.toString(),
                { reference },
            );
        }

        selected.set(timestamp.toString(), entry);
    }

    return sortAscending(Array.from(selected.values()));
}

function resolveExplicitFull(
    catalog: CatalogListing,
    reference: string,
    targetTs: BackupTimestamp | null,
): BackupEntry {
    const timestamp = parseBackupReference(reference);
    const entry = findByTimestamp(catalog.full, timestamp);

    if (!entry) {
        throw new PitrError(
            'invalid_chain_override',
            `full backup ${timestamp.toString()} is not in the catalog`,
            { reference },
        );
    }

    if (targetTs && timestamp.isAfter(targetTs)) {
        throw new PitrError(
            'invalid_chain_override',
            `full backup ${timestamp.toString()} is after target `
                + targetTs.toString(),
            { reference },
        );
    }

    return entry;
}

/**
 * Picks the base and ordered incrementals for a target. Backups are
 * compared against the target in UTC compact form; an incremental taken
 * exactly at the target is left to log replay.
 */
export function resolveChain(
    catalog: CatalogListing,
    target: TargetSpec,
    overrides: ChainOverrides = {},
): BackupChain {
    const targetTs = targetBackupTimestamp(target);
    const explicitIncrementals = overrides.incrementals || [];

    if (overrides.fullBackup) {
        const base = resolveExplicitFull(catalog, overrides.fullBackup, targetTs);

        return {
            base,
            incrementals: explicitIncrementals.length > 0
                ? resolveExplicitIncrementals(
                    catalog,
                    base,
                    targetTs,
                    explicitIncrementals,
                )
                : incrementalsBetween(catalog, base, targetTs),
            target,
            selection: 'explicit_full',
            warnings: [],
        };
    }

    if (explicitIncrementals.length > 0) {
        const base = latestFullAtOrBefore(catalog, targetTs);

        if (!base) {
            throw new PitrError(
                'no_full_backup_for_incremental',
                `no full backup at or before ${targetTs.toString()} to apply `
                    + 'the given incrementals to',
                { target: targetTs.toString() },
            );
        }

        return {
            base,
            incrementals: resolveExplicitIncrementals(
                catalog,
                base,
                targetTs,
                explicitIncrementals,
            ),
            target,
            selection: 'explicit_incrementals',
            warnings: [],
        };
    }

    const anchor = latest([
        ...catalog.full.filter((entry) =>
            entry.timestamp.compare(targetTs) <= 0),
        ...catalog.incremental.filter((entry) =>
            entry.timestamp.isBefore(targetTs)),
    ]);

    if (!anchor) {
        throw new PitrError(
            'no_backup_before_target',
            `no backup at or before target ${target.localString} `
                + `(${targetTs.toString()} UTC)`,
            { target: targetTs.toString() },
        );
    }

    // A full backup sharing the anchor's timestamp wins over an incremental.
    const sameTimeFull = findByTimestamp(catalog.full, anchor.timestamp);

    if (anchor.kind === 'full' || sameTimeFull) {
        const base = sameTimeFull || anchor;

        return {
            base,
            incrementals: incrementalsBetween(catalog, base, targetTs),
            target,
            selection: 'anchor_full',
            warnings: [],
        };
    }

    const base = latestFullAtOrBefore(catalog, anchor.timestamp);

    if (!base) {
        throw new PitrError(
            'no_full_backup_for_incremental',
            `incremental backup ${describeEntry(anchor)} has no full backup `
                + 'at or before it',
            { anchor: anchor.timestamp.toString() },
        );
    }

    return {
        base,
        incrementals: [anchor],
        target,
        selection: 'anchor_incremental',
        warnings: newerFullWarnings(catalog, base),
    };
}

/**
 * Named backups with no target: the full backup and the given incrementals,
 * all of which must be in the catalog.
 */
export function resolveBackupSet(
    catalog: CatalogListing,
    fullBackup: string,
    incrementals: string[] = [],
): BackupSet {
    const base = resolveExplicitFull(catalog, fullBackup, null);

    return {
        base,
        incrementals: resolveExplicitIncrementals(
            catalog,
            base,
            null,
            incrementals,
        ),
    };
}
