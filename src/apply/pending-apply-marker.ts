import { open, readFile, rename, rm } from 'node:fs/promises';
import { dirname, isAbsolute } from 'node:path';
import { z } from 'zod';
import { describeError, PitrError } from '../errors';

const MarkerPayloadSchema = z.string()
    .trim()
    .min(1, 'marker is empty')
    .refine(isAbsolute, 'marker must hold an absolute replay file path')
    .refine(
        (value) => !/[\r\n]/.test(value),
        'marker must hold a single path',
    );

export interface PendingApplyMarker {
    replayFile: string;
}

export type MarkerRead =
    | { state: 'empty' }
    | { state: 'pending'; marker: PendingApplyMarker }
    | { state: 'malformed'; raw: string; reason: string };

export function parseMarkerPayload(raw: string): MarkerRead {
    const parsed = MarkerPayloadSchema.safeParse(raw);

    if (!parsed.success) {
        return {
            state: 'malformed',
            raw,
            reason: parsed.error.issues[0]?.message || 'invalid marker',
        };
    }

    return {
        state: 'pending',
        marker: { replayFile: parsed.data },
    };
}

/**
 * Single-slot durable queue handing a replay file from the restore run to
 * whichever process later sees the database come up.
 */
export interface PendingApplyMarkerStore {
    enqueue(replayFile: string): Promise<PendingApplyMarker>;
    peek(): Promise<MarkerRead>;
    /** Removes the marker if it still points at `marker.replayFile`. */
    acknowledge(marker: PendingApplyMarker): Promise<boolean>;
    discard(): Promise<void>;
}

function validatedPath(replayFile: string): string {
    const read = parseMarkerPayload(replayFile);

    if (read.state !== 'pending') {
        throw new PitrError(
            'marker_write_failed',
            read.state === 'malformed' ? read.reason : 'marker is empty',
            { replayFile },
        );
    }

    return read.marker.replayFile;
}

export class InMemoryPendingApplyMarkerStore implements PendingApplyMarkerStore {
    private raw: string | null = null;

    constructor(initialRaw?: string) {
        this.raw = initialRaw === undefined ? null : initialRaw;
    }

    get content(): string | null {
        return this.raw;
    }

    async enqueue(replayFile: string): Promise<PendingApplyMarker> {
        const path = validatedPath(replayFile);

        this.raw = path;

        return { replayFile: path };
    }

    async peek(): Promise<MarkerRead> {
        if (this.raw === null) {
            return { state: 'empty' };
        }

        return parseMarkerPayload(this.raw);
    }

    async acknowledge(marker: PendingApplyMarker): Promise<boolean> {
        if (this.raw === null || this.raw.trim() !== marker.replayFile) {
            return false;
        }

        this.raw = null;

        return true;
    }

    async discard(): Promise<void> {
        this.raw = null;
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Marker kept at a fixed path. Writes go through a temp file that is
 * synced and renamed into place, then the directory entry is synced and
 * the content read back before the write counts as done.
 */
export class FilePendingApplyMarkerStore implements PendingApplyMarkerStore {
    constructor(readonly markerPath: string) {}

    async enqueue(replayFile: string): Promise<PendingApplyMarker> {
        const path = validatedPath(replayFile);
        const tempPath = `${this.markerPath}.tmp-${process.pid}`;

        try {
            const handle = await open(tempPath, 'w', 0o600);

            try {
                await handle.writeFile(path, 'utf8');
                await handle.sync();
            } finally {
                await handle.close();
            }

            await rename(tempPath, this.markerPath);
            await this.syncDirectory();
        } catch (error) {
            await rm(tempPath, { force: true });
            throw new PitrError(
                'marker_write_failed',
                `writing pending apply marker ${this.markerPath} failed: `
                    + describeError(error),
                { markerPath: this.markerPath },
            );
        }

        const written = await this.readRaw();

        if (written !== path) {
            throw new PitrError(
                'marker_write_failed',
                `pending apply marker ${this.markerPath} did not read back `
                    + 'the written path',
                { markerPath: this.markerPath },
            );
        }

        return { replayFile: path };
    }

    async peek(): Promise<MarkerRead> {
        const raw = await this.readRaw();

        if (raw === null) {
            return { state: 'empty' };
        }

        return parseMarkerPayload(raw);
    }

    async acknowledge(marker: PendingApplyMarker): Promise<boolean> {
        const current = await this.peek();

        if (current.state !== 'pending' ||
            current.marker.replayFile !== marker.replayFile) {
            return false;
        }

        await this.discard();

        return true;
    }

    async discard(): Promise<void> {
        await rm(this.markerPath, { force: true });
        await this.syncDirectory();
    }

    private async readRaw(): Promise<string | null> {
        try {
            return await readFile(this.markerPath, 'utf8');
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }

            throw error;
        }
    }

    private async syncDirectory(): Promise<void> {
        const handle = await open(dirname(this.markerPath), 'r');

        try {
            await handle.sync();
        } finally {
            await handle.close();
        }
    }
}
