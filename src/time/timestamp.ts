import { PitrError } from '../errors';

export const DEFAULT_TIME_ZONE = 'Asia/Shanghai';

const BACKUP_TIMESTAMP_PATTERN =
    /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;
const TARGET_TIME_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export interface WallClock {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
}

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

function wallClockFromMatch(match: RegExpExecArray): WallClock {
    return {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
        hour: Number(match[4]),
        minute: Number(match[5]),
        second: Number(match[6]),
    };
}

function wallClockToUtcMillis(parts: WallClock): number {
    const date = new Date(0);

    // setUTCFullYear keeps years below 100 literal, Date.UTC does not
    date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
    date.setUTCHours(parts.hour, parts.minute, parts.second, 0);

    return date.getTime();
}

function wallClockFromUtc(instant: Date): WallClock {
    return {
        year: instant.getUTCFullYear(),
        month: instant.getUTCMonth() + 1,
        day: instant.getUTCDate(),
        hour: instant.getUTCHours(),
        minute: instant.getUTCMinutes(),
        second: instant.getUTCSeconds(),
    };
}

function sameWallClock(left: WallClock, right: WallClock): boolean {
    return left.year === right.year &&
        left.month === right.month &&
        left.day === right.day &&
        left.hour === right.hour &&
        left.minute === right.minute &&
        left.second === right.second;
}

function isCalendarValid(parts: WallClock): boolean {
    const roundTrip = wallClockFromUtc(
        new Date(wallClockToUtcMillis(parts)),
    );

    return sameWallClock(parts, roundTrip);
}

function formatDateTime(parts: WallClock): string {
    return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)} `
        + `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
}

function formatCompact(parts: WallClock): string {
    return `${pad(parts.year, 4)}${pad(parts.month)}${pad(parts.day)}_`
        + `${pad(parts.hour)}${pad(parts.minute)}${pad(parts.second)}`;
}

/**
 * Catalog timestamp in the fixed-width `YYYYMMDD_HHMMSS` form, always
 * UTC wall-clock. Values only exist after validation, so ordering by the
 * raw string is the same as ordering by instant.
 */
export class BackupTimestamp {
    private constructor(private readonly value: string) {}

    static parse(raw: string): BackupTimestamp {
        const parsed = BackupTimestamp.tryParse(raw);

        if (!parsed) {
            throw new PitrError(
                'invalid_backup_timestamp',
                `invalid backup timestamp "${raw}", expected YYYYMMDD_HHMMSS`,
            );
        }

        return parsed;
    }

    static tryParse(raw: string): BackupTimestamp | null {
        const match = BACKUP_TIMESTAMP_PATTERN.exec(raw.trim());

        if (!match || !isCalendarValid(wallClockFromMatch(match))) {
            return null;
        }

        return new BackupTimestamp(match[0]);
    }

    static isValid(raw: string): boolean {
        return BackupTimestamp.tryParse(raw) !== null;
    }

    static fromInstant(instant: Date): BackupTimestamp {
        if (Number.isNaN(instant.getTime())) {
            throw new PitrError(
                'invalid_backup_timestamp',
                'cannot encode an invalid date',
            );
        }

        return new BackupTimestamp(formatCompact(wallClockFromUtc(instant)));
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }

    toInstant(): Date {
        const match = BACKUP_TIMESTAMP_PATTERN.exec(this.value);

        if (!match) {
            throw new PitrError(
                'invalid_backup_timestamp',
                `invalid backup timestamp "${this.value}"`,
            );
        }

        return new Date(wallClockToUtcMillis(wallClockFromMatch(match)));
    }

    toUtcDateTimeString(): string {
        return formatUtcDateTime(this.toInstant());
    }

    compare(other: BackupTimestamp): number {
        if (this.value === other.value) {
            return 0;
        }

        return this.value < other.value ? -1 : 1;
    }

    equals(other: BackupTimestamp): boolean {
        return this.value === other.value;
    }

    isBefore(other: BackupTimestamp): boolean {
        return this.compare(other) < 0;
    }

    isAfter(other: BackupTimestamp): boolean {
        return this.compare(other) > 0;
    }
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
    const cached = formatterCache.get(timeZone);

    if (cached) {
        return cached;
    }

    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
    });

    formatterCache.set(timeZone, formatter);

    return formatter;
}

export function assertTimeZone(timeZone: string): string {
    const trimmed = timeZone.trim();

    if (trimmed === '') {
        throw new PitrError('invalid_timezone', 'time zone is required');
    }

    try {
        zoneFormatter(trimmed);
    } catch (error) {
        if (error instanceof RangeError) {
            throw new PitrError(
                'invalid_timezone',
                `unknown time zone "${trimmed}"`,
            );
        }

        throw error;
    }

    return trimmed;
}

export function wallClockInZone(instant: Date, timeZone: string): WallClock {
    const parts = zoneFormatter(timeZone).formatToParts(instant);
    const read = (type: Intl.DateTimeFormatPartTypes): number => {
        const part = parts.find((candidate) => candidate.type === type);

        return part ? Number(part.value) : 0;
    };

    return {
        year: read('year'),
        month: read('month'),
        day: read('day'),
        hour: read('hour'),
        minute: read('minute'),
        second: read('second'),
    };
}

function zoneOffsetMillis(instantMillis: number, timeZone: string): number {
    const wholeSecond = Math.floor(instantMillis / 1000) * 1000;
    const wallClock = wallClockInZone(new Date(wholeSecond), timeZone);

    return wallClockToUtcMillis(wallClock) - wholeSecond;
}

/**
 * Resolves a zone-local wall-clock reading to an instant. Returns null
 * for readings that fall in a daylight-saving gap. Ambiguous readings
 * resolve to the earlier offset's instant.
 */
export function zonedWallClockToInstant(
    parts: WallClock,
    timeZone: string,
): Date | null {
    const naiveMillis = wallClockToUtcMillis(parts);
    const firstOffset = zoneOffsetMillis(naiveMillis, timeZone);
    let candidate = naiveMillis - firstOffset;
    const secondOffset = zoneOffsetMillis(candidate, timeZone);

    if (secondOffset !== firstOffset) {
        candidate = naiveMillis - secondOffset;
    }

    const instant = new Date(candidate);

    if (!sameWallClock(wallClockInZone(instant, timeZone), parts)) {
        return null;
    }

    return instant;
}

export function formatUtcDateTime(instant: Date): string {
    return formatDateTime(wallClockFromUtc(instant));
}

export function formatInTimeZone(instant: Date, timeZone: string): string {
    return formatDateTime(wallClockInZone(instant, timeZone));
}

export function addSeconds(instant: Date, seconds: number): Date {
    return new Date(instant.getTime() + (seconds * 1000));
}

export interface TargetSpec {
    localString: string;
    timeZone: string;
    instant: Date;
}

export function parseTargetSpec(
    localString: string,
    timeZone: string = DEFAULT_TIME_ZONE,
): TargetSpec {
    const zone = assertTimeZone(timeZone);
    const match = TARGET_TIME_PATTERN.exec(localString);

    if (!match) {
        throw new PitrError(
            'invalid_target_time',
            `invalid target time "${localString}", `
                + 'expected YYYY-MM-DD HH:MM:SS',
        );
    }

    const parts = wallClockFromMatch(match);

    if (!isCalendarValid(parts)) {
        throw new PitrError(
            'invalid_target_time',
            `invalid target time "${localString}", not a calendar date`,
        );
    }

    const instant = zonedWallClockToInstant(parts, zone);

    if (!instant) {
        throw new PitrError(
            'invalid_target_time',
            `target time "${localString}" does not exist in ${zone}`,
        );
    }

    return {
        localString,
        timeZone: zone,
        instant,
    };
}

/**
 * Target expressed in the catalog's UTC compact form, so it can be ordered
 * against backup timestamps.
 */
export function targetBackupTimestamp(target: TargetSpec): BackupTimestamp {
    return BackupTimestamp.fromInstant(target.instant);
}
