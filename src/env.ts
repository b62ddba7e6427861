import { isAbsolute, join } from 'node:path';
import type { S3BlobStoreConfig } from './catalog/blob-store';
import { PITR_MARKER_FILE, RESTORE_DIR_NAME } from './constants';
import { assertTimeZone, DEFAULT_TIME_ZONE } from './time/timestamp';

export interface ToolBinaries {
    xtrabackup: string;
    mysqlbinlog: string;
    mysql: string;
    mysqladmin: string;
    tar: string;
    chown: string;
    chmod: string;
}

export interface PitrEnv {
    backupBaseDir: string;
    mysqlDataDir: string;
    restoreTimeZone: string;
    mysqlHost: string;
    mysqlPort: number;
    mysqlUser: string;
    mysqlPassword: string;
    binlogBasename: string;
    markerPath: string;
    replayTimeoutSeconds: number;
    readyMaxAttempts: number;
    readyIntervalSeconds: number;
    blobFetchMaxAttempts: number;
    blobFetchRetryDelaySeconds: number;
    backupExistingData: boolean;
    useMoveBack: boolean;
    restoreDir: string;
    dataDirOwner: string;
    binaries: ToolBinaries;
    s3: S3BlobStoreConfig | null;
    s3ConfigIncomplete: boolean;
}

function parseNonNegativeInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return parsed;
}

function parseStrictPositiveInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseNonNegativeInteger(raw, fieldName, defaultValue);

    if (parsed <= 0) {
        throw new Error(`${fieldName} must be greater than zero`);
    }

    return parsed;
}

function parsePort(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseStrictPositiveInteger(raw, fieldName, defaultValue);

    if (parsed > 65535) {
        throw new Error(`${fieldName} must be a valid TCP port`);
    }

    return parsed;
}

function parseBoolean(
    raw: string | undefined,
    fieldName: string,
    defaultValue: boolean,
): boolean {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const normalized = raw.trim().toLowerCase();

    if (
        normalized === '1' ||
        normalized === 'true' ||
        normalized === 'yes' ||
        normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0' ||
        normalized === 'false' ||
        normalized === 'no' ||
        normalized === 'off'
    ) {
        return false;
    }

    throw new Error(`${fieldName} must be a boolean value`);
}

function parseOptionalString(raw: string | undefined): string | undefined {
    if (!raw) {
        return undefined;
    }

    const trimmed = raw.trim();

    return trimmed ? trimmed : undefined;
}

function parseAbsolutePath(
    raw: string | undefined,
    fieldName: string,
    defaultValue: string,
): string {
    const parsed = parseOptionalString(raw) || defaultValue;

    if (!isAbsolute(parsed)) {
        throw new Error(`${fieldName} must be an absolute path`);
    }

    return parsed;
}

function parseTimeZone(raw: string | undefined, fieldName: string): string {
    const zone = parseOptionalString(raw) || DEFAULT_TIME_ZONE;

    try {
        return assertTimeZone(zone);
    } catch {
        throw new Error(`${fieldName} must be an IANA time zone name`);
    }
}

function parseS3Config(env: NodeJS.ProcessEnv): {
    s3: S3BlobStoreConfig | null;
    s3ConfigIncomplete: boolean;
} {
    const enabled = parseBoolean(
        env.S3_BACKUP_ENABLED,
        'S3_BACKUP_ENABLED',
        false,
    );

    if (!enabled) {
        return { s3: null, s3ConfigIncomplete: false };
    }

    const endpoint = parseOptionalString(env.S3_ENDPOINT);
    const accessKeyId = parseOptionalString(env.S3_ACCESS_KEY);
    const secretAccessKey = parseOptionalString(env.S3_SECRET_KEY);

    if (!endpoint || !accessKeyId || !secretAccessKey) {
        return { s3: null, s3ConfigIncomplete: true };
    }

    return {
        s3: {
            endpoint,
            accessKeyId,
            secretAccessKey,
            bucket: parseOptionalString(env.S3_BUCKET) || 'mysql-backups',
            region: parseOptionalString(env.S3_REGION) || 'us-east-1',
            useSsl: parseBoolean(env.S3_USE_SSL, 'S3_USE_SSL', true),
            forcePathStyle: parseBoolean(
                env.S3_FORCE_PATH_STYLE,
                'S3_FORCE_PATH_STYLE',
                false,
            ),
        },
        s3ConfigIncomplete: false,
    };
}

export function parsePitrEnv(env: NodeJS.ProcessEnv): PitrEnv {
    const backupBaseDir = parseAbsolutePath(
        env.BACKUP_BASE_DIR,
        'BACKUP_BASE_DIR',
        '/backups',
    );

    return {
        backupBaseDir,
        mysqlDataDir: parseAbsolutePath(
            env.MYSQL_DATA_DIR,
            'MYSQL_DATA_DIR',
            '/var/lib/mysql',
        ),
        restoreTimeZone: parseTimeZone(env.RESTORE_TZ, 'RESTORE_TZ'),
        mysqlHost: parseOptionalString(env.MYSQL_HOST) || '127.0.0.1',
        mysqlPort: parsePort(env.MYSQL_PORT, 'MYSQL_PORT', 3306),
        mysqlUser: parseOptionalString(env.MYSQL_USER) || 'root',
        // Passwords are taken verbatim; surrounding spaces may be meaningful.
        mysqlPassword: env.MYSQL_ROOT_PASSWORD || '',
        binlogBasename: parseOptionalString(env.BINLOG_BASENAME) || 'mysql-bin',
        markerPath: parseAbsolutePath(
            env.PITR_MARKER_PATH,
            'PITR_MARKER_PATH',
            join(backupBaseDir, PITR_MARKER_FILE),
        ),
        replayTimeoutSeconds: parseStrictPositiveInteger(
            env.PITR_REPLAY_TIMEOUT_SECONDS,
            'PITR_REPLAY_TIMEOUT_SECONDS',
            3600,
        ),
        readyMaxAttempts: parseStrictPositiveInteger(
            env.MYSQL_READY_MAX_ATTEMPTS,
            'MYSQL_READY_MAX_ATTEMPTS',
            60,
        ),
        readyIntervalSeconds: parseNonNegativeInteger(
            env.MYSQL_READY_INTERVAL_SECONDS,
            'MYSQL_READY_INTERVAL_SECONDS',
            2,
        ),
        blobFetchMaxAttempts: parseStrictPositiveInteger(
            env.BLOB_FETCH_MAX_ATTEMPTS,
            'BLOB_FETCH_MAX_ATTEMPTS',
            3,
        ),
        blobFetchRetryDelaySeconds: parseNonNegativeInteger(
            env.BLOB_FETCH_RETRY_DELAY_SECONDS,
            'BLOB_FETCH_RETRY_DELAY_SECONDS',
            2,
        ),
        backupExistingData: parseBoolean(
            env.BACKUP_EXISTING_DATA,
            'BACKUP_EXISTING_DATA',
            true,
        ),
        useMoveBack: parseBoolean(env.USE_MOVE_BACK, 'USE_MOVE_BACK', false),
        restoreDir: parseAbsolutePath(
            env.RESTORE_DIR,
            'RESTORE_DIR',
            join(backupBaseDir, RESTORE_DIR_NAME),
        ),
        dataDirOwner: parseOptionalString(env.MYSQL_DATA_OWNER) || 'mysql:mysql',
        binaries: {
            xtrabackup: parseOptionalString(env.XTRABACKUP_BIN) || 'xtrabackup',
            mysqlbinlog: parseOptionalString(env.MYSQLBINLOG_BIN) || 'mysqlbinlog',
            mysql: parseOptionalString(env.MYSQL_BIN) || 'mysql',
            mysqladmin: parseOptionalString(env.MYSQLADMIN_BIN) || 'mysqladmin',
            tar: parseOptionalString(env.TAR_BIN) || 'tar',
            chown: parseOptionalString(env.CHOWN_BIN) || 'chown',
            chmod: parseOptionalString(env.CHMOD_BIN) || 'chmod',
        },
        ...parseS3Config(env),
    };
}
