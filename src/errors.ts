export const PITR_ERROR_CODES = [
    'invalid_target_time',
    'invalid_timezone',
    'invalid_backup_timestamp',
    'invalid_chain_override',
    'no_backup_before_target',
    'no_full_backup_for_incremental',
    'backup_unavailable',
    'backup_incomplete',
    'backup_not_prepared',
    'restore_dir_not_empty',
    'tool_failed',
    'restore_interrupted',
    'extraction_failed',
    'marker_write_failed',
    'database_unavailable',
] as const;

export type PitrErrorCode = (typeof PITR_ERROR_CODES)[number];

export class PitrError extends Error {
    constructor(
        readonly code: PitrErrorCode,
        message: string,
        readonly details: Record<string, unknown> = {},
    ) {
        super(message);
        this.name = 'PitrError';
    }
}

export function isPitrError(error: unknown): error is PitrError {
    return error instanceof PitrError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error && error.message.trim() !== '') {
        return error.message;
    }

    return String(error);
}
