export const IGNORABLE_REASONS = [
    'object_exists',
    'duplicate_key',
    'record_not_found',
    'password_warning',
] as const;

export type IgnorableReason = (typeof IGNORABLE_REASONS)[number];

export type ReplayLineClass =
    | { severity: 'critical'; line: string }
    | { severity: 'ignorable'; line: string; reason: IgnorableReason };

export interface ReplayErrorSummary {
    critical: string[];
    ignorable: Array<{ line: string; reason: IgnorableReason }>;
    counts: Record<IgnorableReason, number>;
}

// Expected when the replayed range overlaps what the restored image
// already contains. 1146 (table doesn't exist) is deliberately absent.
const IGNORABLE_PATTERNS: Array<{ reason: IgnorableReason; pattern: RegExp }> = [
    { reason: 'object_exists', pattern: /\bERROR\s+(1050|1007)\b/i },
    { reason: 'duplicate_key', pattern: /\bERROR\s+1062\b/i },
    { reason: 'record_not_found', pattern: /\bERROR\s+1032\b/i },
    { reason: 'password_warning', pattern: /using a password on the command line/i },
];

/**
 * Returns null for lines that do not mention an error at all.
 */
export function classifyReplayLine(rawLine: string): ReplayLineClass | null {
    const line = rawLine.trim();

    if (!/error/i.test(line)) {
        return null;
    }

    for (const { reason, pattern } of IGNORABLE_PATTERNS) {
        if (pattern.test(line)) {
            return {
                severity: 'ignorable',
                line,
                reason,
            };
        }
    }

    return {
        severity: 'critical',
        line,
    };
}

export function classifyReplayOutput(output: string): ReplayErrorSummary {
    const summary: ReplayErrorSummary = {
        critical: [],
        ignorable: [],
        counts: {
            object_exists: 0,
            duplicate_key: 0,
            record_not_found: 0,
            password_warning: 0,
        },
    };

    for (const rawLine of output.split(/\r?\n/)) {
        const classified = classifyReplayLine(rawLine);

        if (!classified) {
            continue;
        }

        if (classified.severity === 'critical') {
            summary.critical.push(classified.line);
            continue;
        }

        summary.ignorable.push({
            line: classified.line,
            reason: classified.reason,
        });
        summary.counts[classified.reason] += 1;
    }

    return summary;
}
