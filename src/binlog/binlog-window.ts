import {
    addSeconds,
    formatUtcDateTime,
    TargetSpec,
} from '../time/timestamp';
import type { ExtractionBounds } from '../tools/mysqlbinlog';

export interface BinlogWindow {
    /** Null means from the first available segment. */
    startUtc: Date | null;
    stopUtc: Date;
}

export type WindowDecision =
    | { kind: 'skip'; backupInstant: Date; targetInstant: Date }
    | { kind: 'replay'; window: BinlogWindow };

// Binlog event times have one-second granularity and the stop bound is
// exclusive, so events stamped with the target second need one more.
const STOP_PADDING_SECONDS = 1;

export function computeBinlogWindow(
    backupInstant: Date | null,
    target: TargetSpec,
): WindowDecision {
    if (backupInstant &&
        target.instant.getTime() <= backupInstant.getTime()) {
        return {
            kind: 'skip',
            backupInstant,
            targetInstant: target.instant,
        };
    }

    return {
        kind: 'replay',
        window: {
            startUtc: backupInstant,
            stopUtc: addSeconds(target.instant, STOP_PADDING_SECONDS),
        },
    };
}

export function toExtractionBounds(window: BinlogWindow): ExtractionBounds {
    return {
        startUtc: window.startUtc ? formatUtcDateTime(window.startUtc) : null,
        stopUtc: formatUtcDateTime(window.stopUtc),
    };
}
