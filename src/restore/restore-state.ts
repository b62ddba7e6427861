export const RESTORE_PHASES = [
    'unmaterialized',
    'base_materializing',
    'base_merging',
    'incrementals_merging',
    'final_apply',
    'prepared_verified',
    'data_dir_purge',
    'data_dir_copy',
    'permissions_fix',
    'log_files_restored',
    'done',
] as const;

export type RestorePhase = (typeof RESTORE_PHASES)[number];

export type RestoreStatus = RestorePhase | 'failed';

const NEXT_PHASES: Record<RestorePhase, RestorePhase[]> = {
    unmaterialized: ['base_materializing', 'prepared_verified'],
    base_materializing: ['base_merging'],
    base_merging: ['incrementals_merging', 'final_apply'],
    incrementals_merging: ['incrementals_merging', 'final_apply'],
    // A prepare-only run stops after the final apply.
    final_apply: ['data_dir_purge', 'done'],
    prepared_verified: ['data_dir_purge'],
    data_dir_purge: ['data_dir_copy'],
    data_dir_copy: ['permissions_fix'],
    permissions_fix: ['log_files_restored'],
    log_files_restored: ['done'],
    done: [],
};

// From here on the live data directory has been touched.
const DESTRUCTIVE_PHASES: ReadonlySet<RestorePhase> = new Set([
    'data_dir_purge',
    'data_dir_copy',
    'permissions_fix',
    'log_files_restored',
]);

export interface RestoreTransition {
    status: RestoreStatus;
    at: string;
    incrementalIndex?: number;
    detail?: string;
}

export interface RestoreFailure {
    phase: RestorePhase;
    incrementalIndex?: number;
    message: string;
    needsManualRestore: boolean;
}

export interface RestoreSnapshot {
    status: RestoreStatus;
    incrementalIndex: number | null;
    history: RestoreTransition[];
    failure: RestoreFailure | null;
}

export function needsManualRestore(phase: RestorePhase): boolean {
    return DESTRUCTIVE_PHASES.has(phase);
}

export class RestoreStateMachine {
    private phase: RestorePhase = 'unmaterialized';

    private incrementalIndex: number | null = null;

    private failure: RestoreFailure | null = null;

    private readonly history: RestoreTransition[] = [];

    constructor(private readonly now: () => Date = () => new Date()) {
        this.record('unmaterialized');
    }

    get status(): RestoreStatus {
        return this.failure ? 'failed' : this.phase;
    }

    get currentPhase(): RestorePhase {
        return this.phase;
    }

    advance(next: RestorePhase, detail?: string): void {
        if (this.failure) {
            throw new Error(`restore already failed in ${this.failure.phase}`);
        }

        if (!NEXT_PHASES[this.phase].includes(next)) {
            throw new Error(
                `invalid restore transition ${this.phase} -> ${next}`,
            );
        }

        if (next === 'incrementals_merging') {
            this.incrementalIndex = this.incrementalIndex === null
                ? 0
                : this.incrementalIndex + 1;
        } else {
            this.incrementalIndex = null;
        }

        this.phase = next;
        this.record(next, detail);
    }

    fail(message: string): RestoreFailure {
        if (this.failure) {
            return this.failure;
        }

        const failure: RestoreFailure = {
            phase: this.phase,
            message,
            needsManualRestore: needsManualRestore(this.phase),
        };

        if (this.incrementalIndex !== null) {
            failure.incrementalIndex = this.incrementalIndex;
        }

        this.failure = failure;
        this.record('failed', message);

        return failure;
    }

    snapshot(): RestoreSnapshot {
        return {
            status: this.status,
            incrementalIndex: this.incrementalIndex,
            history: this.history.map((transition) => ({ ...transition })),
            failure: this.failure ? { ...this.failure } : null,
        };
    }

    private record(status: RestoreStatus, detail?: string): void {
        const transition: RestoreTransition = {
            status,
            at: this.now().toISOString(),
        };

        if (this.incrementalIndex !== null) {
            transition.incrementalIndex = this.incrementalIndex;
        }

        if (detail !== undefined) {
            transition.detail = detail;
        }

        this.history.push(transition);
    }
}
