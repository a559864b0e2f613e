import type { Logger } from '../logger';

// =================================================================
// CIRCUIT BREAKER
// =================================================================
//
// Gates one service's backend pool on its recent network-error
// ratio. Backend HTTP error statuses are not failures here, only
// transport errors are.
//
//   CLOSED    ── errors/samples > 0.5 (≥ minSamples) ──▶ TRIPPED
//   TRIPPED   ── cooldown elapsed, next request ───────▶ HALF_OPEN
//   HALF_OPEN ── probe succeeded ─────────────────────▶ CLOSED
//   HALF_OPEN ── probe failed ────────────────────────▶ TRIPPED
//
// A request reports with the Admission it was given. Outcomes from
// admissions older than the last transition only show up in stats.
//
// Configuration:
//   errorRatioThreshold: 0.5   — trips above this ratio
//   minSamples: 10             — outcomes needed before tripping
//   windowMs: 10000            — outcomes older than this are dropped
//   cooldownMs: 10000          — time tripped before the probe
// =================================================================

export type CircuitState = 'CLOSED' | 'TRIPPED' | 'HALF_OPEN';

export interface CircuitTransition {
    from: CircuitState;
    to: CircuitState;
    at: string;
}

export interface CircuitBreakerOptions {
    errorRatioThreshold: number;
    minSamples: number;
    windowMs: number;
    cooldownMs: number;
    onTransition?: (name: string, transition: CircuitTransition) => void;
    clock?: () => number;
}

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
    errorRatioThreshold: 0.5,
    minSamples: 10,
    windowMs: 10_000,
    cooldownMs: 10_000,
};

interface Outcome {
    at: number;
    failed: boolean;
}

/**
 * Handed out by canRequest(). Outcomes are reported with it so a
 * request admitted before a transition cannot steer the new state.
 */
export interface Admission {
    readonly generation: number;
    readonly probe: boolean;
}

export class CircuitBreaker {
    private state: CircuitState = 'CLOSED';
    private generation = 0;
    private outcomes: Outcome[] = [];
    private trippedAt = 0;
    private probeInFlight = false;
    private readonly options: CircuitBreakerOptions;
    private readonly now: () => number;

    private stats: {
        totalSuccesses: number;
        totalFailures: number;
        totalRejected: number;
        totalStale: number;
        stateChanges: CircuitTransition[];
    } = { totalSuccesses: 0, totalFailures: 0, totalRejected: 0, totalStale: 0, stateChanges: [] };

    constructor(
        public readonly name: string,
        options: Partial<CircuitBreakerOptions> = {},
        private readonly logger?: Logger,
    ) {
        this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
        this.now = this.options.clock ?? Date.now;
    }

    /**
     * Admit a request, or undefined when it must be short-circuited.
     * In HALF_OPEN only one admission at a time is the probe; its
     * holder must report back through onSuccess, onFailure or
     * onAbandoned.
     */
    canRequest(): Admission | undefined {
        switch (this.state) {
        case 'CLOSED':
            return { generation: this.generation, probe: false };

        case 'TRIPPED':
            if (this.now() - this.trippedAt >= this.options.cooldownMs) {
                this.transitionTo('HALF_OPEN');
                return this.grantProbe();
            }
            this.stats.totalRejected++;
            return undefined;

        case 'HALF_OPEN':
            if (!this.probeInFlight) return this.grantProbe();
            this.stats.totalRejected++;
            return undefined;
        }
    }

    onSuccess(admission: Admission): void {
        this.stats.totalSuccesses++;
        if (this.isStale(admission)) return;

        if (admission.probe) {
            this.probeInFlight = false;
            this.outcomes = [];
            this.transitionTo('CLOSED');
            return;
        }
        this.record(false);
    }

    onFailure(admission: Admission): void {
        this.stats.totalFailures++;
        if (this.isStale(admission)) return;

        if (admission.probe) {
            this.probeInFlight = false;
            this.trip();
            return;
        }

        this.record(true);
        const { samples, failures } = this.window();
        if (
            samples >= this.options.minSamples &&
            failures / samples > this.options.errorRatioThreshold
        ) {
            this.trip();
        }
    }

    /**
     * The request ended without a backend verdict (client went away,
     * pool drained). Frees the probe slot; records nothing.
     */
    onAbandoned(admission: Admission): void {
        if (admission.probe && !this.isStale(admission)) this.probeInFlight = false;
    }

    getState(): CircuitState {
        return this.state;
    }

    getStats() {
        const { samples, failures } = this.window();
        return {
            name: this.name,
            state: this.state,
            samples,
            failures,
            errorRatio: samples === 0 ? 0 : failures / samples,
            totalSuccesses: this.stats.totalSuccesses,
            totalFailures: this.stats.totalFailures,
            totalRejected: this.stats.totalRejected,
            totalStale: this.stats.totalStale,
            stateChanges: this.stats.stateChanges.slice(-10),
        };
    }

    // Every transition and every probe starts a new generation
    private grantProbe(): Admission {
        this.generation++;
        this.probeInFlight = true;
        return { generation: this.generation, probe: true };
    }

    private isStale(admission: Admission): boolean {
        if (admission.generation === this.generation) return false;
        this.stats.totalStale++;
        return true;
    }

    private trip(): void {
        this.trippedAt = this.now();
        this.transitionTo('TRIPPED');
    }

    private record(failed: boolean): void {
        const now = this.now();
        this.outcomes.push({ at: now, failed });
        this.prune(now);
    }

    private prune(now: number): void {
        const cutoff = now - this.options.windowMs;
        let drop = 0;
        while (drop < this.outcomes.length && this.outcomes[drop].at <= cutoff) drop++;
        if (drop > 0) this.outcomes = this.outcomes.slice(drop);
    }

    private window(): { samples: number; failures: number } {
        this.prune(this.now());
        const failures = this.outcomes.filter(o => o.failed).length;
        return { samples: this.outcomes.length, failures };
    }

    private transitionTo(to: CircuitState): void {
        const from = this.state;
        this.state = to;
        this.generation++;

        const transition: CircuitTransition = { from, to, at: new Date(this.now()).toISOString() };
        this.stats.stateChanges.push(transition);
        if (this.stats.stateChanges.length > 50) this.stats.stateChanges.shift();

        this.logger?.warn({ route: this.name, from, to }, `circuit ${from} → ${to}`);
        this.options.onTransition?.(this.name, transition);
    }
}
