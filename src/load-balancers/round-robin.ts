import { LoadBalancer } from './types';
import { NoHealthyBackendError } from '../errors';

// =================================================================
// ROUND ROBIN BACKEND POOL
// =================================================================
//
// Rotate through the service's targets in order:
//
//   Request 1 → Target A
//   Request 2 → Target B
//   Request 3 → Target C
//   Request 4 → Target A (wraps around)
//
// Targets live in a frozen snapshot. upsert/remove build a new
// array and swap it in, so next() always indexes into one complete
// set and never sees a half-applied change.
// =================================================================

export class RoundRobinBalancer implements LoadBalancer {
    readonly name = 'round-robin';
    private targets: readonly URL[] = Object.freeze([]);
    private index = 0;

    constructor(private readonly service: string, targets: Iterable<URL> = []) {
        for (const target of targets) this.upsert(target);
    }

    get size(): number {
        return this.targets.length;
    }

    next(): URL {
        const snapshot = this.targets;
        if (snapshot.length === 0) throw new NoHealthyBackendError(this.service);

        const target = snapshot[this.index % snapshot.length];
        this.index = (this.index + 1) % snapshot.length;

        return target;
    }

    upsert(target: URL): boolean {
        if (this.indexOf(target) !== -1) return false;

        this.targets = Object.freeze([...this.targets, new URL(target.href)]);
        return true;
    }

    remove(target: URL): boolean {
        const position = this.indexOf(target);
        if (position === -1) return false;

        this.targets = Object.freeze(this.targets.filter((_, i) => i !== position));

        // Keep the cursor on the target that would have been served next
        if (position < this.index) this.index--;
        if (this.targets.length === 0 || this.index >= this.targets.length) this.index = 0;

        return true;
    }

    servers(): URL[] {
        return this.targets.map(t => new URL(t.href));
    }

    private indexOf(target: URL): number {
        return this.targets.findIndex(t => t.href === target.href);
    }
}
