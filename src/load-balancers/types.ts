/**
 * A mutable set of backend targets for one named service.
 *
 * Reconciliation is the only writer; every in-flight request for the
 * service is a reader.
 */
export interface LoadBalancer {
    /** Algorithm name */
    readonly name: string;

    /** Pick the next backend target. Throws NoHealthyBackendError when empty. */
    next(): URL;

    /** Add the target if absent. Returns true when the set changed. */
    upsert(target: URL): boolean;

    /** Remove the target if present. Returns true when the set changed. */
    remove(target: URL): boolean;

    /** Current targets, in selection order */
    servers(): URL[];

    readonly size: number;
}
