// ─── Node Status ──────────────────────────────────────────────────────────────

export enum NodeStatus {
    SUCCESS,
    FAILURE,
    RUNNING,
}

// ─── Node Kind ────────────────────────────────────────────────────────────────

/** Structural tag carried by every node. Engine code dispatches on this
 *  instead of on class identity. */
export enum NodeKind {
    Task,
    Composite,
    Parallel,
    Decorator,
    ConditionalAbort,
}

export function statusName(status: NodeStatus): string {
    return NodeStatus[status];
}
