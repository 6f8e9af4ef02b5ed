import { BehaviorNode } from '@/core/behavior-node';
import { NodeKind, NodeStatus } from '@/core/node-status';

// ─── Leaf Nodes ───────────────────────────────────────────────────────────────

export abstract class Task extends BehaviorNode {
    readonly kind: NodeKind = NodeKind.Task;
}

/** Executes a callback that returns an arbitrary NodeStatus. */
export class Action extends Task {
    constructor(public readonly execute: (node: Action) => NodeStatus, name?: string) {
        super(name);
    }

    run(): NodeStatus {
        return this.execute(this);
    }
}

/** Boolean predicate → SUCCESS or FAILURE. */
export class Condition extends Task {
    constructor(public readonly predicate: (node: Condition) => boolean, name?: string) {
        super(name);
    }

    run(): NodeStatus {
        return this.predicate(this) ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
    }
}
