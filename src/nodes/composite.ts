import { BehaviorNode } from '@/core/behavior-node';
import { NodeKind, NodeStatus } from '@/core/node-status';

/**
 * Base for nodes that run their children one at a time, left to right.
 * Subclasses decide after each child exit whether to continue.
 */
export abstract class Composite extends BehaviorNode {
    readonly kind: NodeKind = NodeKind.Composite;

    protected currentChildIndex = 0;
    protected lastChildExitStatus: NodeStatus | null = null;

    /** Status returned when the composite has no children to run */
    protected abstract readonly emptyStatus: NodeStatus;

    /** Whether a child's exit status ends the composite early */
    protected abstract stopsOn(status: NodeStatus): boolean;

    maxChildCount(): number {
        return Number.POSITIVE_INFINITY;
    }

    currentChild(): BehaviorNode | null {
        return this.currentChildIndex < this.childCount() ? this.getChildAt(this.currentChildIndex) : null;
    }

    onEnter(): void {
        this.currentChildIndex = 0;
        this.lastChildExitStatus = null;
        this.traverseCurrentChild();
    }

    run(): NodeStatus {
        return this.lastChildExitStatus ?? this.emptyStatus;
    }

    onChildExit(childIndex: number, status: NodeStatus): void {
        this.lastChildExitStatus = status;
        this.currentChildIndex = this.stopsOn(status) ? this.childCount() : childIndex + 1;
        this.traverseCurrentChild();
    }

    onAbort(child: BehaviorNode): void {
        this.currentChildIndex = child.indexOrder;
    }

    private traverseCurrentChild(): void {
        const next = this.currentChild();
        if (next !== null) {
            this.iterator.traverse(next);
        }
    }
}

export function isComposite(node: BehaviorNode): node is Composite {
    return node.kind === NodeKind.Composite || node.kind === NodeKind.Parallel;
}
