import { BehaviorNode } from '@/core/behavior-node';
import { NodeKind, NodeStatus } from '@/core/node-status';

/** Single-child node. By default it enters its child and passes the child's
 *  exit status through; without a child it fails. */
export abstract class Decorator extends BehaviorNode {
    readonly kind: NodeKind = NodeKind.Decorator;

    protected childExitStatus: NodeStatus | null = null;

    maxChildCount(): number {
        return 1;
    }

    get child(): BehaviorNode | null {
        return this.childCount() === 0 ? null : this.getChildAt(0);
    }

    onEnter(): void {
        this.childExitStatus = null;
        const child = this.child;
        if (child !== null) {
            this.iterator.traverse(child);
        }
    }

    onChildExit(_childIndex: number, status: NodeStatus): void {
        this.childExitStatus = status;
    }

    run(): NodeStatus {
        return this.childExitStatus ?? NodeStatus.FAILURE;
    }
}

export function isDecorator(node: BehaviorNode): node is Decorator {
    return node.kind === NodeKind.Decorator || node.kind === NodeKind.ConditionalAbort;
}
