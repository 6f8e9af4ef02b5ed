import type { BehaviorNode } from '@/core/behavior-node';
import { NodeKind } from '@/core/node-status';
import { isLowerOrder, isUnderSubtree } from '@/core/tree-order';
import { Decorator } from './decorator';

export enum AbortType {
    /** Never observed */
    None,
    /** Restarts this node when a lower-priority sibling branch is running and the condition holds */
    LowerPriority,
    /** Restarts this node when its own subtree is running and the condition no longer holds */
    Self,
    Both,
}

/**
 * Decorator that enters its child only while `condition()` holds.
 *
 * With an abort type other than None the tree polls it every frame through
 * isAbortSatisfied(), independent of where its iterator currently is. When
 * satisfied the iterator restarts this node's subtree.
 */
export abstract class ConditionalAbort extends Decorator {
    readonly kind: NodeKind = NodeKind.ConditionalAbort;

    constructor(public abortType: AbortType = AbortType.None, name?: string) {
        super(name);
    }

    abstract condition(): boolean;

    onEnter(): void {
        if (this.condition()) {
            super.onEnter();
        } else {
            this.childExitStatus = null;
        }
    }

    isAbortSatisfied(): boolean {
        const current = this.iterator.currentNode;
        if (current === null) return false;

        if (this.abortsSelf() && this.isActive(current)) {
            return !this.condition();
        }

        if (this.abortsLowerPriority() && this.isLowerPriority(current)) {
            return this.condition();
        }

        return false;
    }

    abortsSelf(): boolean {
        return this.abortType === AbortType.Self || this.abortType === AbortType.Both;
    }

    abortsLowerPriority(): boolean {
        return this.abortType === AbortType.LowerPriority || this.abortType === AbortType.Both;
    }

    /** The iterator is at this node or somewhere below it. */
    private isActive(current: BehaviorNode): boolean {
        return current === this || isUnderSubtree(this, current);
    }

    /** The iterator is in a later branch under the same parent. */
    private isLowerPriority(current: BehaviorNode): boolean {
        return isLowerOrder(current.preOrderIndex, this.preOrderIndex)
            && !isUnderSubtree(this, current)
            && isUnderSubtree(this.parent, current);
    }
}

export function isConditionalAbort(node: BehaviorNode): node is ConditionalAbort {
    return node.kind === NodeKind.ConditionalAbort;
}
