import { BehaviorIterator } from '@/core/behavior-iterator';
import type { BehaviorNode } from '@/core/behavior-node';
import { NodeKind, NodeStatus } from '@/core/node-status';
import { TreeStructureError } from '@/core/tree-errors';
import { traverse } from '@/core/tree-walker';
import { Composite } from './composite';

export enum ParallelPolicy {
    /** Succeeds when ALL children succeed, fails on the first failure */
    RequireAll,
    /** Succeeds on the first success, fails when ALL children fail */
    RequireOne,
}

/**
 * Runs all children within the same tick. Every child subtree has its own
 * iterator covering exactly that subtree's pre-order range; one run() of the
 * parallel node steps each running child iterator once, in child order.
 * Returns RUNNING while any child runs and the policy is not yet decided.
 * Children still running when the parallel node exits are interrupted.
 */
export class Parallel extends Composite {
    readonly kind: NodeKind = NodeKind.Parallel;

    protected readonly emptyStatus: NodeStatus;

    private subIterators: BehaviorIterator[] = [];

    constructor(public readonly policy: ParallelPolicy = ParallelPolicy.RequireAll, name?: string) {
        super(name);
        this.emptyStatus = policy === ParallelPolicy.RequireAll ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
    }

    /** Recreate one iterator per child. Called by the tree on every preprocess. */
    syncSubIterators(): void {
        const tree = this.tree;
        if (tree === null) {
            throw new TreeStructureError(`${this.name} must belong to a tree to sync its iterators`);
        }

        this.subIterators = this.children.map(child => {
            let subtreeSize = 0;
            traverse<BehaviorNode>(child, () => {
                subtreeSize++;
            });
            return new BehaviorIterator(tree, child.preOrderIndex, child.preOrderIndex + subtreeSize);
        });
    }

    getIterator(childIndex: number): BehaviorIterator {
        const itr = this.subIterators[childIndex];
        if (itr === undefined) {
            throw new TreeStructureError(`${this.name} has no iterator for child ${childIndex}`);
        }
        return itr;
    }

    get iteratorCount(): number {
        return this.subIterators.length;
    }

    onEnter(): void {
        this.subIterators.forEach((itr, i) => {
            itr.traverse(this.getChildAt(i));
        });
    }

    run(): NodeStatus {
        if (this.subIterators.length === 0) return this.emptyStatus;

        let successCount = 0;
        let failureCount = 0;
        let hasRunning = false;

        for (const itr of this.subIterators) {
            if (itr.isRunning) {
                itr.update();
            }

            if (itr.isRunning) {
                hasRunning = true;
                continue;
            }

            switch (itr.lastStatusReturned) {
            case NodeStatus.SUCCESS:
                successCount++;
                break;
            case NodeStatus.FAILURE:
                failureCount++;
                break;
            }
        }

        if (this.policy === ParallelPolicy.RequireAll) {
            if (failureCount > 0) return NodeStatus.FAILURE;
            if (hasRunning) return NodeStatus.RUNNING;
            return NodeStatus.SUCCESS;
        } else {
            if (successCount > 0) return NodeStatus.SUCCESS;
            if (hasRunning) return NodeStatus.RUNNING;
            return NodeStatus.FAILURE;
        }
    }

    /** Children run on their own iterators and never report back here. */
    protected stopsOn(_status: NodeStatus): boolean {
        return false;
    }

    /** Children run side by side; there is no current child to move. */
    onAbort(_child: BehaviorNode): void {}

    onExit(): void {
        for (const itr of this.subIterators) {
            if (itr.isRunning) {
                itr.stepBackInterrupt(this, true);
            }
        }
    }

    /** Iterators copied from a template belong to the template's tree. */
    onCopy(): void {
        this.subIterators = [];
    }
}

export function isParallel(node: BehaviorNode): node is Parallel {
    return node.kind === NodeKind.Parallel;
}
