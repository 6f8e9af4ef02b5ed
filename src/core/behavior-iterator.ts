import type { BehaviorTree } from './behavior-tree';
import type { BehaviorNode } from './behavior-node';
import { NodeStatus } from './node-status';
import { INVALID_ORDER } from './tree-order';
import { TreeStructureError } from './tree-errors';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('BehaviorIterator');

export enum IteratorState {
    /** Never traversed */
    Idle,
    Running,
    /** Range exhausted or torn down; lastStatusReturned holds the outcome */
    Halted,
}

/**
 * One thread of control over a contiguous pre-order range `[first, last)`.
 *
 * The traversal stack holds the pre-order indices of the active path; its top
 * is the current node. Nodes pushed by traverse() are entered lazily at the
 * start of the next update(), so a composite entering its first child
 * cascades down to a leaf within a single step.
 */
export class BehaviorIterator {
    private readonly traversal: number[] = [];
    private readonly requestedTraversals: number[] = [];
    private _state = IteratorState.Idle;
    private _lastStatus: NodeStatus | null = null;

    constructor(
        private readonly tree: BehaviorTree,
        private readonly first: number,
        private readonly last: number,
    ) {}

    get state(): IteratorState {
        return this._state;
    }

    get isRunning(): boolean {
        return this._state === IteratorState.Running;
    }

    /** Status of the most recent run(), null before anything ran */
    get lastStatusReturned(): NodeStatus | null {
        return this._lastStatus;
    }

    get currentIndex(): number {
        return this.traversal.length === 0 ? INVALID_ORDER : this.traversal[this.traversal.length - 1];
    }

    get currentNode(): BehaviorNode | null {
        const index = this.currentIndex;
        return index === INVALID_ORDER ? null : this.tree.getNode(index);
    }

    /** Pre-order index of the first node in this iterator's range */
    get firstInTraversal(): number {
        return this.first;
    }

    /** Exclusive end of this iterator's range */
    get lastInTraversal(): number {
        return this.last;
    }

    get traversalDepth(): number {
        return this.traversal.length;
    }

    owns(preOrderIndex: number): boolean {
        return preOrderIndex >= this.first && preOrderIndex < this.last;
    }

    isActive(node: BehaviorNode): boolean {
        return this.traversal.includes(node.preOrderIndex);
    }

    /** Push a node onto the active path; it is entered on the next update(). */
    traverse(next: BehaviorNode): void {
        const index = next.preOrderIndex;
        if (!this.owns(index)) {
            throw new TreeStructureError(
                `${next.name} (${index}) is outside iterator range [${this.first}, ${this.last})`
            );
        }

        this.traversal.push(index);
        this.requestedTraversals.push(index);
        this._state = IteratorState.Running;
    }

    /** Evaluate exactly one node: the current one, after entering any queued nodes. */
    update(): void {
        this.callOnEnterOnQueuedNodes();

        const index = this.currentIndex;
        if (index === INVALID_ORDER) return;

        const node = this.tree.getNode(index);
        const status = node.run();
        this._lastStatus = status;

        // run() may have interrupted this iterator; only pop what is still on top.
        if (status !== NodeStatus.RUNNING && this.currentIndex === index) {
            this.traversal.pop();
            node.onExit();
            this.onChildExit(node, status);
        }
    }

    /**
     * Unwind to `subroot`, notifying every bypassed node.
     *
     * If `subroot` is not on the active path the whole path is unwound and the
     * iterator halts; passing a parallel node to one of its child iterators
     * tears that iterator down. Otherwise `subroot` is popped as well and then
     * either re-entered (`fullInterrupt = false`) or reported to its parent as
     * a failure (`fullInterrupt = true`).
     */
    stepBackInterrupt(subroot: BehaviorNode, fullInterrupt = false): void {
        if (!this.isRunning) return;

        const target = subroot.preOrderIndex;
        const pending = this.takePendingTraversals();

        while (this.traversal.length !== 0 && this.currentIndex !== target) {
            this.popInterrupted(pending);
        }

        if (this.traversal.length === 0) {
            this.halt(NodeStatus.FAILURE);
            return;
        }

        this.popInterrupted(pending);

        if (!fullInterrupt) {
            this.traverse(subroot);
            return;
        }

        if (this.traversal.length === 0) {
            this.halt(NodeStatus.FAILURE);
            return;
        }

        this._lastStatus = NodeStatus.FAILURE;
        this.onChildExit(subroot, NodeStatus.FAILURE);
    }

    /** Unwind the whole active path, notifying entered nodes, and halt with FAILURE. */
    interruptAll(): void {
        if (!this.isRunning) return;

        const pending = this.takePendingTraversals();
        while (this.traversal.length !== 0) {
            this.popInterrupted(pending);
        }
        this.halt(NodeStatus.FAILURE);
    }

    /**
     * Restart the subtree of a conditional abort that fired.
     * Inside its own subtree this is a self abort; from a lower-priority branch
     * the iterator unwinds to the aborter's parent and jumps to the aborter.
     */
    onAbort(aborter: BehaviorNode): void {
        if (!this.isRunning) return;

        if (this.isActive(aborter)) {
            this.stepBackInterrupt(aborter, false);
            return;
        }

        const parent = aborter.parent;
        if (parent === null || !this.isActive(parent)) {
            log.warn(`Abort from ${aborter.name} ignored: its parent is not on the active path`);
            return;
        }

        const pending = this.takePendingTraversals();
        while (this.currentIndex !== parent.preOrderIndex) {
            this.popInterrupted(pending);
        }

        parent.onAbort(aborter);
        this.traverse(aborter);
    }

    private callOnEnterOnQueuedNodes(): void {
        // onEnter may traverse further, which appends to the queue.
        let index = this.requestedTraversals.shift();
        while (index !== undefined) {
            this.tree.getNode(index).onEnter();
            index = this.requestedTraversals.shift();
        }
    }

    private onChildExit(node: BehaviorNode, status: NodeStatus): void {
        if (this.traversal.length === 0) {
            this._state = IteratorState.Halted;
            return;
        }

        const parent = node.parent;
        if (parent !== null && this.currentIndex === parent.preOrderIndex) {
            parent.onChildExit(node.indexOrder, status);
        }
    }

    /** Clears the enter queue; the returned nodes were pushed but never entered. */
    private takePendingTraversals(): Set<number> {
        const pending = new Set(this.requestedTraversals);
        this.requestedTraversals.length = 0;
        return pending;
    }

    private popInterrupted(pending: Set<number>): void {
        const index = this.traversal.pop();
        if (index === undefined || pending.has(index)) return;

        const node = this.tree.getNode(index);
        node.onInterrupt();
        node.onExit();
    }

    private halt(status: NodeStatus): void {
        this.traversal.length = 0;
        this.requestedTraversals.length = 0;
        this._lastStatus = status;
        this._state = IteratorState.Halted;
    }
}
