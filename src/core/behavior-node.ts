import type { BehaviorTree } from './behavior-tree';
import type { BehaviorIterator } from './behavior-iterator';
import type { Blackboard } from './blackboard';
import type { Walkable } from './tree-walker';
import { NodeKind, NodeStatus } from './node-status';
import { INVALID_ORDER } from './tree-order';
import { TreeStructureError } from './tree-errors';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('BehaviorNode');

// ─── Abstract Base ────────────────────────────────────────────────────────────

/**
 * Structural unit of a behavior tree.
 *
 * A node is owned by exactly one tree. Parent, tree and iterator are
 * back-references; the tree's registry is the only owner. Order indices are
 * written by the tree during preprocessing and are only meaningful until the
 * next structural change.
 */
export abstract class BehaviorNode implements Walkable<BehaviorNode> {
    abstract readonly kind: NodeKind;

    /** Label used in logs and debugging output */
    public name: string;

    public preOrderIndex = INVALID_ORDER;
    public postOrderIndex = INVALID_ORDER;
    public levelOrder = INVALID_ORDER;

    /** Position of this node in its parent's child list */
    public indexOrder = 0;

    private _parent: BehaviorNode | null = null;
    private _children: BehaviorNode[] = [];
    private _tree: BehaviorTree | null = null;
    private _iterator: BehaviorIterator | null = null;

    constructor(name?: string) {
        this.name = name ?? this.constructor.name;
    }

    // ─── Lifecycle hooks ──────────────────────────────────────────────────────

    /** Called once for every registered node when the tree starts. */
    onStart(): void {}

    /** Called when an iterator enters this node, before its first run(). */
    onEnter(): void {}

    /** One step of evaluation. RUNNING keeps the iterator parked here. */
    abstract run(): NodeStatus;

    /** Called when the node is popped, whether it finished or was interrupted. */
    onExit(): void {}

    /** Called right before onExit() when the node is popped by an interrupt. */
    onInterrupt(): void {}

    onChildExit(_childIndex: number, _status: NodeStatus): void {}

    /** A conditional-abort child is restarting from a lower-priority branch. */
    onAbort(_child: BehaviorNode): void {}

    /** Evaluated once per preprocess; true means onTreeTick() runs every update. */
    canTickOnTree(): boolean {
        return false;
    }

    onTreeTick(): void {}

    /** Called on a freshly cloned node, after the clone tree has been relinked. */
    onCopy(): void {}

    // ─── Structure ────────────────────────────────────────────────────────────

    maxChildCount(): number {
        return 0;
    }

    get parent(): BehaviorNode | null {
        return this._parent;
    }

    get children(): readonly BehaviorNode[] {
        return this._children;
    }

    get tree(): BehaviorTree | null {
        return this._tree;
    }

    get blackboard(): Blackboard | null {
        return this._tree?.blackboard ?? null;
    }

    childCount(): number {
        return this._children.length;
    }

    getChildAt(index: number): BehaviorNode {
        const child = this._children[index];
        if (child === undefined) {
            throw new TreeStructureError(`${this.name} has no child at index ${index}`);
        }
        return child;
    }

    /** Append a child. Logs and refuses when the node is full or the child is already parented. */
    addChild(child: BehaviorNode): boolean {
        if (child === this) {
            log.warn(`Cannot add ${this.name} as its own child`);
            return false;
        }
        if (child._parent !== null) {
            log.warn(`Cannot add ${child.name} to ${this.name}: it already has a parent`);
            return false;
        }
        if (this.hasAncestor(child)) {
            log.warn(`Cannot add ${child.name} to ${this.name}: it is an ancestor of ${this.name}`);
            return false;
        }
        if (this._children.length >= this.maxChildCount()) {
            log.warn(`Cannot add ${child.name} to ${this.name}: at most ${this.maxChildCount()} children allowed`);
            return false;
        }

        this.forceAddChild(child);
        return true;
    }

    private hasAncestor(node: BehaviorNode): boolean {
        for (let p = this._parent; p !== null; p = p._parent) {
            if (p === node) return true;
        }
        return false;
    }

    /** Append without capacity checks. Used when relinking cloned trees. */
    forceAddChild(child: BehaviorNode): void {
        child._parent = this;
        child.indexOrder = this._children.length;
        this._children.push(child);
    }

    removeChild(child: BehaviorNode): boolean {
        const index = this._children.indexOf(child);
        if (index === -1) return false;

        this._children.splice(index, 1);
        child._parent = null;
        child.indexOrder = 0;
        this.reindexChildren();
        return true;
    }

    clearChildren(): void {
        for (const child of this._children) {
            child._parent = null;
            child.indexOrder = 0;
        }
        this._children = [];
    }

    private reindexChildren(): void {
        this._children.forEach((child, i) => {
            child.indexOrder = i;
        });
    }

    // ─── Tree bookkeeping ─────────────────────────────────────────────────────

    /** The iterator that runs this node. Assigned during preprocessing. */
    get iterator(): BehaviorIterator {
        if (this._iterator === null) {
            throw new TreeStructureError(`${this.name} has no iterator; start or preprocess the tree first`);
        }
        return this._iterator;
    }

    get hasIterator(): boolean {
        return this._iterator !== null;
    }

    assignIterator(iterator: BehaviorIterator | null): void {
        this._iterator = iterator;
    }

    bindTree(tree: BehaviorTree | null): void {
        this._tree = tree;
    }

    clearTree(): void {
        this._tree = null;
        this._iterator = null;
    }

    /**
     * Shallow copy with the same prototype and configuration but no structure:
     * no parent, children, tree or iterator.
     */
    instantiate(): this {
        const copy: this = Object.create(Object.getPrototypeOf(this));
        Object.assign(copy, this);
        copy._parent = null;
        copy._children = [];
        copy._tree = null;
        copy._iterator = null;
        return copy;
    }
}
