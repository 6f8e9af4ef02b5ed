import { BehaviorIterator } from './behavior-iterator';
import type { BehaviorNode } from './behavior-node';
import type { Blackboard } from './blackboard';
import type { NodeStatus } from './node-status';
import { TreeStructureError } from './tree-errors';
import { INVALID_ORDER, isHigherOrder, isLowerOrder, isUnderSubtree } from './tree-order';
import { Traversal, TreeWalker, type SkipFn, type VisitFn } from './tree-walker';
import { isConditionalAbort, AbortType, type ConditionalAbort } from '@/nodes/conditional-abort';
import { isParallel, type Parallel } from '@/nodes/parallel';
import { LogHandler } from '@/utilities/log-handler';

export interface BehaviorTreeOptions {
    name?: string;
    blackboard?: Blackboard | null;
}

/**
 * Owns the nodes of one tree instance and drives them once per frame.
 *
 * Lifecycle:
 *   const tree = new BehaviorTree();
 *   tree.addNode(...); tree.setRoot(root);
 *   tree.start();            // preprocess, onStart, enter root
 *   tree.update();           // once per frame
 *
 * Preprocessing (start() or preprocess()) computes the order indices, sorts
 * the registry so that `allNodes[i].preOrderIndex === i`, rebuilds the
 * observer and tree-tick caches and hands every node its iterator. Structural
 * changes take effect at the next start(). Preprocessing or removing a node
 * stops a started tree: its active path is interrupted and start() must be
 * called again.
 */
export class BehaviorTree {
    private static log = new LogHandler('BehaviorTree');

    public name: string;

    private mainIterator: BehaviorIterator | null = null;

    /** Conditional aborts with an abort type, in pre-order */
    private observerAborts: ConditionalAbort[] = [];

    private parallelNodes: Parallel[] = [];

    /** Nodes that are allowed to update on tree tick */
    private treeTickNodes: BehaviorNode[] = [];

    private _root: BehaviorNode | null = null;
    private _blackboard: Blackboard | null;
    private nodes: BehaviorNode[] = [];
    private connectedCount = 0;
    private _height = 0;
    private isTreeInitialized = false;

    private readonly walker = new TreeWalker<BehaviorNode>();

    constructor(options: BehaviorTreeOptions = {}) {
        this.name = options.name ?? 'BehaviorTree';
        this._blackboard = options.blackboard ?? null;
    }

    // ─── Structure ────────────────────────────────────────────────────────────

    get root(): BehaviorNode | null {
        return this._root;
    }

    /**
     * Set the tree root. A started tree is stopped; start() must be called
     * again afterwards. A null node or a node that already has a parent is
     * rejected.
     */
    setRoot(node: BehaviorNode | null): void {
        if (node === null) {
            BehaviorTree.log.warn('Cannot initialize with null node');
            return;
        }
        if (node.parent !== null) {
            BehaviorTree.log.warn('Cannot set parented node as tree root.');
            return;
        }
        if (node.tree !== null && node.tree !== this) {
            BehaviorTree.log.warn(`Cannot set ${node.name} as root: it belongs to tree "${node.tree.name}"`);
            return;
        }

        this.stop();
        this.addNode(node);
        this._root = node;
    }

    get blackboard(): Blackboard | null {
        return this._blackboard;
    }

    setBlackboard(blackboard: Blackboard | null): void {
        this._blackboard = blackboard;
    }

    get allNodes(): readonly BehaviorNode[] {
        return this.nodes;
    }

    /** Depth of the deepest node, 0 for a single-node tree */
    get height(): number {
        return this._height;
    }

    get initialized(): boolean {
        return this.isTreeInitialized;
    }

    /** Register a node with this tree. Nodes owned by another tree are refused. */
    addNode<T extends BehaviorNode>(node: T): T {
        if (node.tree === this) return node;

        if (node.tree !== null) {
            BehaviorTree.log.warn(`Cannot add ${node.name}: it belongs to tree "${node.tree.name}"`);
            return node;
        }

        node.bindTree(this);
        this.nodes.push(node);
        return node;
    }

    /**
     * Detach a node from its parent and children and drop it from the registry.
     * A running tree is stopped first, since the registry order changes.
     */
    removeNode(node: BehaviorNode): boolean {
        const index = this.nodes.indexOf(node);
        if (index === -1) return false;

        this.stop();
        node.parent?.removeChild(node);
        node.clearChildren();
        node.clearTree();
        this.nodes.splice(index, 1);

        if (node === this._root) {
            this._root = null;
        }
        return true;
    }

    /**
     * Clear tree structure references: root, node tree back-references,
     * parent/child links and the registry.
     */
    clearStructure(): void {
        for (const node of this.nodes) {
            node.clearChildren();
            node.clearTree();
        }

        this.nodes = [];
        this._root = null;
        this.mainIterator = null;
        this.observerAborts = [];
        this.parallelNodes = [];
        this.treeTickNodes = [];
        this.connectedCount = 0;
        this._height = 0;
        this.isTreeInitialized = false;
    }

    // ─── Execution ────────────────────────────────────────────────────────────

    /** Preprocess and start the tree. */
    start(): void {
        const root = this._root;
        if (root === null) {
            BehaviorTree.log.warn('Cannot start tree with a null root.');
            return;
        }

        this.preprocess();

        for (const node of this.nodes) {
            node.onStart();
        }

        this.requireMainIterator().traverse(root);
        this.isTreeInitialized = true;
    }

    /** One frame: tree-tick hooks, then observers, then one main iterator step. */
    update(): void {
        const itr = this.mainIterator;
        if (!this.isTreeInitialized || itr === null || !itr.isRunning) return;

        if (this.treeTickNodes.length !== 0) {
            this.nodeTreeTick();
        }

        if (this.observerAborts.length !== 0) {
            this.tickObservers();
        }

        itr.update();
    }

    /**
     * Compute orders, rebuild the main iterator and the observer, tree-tick
     * and parallel caches, and reassign iterators.
     */
    preprocess(): void {
        if (this._root === null) {
            BehaviorTree.log.warn('The tree must have a valid root in order to be pre-processed');
            return;
        }

        // The old iterator indexes the registry as it was sorted last time.
        this.stop();
        this.sortNodes();

        this.mainIterator = new BehaviorIterator(this, 0, this.connectedCount);

        this.cacheObservers();
        this.cacheTreeTickNodes();
        this.syncIterators();

        BehaviorTree.log.debug(
            `Preprocessed "${this.name}": ${this.connectedCount} nodes, height ${this._height}, ` +
                `${this.observerAborts.length} observers, ${this.parallelNodes.length} parallel nodes`
        );
    }

    /**
     * Interrupt the subtree at `subroot` and every running parallel iterator below it.
     * `fullInterrupt` reports the subtree as failed instead of re-entering it.
     */
    interrupt(subroot: BehaviorNode, fullInterrupt = false): void {
        if (subroot.tree !== this) {
            BehaviorTree.log.warn(`Cannot interrupt ${subroot.name}: it does not belong to tree "${this.name}"`);
            return;
        }

        subroot.iterator.stepBackInterrupt(subroot, fullInterrupt);

        // Parallel nodes are few, so a linear scan is enough.
        for (const p of this.parallelNodes) {
            if (!isUnderSubtree(subroot, p)) continue;

            for (let itrIndex = 0; itrIndex < p.childCount(); ++itrIndex) {
                const itr = p.getIterator(itrIndex);
                if (!itr.isRunning) continue;

                // Stepping back to the parallel node, which is outside the
                // child iterator's range, unwinds that iterator completely.
                const firstNode = this.getNode(itr.firstInTraversal);
                if (firstNode.parent !== null) {
                    itr.stepBackInterrupt(firstNode.parent, fullInterrupt);
                }
            }
        }
    }

    /**
     * Poll every observer. Observers run in pre-order, so when several are
     * satisfied the left-most one redirects the iterator first and the others
     * are evaluated against the new position.
     */
    tickObservers(): void {
        for (const node of this.observerAborts) {
            // Aborts can only occur under actively running subtrees.
            if (!node.iterator.isRunning) continue;

            if (node.isAbortSatisfied()) {
                BehaviorTree.log.debug(`Abort fired by ${node.name} (${node.preOrderIndex})`);
                node.iterator.onAbort(node);
            }
        }
    }

    isRunning(): boolean {
        return this.mainIterator !== null && this.mainIterator.isRunning;
    }

    lastStatus(): NodeStatus | null {
        return this.mainIterator?.lastStatusReturned ?? null;
    }

    get iterator(): BehaviorIterator | null {
        return this.mainIterator;
    }

    // ─── Orders ───────────────────────────────────────────────────────────────

    /** Compute pre-order, post-order and level-order of every connected node. */
    computeOrders(): void {
        this.resetOrderIndices();
        this.connectedCount = 0;
        this._height = 0;

        const root = this._root;
        if (root === null) return;

        let orderCounter = 0;
        this.walk(root, node => {
            this.adopt(node);
            node.preOrderIndex = orderCounter++;
        });
        this.connectedCount = orderCounter;

        orderCounter = 0;
        this.walk(root, node => {
            node.postOrderIndex = orderCounter++;
        }, Traversal.PostOrder);

        this.walk(root, (node, state) => {
            node.levelOrder = state.currentLevel;
            this._height = Math.max(this._height, state.currentLevel);
        }, Traversal.LevelOrder);
    }

    /** Recompute orders and sort the registry by pre-order, dangling nodes last. */
    sortNodes(): void {
        this.computeOrders();

        const isDangling = (node: BehaviorNode): number => (node.preOrderIndex === INVALID_ORDER ? 1 : 0);
        this.nodes = [...this.nodes].sort(
            (a, b) => isDangling(a) - isDangling(b) || a.preOrderIndex - b.preOrderIndex
        );
    }

    resetOrderIndices(): void {
        for (const node of this.nodes) {
            node.preOrderIndex = INVALID_ORDER;
            node.postOrderIndex = INVALID_ORDER;
            node.levelOrder = INVALID_ORDER;
        }
    }

    /** Node at a pre-order index. Only valid after the registry has been sorted. */
    getNode(preOrderIndex: number): BehaviorNode {
        const node = preOrderIndex < this.connectedCount ? this.nodes[preOrderIndex] : undefined;
        if (node === undefined) {
            throw new TreeStructureError(
                `No node at pre-order index ${preOrderIndex} in tree "${this.name}" (${this.connectedCount} connected)`
            );
        }
        return node;
    }

    getNodesOfType<T extends BehaviorNode>(guard: (node: BehaviorNode) => node is T): T[] {
        return this.nodes.filter(guard);
    }

    static isUnderSubtree = isUnderSubtree;
    static isLowerOrder = isLowerOrder;
    static isHigherOrder = isHigherOrder;

    /** The node in an instantiated tree that corresponds to `original` in its template. */
    static getInstanceVersion(tree: BehaviorTree, original: BehaviorNode): BehaviorNode {
        return tree.getNode(original.preOrderIndex);
    }

    // ─── Instancing ───────────────────────────────────────────────────────────

    /**
     * Deep copy a template into an independent, unstarted runtime tree.
     * Only nodes reachable from the template root are copied, and they land
     * in the clone's registry in pre-order, so the pre-order index is the
     * correspondence key between the two trees.
     */
    static clone(template: BehaviorTree): BehaviorTree {
        const cloneBt = new BehaviorTree({
            name: template.name,
            blackboard: template._blackboard?.clone() ?? null,
        });

        const root = template._root;
        if (root === null) {
            BehaviorTree.log.warn(`Cloning tree "${template.name}" without a root`);
            return cloneBt;
        }

        template.computeOrders();

        const originals: BehaviorNode[] = [];
        template.walk(root, originalNode => {
            const nodeCopy = originalNode.instantiate();
            nodeCopy.bindTree(cloneBt);
            cloneBt.nodes.push(nodeCopy);
            originals.push(originalNode);

            if (originalNode === root) {
                cloneBt._root = nodeCopy;
            }
        });
        cloneBt.connectedCount = cloneBt.nodes.length;

        // Relink parent/child associations; children are visited in order,
        // so appending reproduces each child list.
        originals.forEach((originalNode, i) => {
            const originalParent = originalNode.parent;
            if (originalParent !== null) {
                BehaviorTree.getInstanceVersion(cloneBt, originalParent).forceAddChild(cloneBt.getNode(i));
            }
        });

        for (const node of cloneBt.nodes) {
            node.onCopy();
        }

        return cloneBt;
    }

    // ─── Internals ────────────────────────────────────────────────────────────

    /** Interrupt the main iterator's active path and require a new start(). */
    private stop(): void {
        const itr = this.mainIterator;
        if (itr !== null && itr.isRunning) {
            BehaviorTree.log.debug(`Stopping "${this.name}" at ${itr.currentNode?.name ?? 'no node'}`);
            itr.interruptAll();
        }
        this.isTreeInitialized = false;
    }

    private requireMainIterator(): BehaviorIterator {
        if (this.mainIterator === null) {
            throw new TreeStructureError(`Tree "${this.name}" has not been preprocessed`);
        }
        return this.mainIterator;
    }

    private walk(
        root: BehaviorNode,
        visit: VisitFn<BehaviorNode>,
        order = Traversal.PreOrder,
        skip?: SkipFn<BehaviorNode>,
    ): void {
        const walker = this.walker.busy ? new TreeWalker<BehaviorNode>() : this.walker;
        walker.traverse(root, visit, order, skip);
    }

    /** Register a reachable node that was never added; refuse one owned elsewhere. */
    private adopt(node: BehaviorNode): void {
        if (node.tree === this) return;
        if (node.tree !== null) {
            throw new TreeStructureError(
                `${node.name} is reachable from the root of "${this.name}" but belongs to "${node.tree.name}"`
            );
        }
        this.addNode(node);
    }

    private cacheObservers(): void {
        this.observerAborts = this.getNodesOfType(isConditionalAbort)
            .filter(node => node.abortType !== AbortType.None && node.preOrderIndex !== INVALID_ORDER);
    }

    private cacheTreeTickNodes(): void {
        this.treeTickNodes = this.nodes.filter(
            node => node.preOrderIndex !== INVALID_ORDER && node.canTickOnTree()
        );
    }

    private syncIterators(): void {
        this.syncParallelIterators();

        for (const node of this.nodes) {
            node.assignIterator(null);
        }

        let itr = this.requireMainIterator();
        const parallelRoots: Parallel[] = [];

        // The parallel node keeps its parent's iterator; each of its children
        // subtrees gets the sub-iterator for that child.
        const skipAndAssign = (node: BehaviorNode): boolean => {
            node.assignIterator(itr);

            if (isParallel(node)) {
                parallelRoots.push(node);
                return true;
            }
            return false;
        };

        const noop = (): void => {};
        const root = this._root;
        if (root === null) return;

        this.walk(root, noop, Traversal.PreOrder, skipAndAssign);

        let parallel = parallelRoots.pop();
        while (parallel !== undefined) {
            for (let i = 0; i < parallel.childCount(); ++i) {
                itr = parallel.getIterator(i);
                this.walk(parallel.getChildAt(i), noop, Traversal.PreOrder, skipAndAssign);
            }
            parallel = parallelRoots.pop();
        }
    }

    private syncParallelIterators(): void {
        this.parallelNodes = this.getNodesOfType(isParallel)
            .filter(node => node.preOrderIndex !== INVALID_ORDER);

        for (const p of this.parallelNodes) {
            p.syncSubIterators();
        }
    }

    private nodeTreeTick(): void {
        for (const node of this.treeTickNodes) {
            node.onTreeTick();
        }
    }
}
