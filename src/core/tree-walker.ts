/**
 * Generic explicit-stack tree traversal.
 *
 * Works on anything that exposes its children by index, so it serves the
 * behavior tree as well as plain test fixtures. The walker keeps its stacks
 * between calls; depth is bounded by memory, not by the call stack.
 */

export enum Traversal {
    PreOrder,
    PostOrder,
    LevelOrder,
}

export interface Walkable<T> {
    childCount(): number;
    getChildAt(index: number): T;
}

export interface TraversalState {
    /** Depth of the node being visited; the traversal root is level 0 */
    readonly currentLevel: number;
}

export type VisitFn<T> = (node: T, state: TraversalState) => void;

/** Returning true visits the node but does not descend into its children. */
export type SkipFn<T> = (node: T) => boolean;

export class TreeWalker<T extends Walkable<T>> {
    private readonly nodes: T[] = [];
    private readonly levels: number[] = [];
    private readonly nextChild: number[] = [];
    private readonly skipped: boolean[] = [];
    private readonly state = { currentLevel: 0 };
    private walking = false;

    /** True while a traversal is in progress on this walker */
    public get busy(): boolean {
        return this.walking;
    }

    traverse(root: T | null, visit: VisitFn<T>, order = Traversal.PreOrder, skip?: SkipFn<T>): void {
        if (root === null) return;

        this.walking = true;
        try {
            switch (order) {
            case Traversal.PreOrder:
                this.preOrder(root, visit, skip);
                break;
            case Traversal.PostOrder:
                this.postOrder(root, visit, skip);
                break;
            case Traversal.LevelOrder:
                this.levelOrder(root, visit, skip);
                break;
            }
        } finally {
            this.reset();
        }
    }

    private preOrder(root: T, visit: VisitFn<T>, skip?: SkipFn<T>): void {
        this.nodes.push(root);
        this.levels.push(0);

        while (this.nodes.length !== 0) {
            const node = this.pop();
            const level = this.levels.pop() ?? 0;

            this.state.currentLevel = level;
            visit(node, this.state);

            if (skip?.(node)) continue;

            // Reverse push so the left-most child is visited first.
            for (let i = node.childCount() - 1; i >= 0; --i) {
                this.nodes.push(node.getChildAt(i));
                this.levels.push(level + 1);
            }
        }
    }

    private postOrder(root: T, visit: VisitFn<T>, skip?: SkipFn<T>): void {
        this.pushPostOrder(root, 0, skip);

        while (this.nodes.length !== 0) {
            const top = this.nodes.length - 1;
            const node = this.nodes[top];
            const childIndex = this.nextChild[top];

            if (!this.skipped[top] && childIndex < node.childCount()) {
                this.nextChild[top] = childIndex + 1;
                this.pushPostOrder(node.getChildAt(childIndex), this.levels[top] + 1, skip);
                continue;
            }

            this.state.currentLevel = this.levels[top];
            this.nodes.pop();
            this.levels.pop();
            this.nextChild.pop();
            this.skipped.pop();
            visit(node, this.state);
        }
    }

    private pushPostOrder(node: T, level: number, skip?: SkipFn<T>): void {
        this.nodes.push(node);
        this.levels.push(level);
        this.nextChild.push(0);
        this.skipped.push(skip?.(node) ?? false);
    }

    private levelOrder(root: T, visit: VisitFn<T>, skip?: SkipFn<T>): void {
        // The node array doubles as a queue; `head` is the dequeue position.
        this.nodes.push(root);
        this.levels.push(0);

        for (let head = 0; head < this.nodes.length; ++head) {
            const node = this.nodes[head];
            const level = this.levels[head];

            this.state.currentLevel = level;
            visit(node, this.state);

            if (skip?.(node)) continue;

            for (let i = 0; i < node.childCount(); ++i) {
                this.nodes.push(node.getChildAt(i));
                this.levels.push(level + 1);
            }
        }
    }

    private pop(): T {
        const node = this.nodes.pop();
        if (node === undefined) {
            throw new Error('TreeWalker stack underflow');
        }
        return node;
    }

    private reset(): void {
        this.nodes.length = 0;
        this.levels.length = 0;
        this.nextChild.length = 0;
        this.skipped.length = 0;
        this.state.currentLevel = 0;
        this.walking = false;
    }
}

/** One-off traversal. Hot paths should keep a TreeWalker and reuse it. */
export function traverse<T extends Walkable<T>>(
    root: T | null,
    visit: VisitFn<T>,
    order = Traversal.PreOrder,
    skip?: SkipFn<T>,
): void {
    new TreeWalker<T>().traverse(root, visit, order, skip);
}
