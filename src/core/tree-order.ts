/** Order value of a node that is not connected to the root, or whose orders
 *  have not been computed yet. */
export const INVALID_ORDER = -1;

/** Anything that carries pre/post order indices. */
export interface OrderedNode {
    readonly preOrderIndex: number;
    readonly postOrderIndex: number;
}

/** 0 is the highest priority; greater numbers mean lower priority. */
export function isLowerOrder(orderA: number, orderB: number): boolean {
    return orderA > orderB;
}

export function isHigherOrder(orderA: number, orderB: number): boolean {
    return orderA < orderB;
}

/**
 * True if `node` is a strict descendant of `root`.
 * A null root stands for the space above the tree root and contains everything,
 * which is what `isUnderSubtree(node.parent, other)` needs at the top level.
 */
export function isUnderSubtree(root: OrderedNode | null, node: OrderedNode): boolean {
    if (root === null) {
        return true;
    }

    return root.postOrderIndex > node.postOrderIndex && root.preOrderIndex < node.preOrderIndex;
}
