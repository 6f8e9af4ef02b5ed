import type { BehaviorNode } from '@/core/behavior-node';
import { BehaviorTree, type BehaviorTreeOptions } from '@/core/behavior-tree';
import type { NodeStatus } from '@/core/node-status';
import { traverse } from '@/core/tree-walker';
import { AbortType } from './conditional-abort';
import { Guard, type GuardPredicate } from './guard';
import { Inverter } from './inverter';
import { Parallel, ParallelPolicy } from './parallel';
import { Selector } from './selector';
import { Sequence } from './sequence';
import { Action, Condition } from './task';

// ─── Builder Functions (functional API) ───────────────────────────────────────

function withChildren<T extends BehaviorNode>(node: T, children: BehaviorNode[]): T {
    for (const child of children) {
        node.addChild(child);
    }
    return node;
}

export function sequence(...children: BehaviorNode[]): Sequence {
    return withChildren(new Sequence(), children);
}

export function selector(...children: BehaviorNode[]): Selector {
    return withChildren(new Selector(), children);
}

export function parallel(children: BehaviorNode[], policy = ParallelPolicy.RequireAll): Parallel {
    return withChildren(new Parallel(policy), children);
}

export function inverter(child: BehaviorNode): Inverter {
    return withChildren(new Inverter(), [child]);
}

export function guard(predicate: GuardPredicate, child: BehaviorNode, abortType = AbortType.None): Guard {
    return withChildren(new Guard(predicate, abortType), [child]);
}

export function action(callback: (node: Action) => NodeStatus, name?: string): Action {
    return new Action(callback, name);
}

export function condition(predicate: (node: Condition) => boolean, name?: string): Condition {
    return new Condition(predicate, name);
}

/** Register every node reachable from `root` with a new tree and make `root` its root. */
export function createTree(root: BehaviorNode, options: BehaviorTreeOptions = {}): BehaviorTree {
    const tree = new BehaviorTree(options);
    traverse(root, node => {
        tree.addNode(node);
    });
    tree.setRoot(root);
    return tree;
}
