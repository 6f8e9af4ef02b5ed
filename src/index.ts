/**
 * canopy-bt
 *
 * Behavior tree runtime: order-indexed trees, range-bounded iterators,
 * parallel composites with per-child iterators and observer aborts.
 *
 * @module canopy-bt
 */

// Core
export { NodeStatus, NodeKind, statusName } from './core/node-status';
export { BehaviorNode } from './core/behavior-node';
export { BehaviorIterator, IteratorState } from './core/behavior-iterator';
export { BehaviorTree } from './core/behavior-tree';
export type { BehaviorTreeOptions } from './core/behavior-tree';
export { Blackboard } from './core/blackboard';
export { TreeStructureError } from './core/tree-errors';
export { INVALID_ORDER, isUnderSubtree, isLowerOrder, isHigherOrder } from './core/tree-order';
export type { OrderedNode } from './core/tree-order';
export { Traversal, TreeWalker, traverse } from './core/tree-walker';
export type { Walkable, TraversalState, VisitFn, SkipFn } from './core/tree-walker';

// Composite nodes
export { Composite, isComposite } from './nodes/composite';
export { Sequence } from './nodes/sequence';
export { Selector } from './nodes/selector';
export { Parallel, ParallelPolicy, isParallel } from './nodes/parallel';

// Decorator nodes
export { Decorator, isDecorator } from './nodes/decorator';
export { Inverter } from './nodes/inverter';
export { ConditionalAbort, AbortType, isConditionalAbort } from './nodes/conditional-abort';
export { Guard } from './nodes/guard';
export type { GuardPredicate } from './nodes/guard';

// Leaf nodes
export { Task, Action, Condition } from './nodes/task';

// Builder functions
export {
    sequence,
    selector,
    parallel,
    inverter,
    guard,
    action,
    condition,
    createTree,
} from './nodes/builders';

// Host frame loop
export { TreeRunner } from './runner/tree-runner';
export type { TickSystem } from './runner/tick-system';
export {
    DEFAULT_RUNNER_SETTINGS,
    resolveRunnerSettings,
    parseRunnerSettings,
} from './runner/runner-settings';
export type { RunnerSettings } from './runner/runner-settings';

// Logging
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType } from './utilities/log-manager';
export type { ILogMessage, LogMessageCallback } from './utilities/log-manager';
export { ThrottledLogger } from './utilities/throttled-logger';
