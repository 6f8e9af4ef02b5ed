import type { BehaviorTree } from '@/core/behavior-tree';
import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import { resolveRunnerSettings, type RunnerSettings } from './runner-settings';
import type { TickSystem } from './tick-system';

/** Per-tree error tracking */
interface TreeErrorState {
    name: string;
    consecutiveFailures: number;
    disabled: boolean;
    log: LogHandler;
    throttled: ThrottledLogger;
}

/**
 * Updates a set of tree instances once per frame.
 *
 * Each tree is isolated: an exception thrown while updating one tree is
 * logged (throttled per tree) and does not stop the others. A tree that
 * fails `circuitBreakerThreshold` times in a row is disabled.
 */
export class TreeRunner implements TickSystem {
    private static log = new LogHandler('TreeRunner');

    public readonly settings: RunnerSettings;

    private readonly trees = new Map<BehaviorTree, TreeErrorState>();

    constructor(
        settings: Partial<RunnerSettings> = {},
        private readonly now: () => number = () => performance.now(),
    ) {
        this.settings = resolveRunnerSettings(settings);
    }

    get size(): number {
        return this.trees.size;
    }

    /** Register a tree. Trees that have not been started are started here. */
    add(tree: BehaviorTree): void {
        if (this.trees.has(tree)) {
            TreeRunner.log.warn(`Tree "${tree.name}" already registered, skipping`);
            return;
        }

        if (!tree.initialized) {
            tree.start();
        }

        const log = TreeRunner.log.child(tree.name);
        this.trees.set(tree, {
            name: tree.name,
            consecutiveFailures: 0,
            disabled: false,
            log,
            throttled: new ThrottledLogger(log, this.settings.errorThrottleMs, this.now),
        });
    }

    remove(tree: BehaviorTree): boolean {
        return this.trees.delete(tree);
    }

    has(tree: BehaviorTree): boolean {
        return this.trees.has(tree);
    }

    isDisabled(tree: BehaviorTree): boolean {
        return this.trees.get(tree)?.disabled ?? false;
    }

    /** Re-enable a tree disabled by the circuit breaker */
    enable(tree: BehaviorTree): void {
        const state = this.trees.get(tree);
        if (!state) return;
        state.disabled = false;
        state.consecutiveFailures = 0;
        state.throttled.reset();
        state.log.info(`Tree "${state.name}" re-enabled`);
    }

    pause(): void {
        this.settings.paused = true;
    }

    resume(): void {
        this.settings.paused = false;
    }

    tick(_dt: number): void {
        if (this.settings.paused) return;

        for (const [tree, state] of this.trees) {
            // Circuit breaker: skip disabled trees
            if (state.disabled) continue;

            try {
                tree.update();
                state.consecutiveFailures = 0;
            } catch (e) {
                this.handleTreeError(state, e);
            }
        }
    }

    destroy(): void {
        this.trees.clear();
    }

    private handleTreeError(state: TreeErrorState, error: unknown): void {
        state.consecutiveFailures++;

        if (state.consecutiveFailures >= this.settings.circuitBreakerThreshold) {
            state.disabled = true;
            state.log.error(
                `Tree "${state.name}" disabled after ${state.consecutiveFailures} consecutive failures`
            );
            return;
        }

        const err = error instanceof Error ? error : new Error(String(error));
        state.throttled.error(`Tree "${state.name}" update failed`, err);
    }
}
