import { describe, it, expect, beforeEach } from 'vitest';
import type { BehaviorTree } from '@/core/behavior-tree';
import { NodeStatus } from '@/core/node-status';
import { action, createTree } from '@/nodes/builders';
import { TreeRunner } from '@/runner/tree-runner';
import { ScriptedTask } from './helpers/test-nodes';
import { LogType } from '@/utilities/log-manager';
import { errors, loggedMessages, resetLogs, warnings } from './helpers/log-capture';

interface Counted {
    tree: BehaviorTree;
    calls: () => number;
}

/** Tree whose single action throws on the updates picked by `fails`. */
function makeTree(name: string, fails: (call: number) => boolean = () => false): Counted {
    let calls = 0;
    const tree = createTree(action(() => {
        calls++;
        if (fails(calls)) throw new Error(`${name} broke`);
        return NodeStatus.RUNNING;
    }), { name });
    return { tree, calls: () => calls };
}

function tickTimes(runner: TreeRunner, times: number): void {
    for (let i = 0; i < times; i++) {
        runner.tick(1 / 60);
    }
}

beforeEach(() => {
    resetLogs();
});

// ─── Registration ─────────────────────────────────────────────────────────────

describe('TreeRunner registration', () => {
    it('starts trees that have not been started', () => {
        const runner = new TreeRunner();
        const { tree } = makeTree('fresh');

        runner.add(tree);

        expect(tree.initialized).toBe(true);
        expect(runner.has(tree)).toBe(true);
        expect(runner.size).toBe(1);
    });

    it('does not restart a started tree', () => {
        const journal: string[] = [];
        const tree = createTree(new ScriptedTask('x', journal, NodeStatus.RUNNING));
        tree.start();
        const runner = new TreeRunner();

        runner.add(tree);

        expect(journal).toEqual(['start:x']);
    });

    it('warns on duplicate registration', () => {
        const runner = new TreeRunner();
        const { tree } = makeTree('twice');

        runner.add(tree);
        runner.add(tree);

        expect(runner.size).toBe(1);
        expect(warnings('TreeRunner')).toEqual(['Tree "twice" already registered, skipping']);
    });

    it('forgets removed trees', () => {
        const runner = new TreeRunner();
        const a = makeTree('a');
        const b = makeTree('b');
        runner.add(a.tree);
        runner.add(b.tree);

        expect(runner.remove(a.tree)).toBe(true);
        expect(runner.remove(a.tree)).toBe(false);
        tickTimes(runner, 2);

        expect(a.calls()).toBe(0);
        expect(b.calls()).toBe(2);

        runner.destroy();
        expect(runner.size).toBe(0);
    });
});

// ─── Ticking ──────────────────────────────────────────────────────────────────

describe('TreeRunner tick', () => {
    it('updates every tree once per tick', () => {
        const runner = new TreeRunner();
        const a = makeTree('a');
        const b = makeTree('b');
        runner.add(a.tree);
        runner.add(b.tree);

        tickTimes(runner, 3);

        expect(a.calls()).toBe(3);
        expect(b.calls()).toBe(3);
    });

    it('does nothing while paused', () => {
        const runner = new TreeRunner({ paused: true });
        const a = makeTree('a');
        runner.add(a.tree);

        tickTimes(runner, 2);
        expect(a.calls()).toBe(0);

        runner.resume();
        tickTimes(runner, 2);
        expect(a.calls()).toBe(2);

        runner.pause();
        tickTimes(runner, 2);
        expect(a.calls()).toBe(2);
    });

    it('keeps updating other trees when one throws', () => {
        const runner = new TreeRunner({}, () => 0);
        const bad = makeTree('bad', () => true);
        const good = makeTree('good');
        runner.add(bad.tree);
        runner.add(good.tree);

        tickTimes(runner, 3);

        expect(bad.calls()).toBe(3);
        expect(good.calls()).toBe(3);
        expect(runner.isDisabled(good.tree)).toBe(false);
    });
});

// ─── Circuit breaker ──────────────────────────────────────────────────────────

describe('TreeRunner circuit breaker', () => {
    it('disables a tree after consecutive failures', () => {
        const runner = new TreeRunner({ circuitBreakerThreshold: 3 }, () => 0);
        const bad = makeTree('bad', () => true);
        runner.add(bad.tree);

        tickTimes(runner, 5);

        expect(bad.calls()).toBe(3);
        expect(runner.isDisabled(bad.tree)).toBe(true);
        expect(errors('TreeRunner/bad')).toEqual([
            'Tree "bad" update failed',
            'Tree "bad" disabled after 3 consecutive failures',
        ]);
    });

    it('resets the failure count after a successful update', () => {
        const runner = new TreeRunner({ circuitBreakerThreshold: 2 }, () => 0);
        const flaky = makeTree('flaky', call => call % 2 === 1);
        runner.add(flaky.tree);

        tickTimes(runner, 6);

        expect(flaky.calls()).toBe(6);
        expect(runner.isDisabled(flaky.tree)).toBe(false);
    });

    it('runs a disabled tree again once re-enabled', () => {
        const runner = new TreeRunner({ circuitBreakerThreshold: 1 }, () => 0);
        const bad = makeTree('bad', call => call === 1);
        runner.add(bad.tree);

        tickTimes(runner, 2);
        expect(runner.isDisabled(bad.tree)).toBe(true);
        expect(bad.calls()).toBe(1);

        runner.enable(bad.tree);
        tickTimes(runner, 2);

        expect(runner.isDisabled(bad.tree)).toBe(false);
        expect(bad.calls()).toBe(3);
        expect(loggedMessages(LogType.Info, 'TreeRunner/bad')).toEqual(['Tree "bad" re-enabled']);
    });

    it('throttles repeated error logs per tree', () => {
        let time = 0;
        const runner = new TreeRunner({}, () => time);
        const bad = makeTree('bad', () => true);
        runner.add(bad.tree);

        runner.tick(0);
        time = 500;
        runner.tick(0);
        time = 1200;
        runner.tick(0);

        expect(errors('TreeRunner/bad')).toEqual([
            'Tree "bad" update failed',
            'Tree "bad" update failed (1 similar suppressed)',
        ]);
    });

    it('falls back to defaults for invalid settings', () => {
        const runner = new TreeRunner({ circuitBreakerThreshold: 0, errorThrottleMs: -5 });

        expect(runner.settings.circuitBreakerThreshold).toBe(100);
        expect(runner.settings.errorThrottleMs).toBe(1000);
        expect(warnings('RunnerSettings')).toEqual([
            'Invalid circuitBreakerThreshold 0, using default',
            'Invalid errorThrottleMs -5, using default',
        ]);
    });
});
