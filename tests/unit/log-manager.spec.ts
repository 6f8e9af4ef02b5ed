import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { LogManager, LogType, cleanStackTrace, type ILogMessage } from '@/utilities/log-manager';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import { errors, resetLogs, warnings } from './helpers/log-capture';

function message(msg: string, type = LogType.Info): ILogMessage {
    return { type, source: 'test', msg };
}

// ─── LogManager ───────────────────────────────────────────────────────────────

describe('LogManager', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('numbers messages and keeps the last 100', () => {
        const manager = new LogManager();
        manager.consoleOutput = false;

        for (let i = 0; i < 105; i++) {
            manager.push(message(`m${i}`));
        }

        expect(manager.log).toHaveLength(100);
        expect(manager.log[0].msg).toBe('m5');
        expect(manager.log[0].index).toBe(5);
        expect(manager.log[99].index).toBe(104);
    });

    it('replays history to a new listener and forwards new messages', () => {
        const manager = new LogManager();
        manager.consoleOutput = false;
        manager.push(message('before'));

        const received: string[] = [];
        manager.onLogMessage(m => received.push(m.msg));
        manager.push(message('after'));

        expect(received).toEqual(['before', 'after']);
    });

    it('routes each level to the matching console method', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const manager = new LogManager();

        manager.push(message('e', LogType.Error));
        manager.push(message('w', LogType.Warn));

        expect(error).toHaveBeenCalledWith('test\te');
        expect(warn).toHaveBeenCalledWith('test\tw');
    });

    it('throttles identical console messages but keeps them in history', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const manager = new LogManager();

        manager.push(message('same', LogType.Warn));
        manager.push(message('same', LogType.Warn));
        manager.push(message('other', LogType.Warn));

        expect(warn).toHaveBeenCalledTimes(2);
        expect(manager.log).toHaveLength(3);
    });

    it('writes nothing to the console when console output is off', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const manager = new LogManager();
        manager.consoleOutput = false;

        manager.push(message('quiet'));

        expect(info).not.toHaveBeenCalled();
        expect(manager.log).toHaveLength(1);
    });

    it('clears history', () => {
        const manager = new LogManager();
        manager.consoleOutput = false;
        manager.push(message('x'));

        manager.clear();

        expect(manager.log).toEqual([]);
    });
});

describe('cleanStackTrace', () => {
    it('truncates at the first scheduler frame', () => {
        const stack = [
            'Error: boom',
            '    at Action.run (src/nodes/task.ts:17:16)',
            '    at BehaviorIterator.update (src/core/behavior-iterator.ts:104:29)',
            '    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
            '    at async main (src/main.ts:3:1)',
        ].join('\n');

        expect(cleanStackTrace(stack)).toBe([
            'Error: boom',
            '    at Action.run (src/nodes/task.ts:17:16)',
            '    at BehaviorIterator.update (src/core/behavior-iterator.ts:104:29)',
            '    ... (scheduler frames truncated)',
        ].join('\n'));
    });

    it('leaves a stack without scheduler frames unchanged', () => {
        const stack = 'Error: boom\n    at run (a.ts:1:1)';
        expect(cleanStackTrace(stack)).toBe(stack);
    });
});

// ─── LogHandler ───────────────────────────────────────────────────────────────

describe('LogHandler', () => {
    beforeEach(() => {
        resetLogs();
    });

    it('tags messages with the module name', () => {
        const log = new LogHandler('Planner');
        const cause = new Error('cause');

        log.warn('careful');
        log.error('failed', cause);

        expect(log.moduleName).toBe('Planner');
        expect(warnings('Planner')).toEqual(['careful']);
        expect(errors('Planner')).toEqual(['failed']);
        expect(LogHandler.getLogManager().log[1].exception).toBe(cause);
    });

    it('derives scoped loggers', () => {
        const log = new LogHandler('TreeRunner').child('patrol');

        log.info('tick');

        expect(log.moduleName).toBe('TreeRunner/patrol');
        expect(LogHandler.getLogManager().log[0].source).toBe('TreeRunner/patrol');
    });
});

// ─── ThrottledLogger ──────────────────────────────────────────────────────────

describe('ThrottledLogger', () => {
    beforeEach(() => {
        resetLogs();
    });

    it('logs the first message and suppresses repeats inside the window', () => {
        let time = 0;
        const logger = new ThrottledLogger(new LogHandler('Throttle'), 1000, () => time);

        expect(logger.warn('slow')).toBe(true);
        time = 999;
        expect(logger.warn('slow')).toBe(false);
        expect(logger.warn('slow')).toBe(false);
        expect(logger.suppressedCount).toBe(2);

        time = 1999;
        expect(logger.warn('slow')).toBe(true);
        expect(logger.suppressedCount).toBe(0);

        expect(warnings('Throttle')).toEqual(['slow', 'slow (2 similar suppressed)']);
    });

    it('lets the next message through after a reset', () => {
        const logger = new ThrottledLogger(new LogHandler('Throttle'), 1000, () => 0);

        logger.warn('slow');
        logger.warn('slow');
        logger.reset();

        expect(logger.suppressedCount).toBe(0);
        expect(logger.warn('slow')).toBe(true);
        expect(warnings('Throttle')).toEqual(['slow', 'slow']);
    });

    it('passes the error along', () => {
        const logger = new ThrottledLogger(new LogHandler('Throttle'), 1000, () => 0);
        const err = new Error('boom');

        expect(logger.error('update failed', err)).toBe(true);

        const last = LogHandler.getLogManager().log.at(-1);
        expect(last?.msg).toBe('update failed');
        expect(last?.exception).toBe(err);
    });
});
