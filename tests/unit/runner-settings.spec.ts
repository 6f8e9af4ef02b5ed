import { describe, it, expect, beforeEach } from 'vitest';
import {
    DEFAULT_RUNNER_SETTINGS,
    parseRunnerSettings,
    resolveRunnerSettings,
} from '@/runner/runner-settings';
import { errors, resetLogs, warnings } from './helpers/log-capture';

beforeEach(() => {
    resetLogs();
});

describe('resolveRunnerSettings', () => {
    it('returns the defaults without overrides', () => {
        expect(resolveRunnerSettings()).toEqual({
            circuitBreakerThreshold: 100,
            errorThrottleMs: 1000,
            paused: false,
        });
    });

    it('returns a fresh object each time', () => {
        const settings = resolveRunnerSettings();
        settings.paused = true;

        expect(DEFAULT_RUNNER_SETTINGS.paused).toBe(false);
        expect(resolveRunnerSettings().paused).toBe(false);
    });

    it('applies valid overrides', () => {
        expect(resolveRunnerSettings({ circuitBreakerThreshold: 5, errorThrottleMs: 0, paused: true })).toEqual({
            circuitBreakerThreshold: 5,
            errorThrottleMs: 0,
            paused: true,
        });
    });

    it('replaces invalid values with their default', () => {
        const settings = resolveRunnerSettings({ circuitBreakerThreshold: 2.5, errorThrottleMs: 'fast', paused: 1 });

        expect(settings).toEqual(DEFAULT_RUNNER_SETTINGS);
        expect(warnings('RunnerSettings')).toEqual([
            'Invalid circuitBreakerThreshold 2.5, using default',
            'Invalid errorThrottleMs fast, using default',
            'Invalid paused 1, using default',
        ]);
    });
});

describe('parseRunnerSettings', () => {
    it('merges parsed values with the defaults', () => {
        expect(parseRunnerSettings('{"circuitBreakerThreshold": 10}')).toEqual({
            circuitBreakerThreshold: 10,
            errorThrottleMs: 1000,
            paused: false,
        });
    });

    it('ignores unknown keys', () => {
        expect(parseRunnerSettings('{"speed": 3}')).toEqual(DEFAULT_RUNNER_SETTINGS);
        expect(warnings('RunnerSettings')).toEqual([]);
    });

    it('falls back to the defaults on malformed JSON', () => {
        expect(parseRunnerSettings('{not json')).toEqual(DEFAULT_RUNNER_SETTINGS);
        expect(errors('RunnerSettings')).toEqual(['Failed to parse runner settings, using defaults']);
    });

    it('falls back to the defaults when the JSON is not an object', () => {
        expect(parseRunnerSettings('[1, 2]')).toEqual(DEFAULT_RUNNER_SETTINGS);
        expect(parseRunnerSettings('null')).toEqual(DEFAULT_RUNNER_SETTINGS);
        expect(warnings('RunnerSettings')).toEqual([
            'Runner settings must be a JSON object, using defaults',
            'Runner settings must be a JSON object, using defaults',
        ]);
    });
});
