import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('RunnerSettings');

/**
 * Tree runner settings schema. Every field has a default; hosts override
 * only what they need.
 */
export interface RunnerSettings {
    /** Consecutive failing updates before a tree is disabled */
    circuitBreakerThreshold: number;

    /** Minimum interval between error logs for the same tree (in ms) */
    errorThrottleMs: number;

    /** When true tick() does nothing */
    paused: boolean;
}

/** Default values for all settings */
export const DEFAULT_RUNNER_SETTINGS: Readonly<RunnerSettings> = {
    circuitBreakerThreshold: 100,
    errorThrottleMs: 1000,
    paused: false,
};

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isNonNegativeNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Merge overrides with the defaults. Invalid values are reported and
 * replaced by their default instead of failing.
 */
export function resolveRunnerSettings(overrides: Partial<Record<keyof RunnerSettings, unknown>> = {}): RunnerSettings {
    const settings: RunnerSettings = { ...DEFAULT_RUNNER_SETTINGS };

    const { circuitBreakerThreshold, errorThrottleMs, paused } = overrides;

    if (circuitBreakerThreshold !== undefined) {
        if (isPositiveInteger(circuitBreakerThreshold)) {
            settings.circuitBreakerThreshold = circuitBreakerThreshold;
        } else {
            log.warn(`Invalid circuitBreakerThreshold ${String(circuitBreakerThreshold)}, using default`);
        }
    }

    if (errorThrottleMs !== undefined) {
        if (isNonNegativeNumber(errorThrottleMs)) {
            settings.errorThrottleMs = errorThrottleMs;
        } else {
            log.warn(`Invalid errorThrottleMs ${String(errorThrottleMs)}, using default`);
        }
    }

    if (paused !== undefined) {
        if (typeof paused === 'boolean') {
            settings.paused = paused;
        } else {
            log.warn(`Invalid paused ${String(paused)}, using default`);
        }
    }

    return settings;
}

/** Parse settings from JSON text (e.g. a config file), merging with defaults */
export function parseRunnerSettings(json: string): RunnerSettings {
    try {
        const parsed: unknown = JSON.parse(json);
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            log.warn('Runner settings must be a JSON object, using defaults');
            return { ...DEFAULT_RUNNER_SETTINGS };
        }

        return resolveRunnerSettings({
            circuitBreakerThreshold: Reflect.get(parsed, 'circuitBreakerThreshold'),
            errorThrottleMs: Reflect.get(parsed, 'errorThrottleMs'),
            paused: Reflect.get(parsed, 'paused'),
        });
    } catch (e) {
        log.error('Failed to parse runner settings, using defaults', e instanceof Error ? e : new Error(String(e)));
        return { ...DEFAULT_RUNNER_SETTINGS };
    }
}
