export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical console messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

/**
 * Frames that belong to the Node.js scheduler rather than to tree code.
 * Everything below the first of these is noise for a tick-driven runtime.
 */
const SCHEDULER_FRAME_PATTERNS = [
    /processTicksAndRejections/,
    /listOnTimeout/,
    /process\.processImmediate/,
    /node:internal\//,
];

/**
 * Clean up stack traces by truncating at the first scheduler frame.
 * @param stack The stack trace string
 * @returns Cleaned stack trace
 */
export function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        if (SCHEDULER_FRAME_PATTERNS.some(p => p.test(line.trim()))) {
            result.push('    ... (scheduler frames truncated)');
            break;
        }
        result.push(line);
    }

    return result.join('\n');
}

type ConsoleWriter = (text: string) => void;

const CONSOLE_WRITERS: Record<LogType, ConsoleWriter> = {
    [LogType.Error]: text => console.error(text),
    [LogType.Debug]: text => console.debug(text),
    [LogType.Warn]: text => console.warn(text),
    [LogType.Info]: text => console.info(text),
};

interface ThrottleEntry {
    lastTime: number;
    suppressedCount: number;
}

/**
 * Collects every message of the runtime. Keeps a bounded history for late
 * listeners and mirrors messages to the console, collapsing identical ones.
 */
export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;

    /** When false nothing is written to the console; history and listener still work */
    public consoleOutput = true;

    /** source+type+msg -> throttle entry */
    private throttleState = new Map<string, ThrottleEntry>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;
        if (!callback) return;

        for (const msg of this.log) {
            callback(msg);
        }
    }

    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;
        this.remember(msg);
        this.listener?.(msg);

        if (!this.consoleOutput) return;

        const suppressed = this.takeConsoleSlot(msg);
        if (suppressed === null) return;

        CONSOLE_WRITERS[msg.type](LogManager.format(msg, suppressed));
    }

    private remember(msg: ILogMessage): void {
        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }
    }

    /**
     * Null while an identical message was printed less than LOG_THROTTLE_MS
     * ago; otherwise the number of copies swallowed since then.
     */
    private takeConsoleSlot(msg: ILogMessage): number | null {
        const key = `${msg.source}:${msg.type}:${msg.msg}`;
        const now = performance.now();
        const entry = this.throttleState.get(key);

        if (entry && now - entry.lastTime < LOG_THROTTLE_MS) {
            entry.suppressedCount++;
            return null;
        }

        this.throttleState.set(key, { lastTime: now, suppressedCount: 0 });
        return entry?.suppressedCount ?? 0;
    }

    private static format(msg: ILogMessage, suppressed: number): string {
        let text = `${msg.source}\t${msg.msg}`;
        if (suppressed > 0) {
            text += ` (${suppressed} similar suppressed)`;
        }

        if (msg.exception) {
            text += `\n${msg.exception.message}`;
            if (msg.exception.stack) {
                text += `\n${cleanStackTrace(msg.exception.stack)}`;
            }
        }
        return text;
    }
}
