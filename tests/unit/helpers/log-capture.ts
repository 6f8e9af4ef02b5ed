import { LogHandler } from '@/utilities/log-handler';
import { LogType } from '@/utilities/log-manager';

/** Silence the console and start from an empty log history. */
export function resetLogs(): void {
    const manager = LogHandler.getLogManager();
    manager.consoleOutput = false;
    manager.clear();
}

export function loggedMessages(type: LogType, source?: string): string[] {
    return LogHandler.getLogManager().log
        .filter(m => m.type === type && (source === undefined || m.source === source))
        .map(m => m.msg);
}

export function warnings(source?: string): string[] {
    return loggedMessages(LogType.Warn, source);
}

export function errors(source?: string): string[] {
    return loggedMessages(LogType.Error, source);
}
