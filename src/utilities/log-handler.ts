import { LogManager, LogType } from './log-manager';

/**
 * Named logger. All handlers write to one shared LogManager; the module name
 * becomes the `source` of every message.
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(private readonly _moduleName: string) {}

    public get moduleName(): string {
        return this._moduleName;
    }

    /** Logger for a sub-scope, e.g. one tree of a runner: "TreeRunner/patrol" */
    public child(scope: string): LogHandler {
        return new LogHandler(`${this._moduleName}/${scope}`);
    }

    public error(msg: string, exception?: Error): void {
        this.emit(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.emit(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.emit(LogType.Info, msg);
    }

    public debug(msg: string): void {
        this.emit(LogType.Debug, msg);
    }

    private emit(type: LogType, msg: string, exception?: Error): void {
        LogHandler.manager.push({ type, source: this._moduleName, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
