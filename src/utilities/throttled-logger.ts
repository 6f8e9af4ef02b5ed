import type { LogHandler } from './log-handler';

/**
 * Rate-limited front for a LogHandler.
 *
 * A tree that throws every frame would otherwise write one entry per frame.
 * At most one message passes per `throttleMs`; the next one that passes
 * carries the number swallowed in between, e.g.
 * `Tree "guard" update failed (59 similar suppressed)`.
 */
export class ThrottledLogger {
    private lastTime = Number.NEGATIVE_INFINITY;
    private suppressed = 0;

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number,
        private readonly now: () => number = () => performance.now(),
    ) {}

    /** Messages swallowed since the last one that got through */
    public get suppressedCount(): number {
        return this.suppressed;
    }

    /** Returns true when the message was logged. */
    error(message: string, error: Error): boolean {
        return this.pass(message, text => this.log.error(text, error));
    }

    warn(message: string): boolean {
        return this.pass(message, text => this.log.warn(text));
    }

    /** Forget the window and the suppressed count; the next message passes. */
    reset(): void {
        this.lastTime = Number.NEGATIVE_INFINITY;
        this.suppressed = 0;
    }

    private pass(message: string, write: (text: string) => void): boolean {
        const now = this.now();
        if (now - this.lastTime < this.throttleMs) {
            this.suppressed++;
            return false;
        }

        const note = this.suppressed > 0 ? ` (${this.suppressed} similar suppressed)` : '';
        this.lastTime = now;
        this.suppressed = 0;
        write(message + note);
        return true;
    }
}
