import type { BehaviorNode } from '@/core/behavior-node';
import { AbortType, ConditionalAbort } from './conditional-abort';

export type GuardPredicate = (node: BehaviorNode) => boolean;

/** Conditional abort driven by a predicate. Returns FAILURE when the
 *  predicate is false on entry (child is skipped). */
export class Guard extends ConditionalAbort {
    constructor(
        public readonly predicate: GuardPredicate,
        abortType: AbortType = AbortType.None,
        name?: string,
    ) {
        super(abortType, name);
    }

    condition(): boolean {
        return this.predicate(this);
    }
}
