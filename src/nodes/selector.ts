import { NodeStatus } from '@/core/node-status';
import { Composite } from './composite';

/** Tries children in order. Succeeds on the first SUCCESS, fails only when
 *  all children fail. Fails with zero children. */
export class Selector extends Composite {
    protected readonly emptyStatus = NodeStatus.FAILURE;

    protected stopsOn(status: NodeStatus): boolean {
        return status === NodeStatus.SUCCESS;
    }
}
