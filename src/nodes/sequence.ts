import { NodeStatus } from '@/core/node-status';
import { Composite } from './composite';

/** Runs children in order. Fails on the first FAILURE, succeeds when all
 *  children succeed. Succeeds with zero children. */
export class Sequence extends Composite {
    protected readonly emptyStatus = NodeStatus.SUCCESS;

    protected stopsOn(status: NodeStatus): boolean {
        return status === NodeStatus.FAILURE;
    }
}
