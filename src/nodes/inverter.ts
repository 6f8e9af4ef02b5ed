import { NodeStatus } from '@/core/node-status';
import { Decorator } from './decorator';

/** Swaps SUCCESS and FAILURE of its child. */
export class Inverter extends Decorator {
    run(): NodeStatus {
        switch (this.childExitStatus) {
        case NodeStatus.SUCCESS:
            return NodeStatus.FAILURE;
        case NodeStatus.FAILURE:
            return NodeStatus.SUCCESS;
        default:
            return NodeStatus.FAILURE;
        }
    }
}
