import { derivePriority } from '../../state-machine';
import { OrderContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 2: Priority
 * Overwrites the priority from the amount, for every order type
 */
export class PriorityStage implements PipelineStage {
  name = 'priority';

  async execute(context: OrderContext): Promise<StageResult> {
    context.order.priority = derivePriority(context.order);

    return { context, shouldContinue: true };
  }
}
