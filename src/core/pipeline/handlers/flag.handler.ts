import { Order } from '../../domain/models';
import { deriveFlagStatus } from '../../state-machine';
import { HandlerOutcome, OrderHandler } from '../types';

/**
 * Type C: status follows the order's own flag
 */
export class FlagHandler implements OrderHandler {
  readonly name = 'flag';

  async handle(order: Order): Promise<HandlerOutcome> {
    return { status: deriveFlagStatus(order) };
  }
}
