import { Order } from '../domain/models';
import { OrderPriority, OrderStatus } from '../domain/enums';

/**
 * Order business rules
 *
 * Key principles:
 * - Rules are pure: they read an order and return a value, never mutate it
 * - Thresholds are strict comparisons on the coerced amount
 * - Type B rules are evaluated in a fixed order; first match wins
 */

/**
 * Amount above which an order is high priority
 */
export const HIGH_PRIORITY_AMOUNT = 200;

/**
 * Amount above which the CSV export carries a note row
 */
export const HIGH_VALUE_NOTE_AMOUNT = 150;

/**
 * Classification data at or above which a type B order may be processed
 */
export const CLASSIFICATION_DATA_THRESHOLD = 50;

/**
 * Amount below which a well-classified type B order is processed
 */
export const PROCESSABLE_AMOUNT_LIMIT = 100;

/**
 * Priority for any order, regardless of type
 */
export function derivePriority(order: Order): OrderPriority {
  return order.effectiveAmount > HIGH_PRIORITY_AMOUNT
    ? OrderPriority.HIGH
    : OrderPriority.LOW;
}

/**
 * Whether the CSV export of this order gets the high value note
 */
export function needsHighValueNote(order: Order): boolean {
  return order.effectiveAmount > HIGH_VALUE_NOTE_AMOUNT;
}

/**
 * Status for a type B order once the classification service answered "success"
 *
 * The amount/data rule runs before the flag rule, so a flagged order with a
 * small amount and high data is PROCESSED, not PENDING.
 */
export function deriveClassifiedStatus(
  order: Order,
  data: number,
): OrderStatus {
  if (
    data >= CLASSIFICATION_DATA_THRESHOLD &&
    order.effectiveAmount < PROCESSABLE_AMOUNT_LIMIT
  ) {
    return OrderStatus.PROCESSED;
  }

  if (data < CLASSIFICATION_DATA_THRESHOLD || order.isFlagged) {
    return OrderStatus.PENDING;
  }

  return OrderStatus.ERROR;
}

/**
 * Status for a type C order
 */
export function deriveFlagStatus(order: Order): OrderStatus {
  return order.isFlagged ? OrderStatus.COMPLETED : OrderStatus.IN_PROGRESS;
}
