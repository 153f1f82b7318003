import { Order } from '../domain/models';
import { OrderType, isOrderType } from '../domain/enums';

/**
 * Closed set of order variants the dispatcher understands
 * The unknown variant covers every other discriminant, including null
 */
export type OrderVariant =
  | { kind: OrderType.A; order: Order }
  | { kind: OrderType.B; order: Order }
  | { kind: OrderType.C; order: Order }
  | { kind: 'unknown'; order: Order };

export type OrderKind = OrderVariant['kind'];

/**
 * Tag an order with its variant
 */
export function toOrderVariant(order: Order): OrderVariant {
  const type: unknown = order.type;

  if (!isOrderType(type)) {
    return { kind: 'unknown', order };
  }

  switch (type) {
    case OrderType.A:
      return { kind: OrderType.A, order };
    case OrderType.B:
      return { kind: OrderType.B, order };
    case OrderType.C:
      return { kind: OrderType.C, order };
    default:
      return assertNever(type);
  }
}

/**
 * Compile-time exhaustiveness check for switches over variants
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled order variant: ${JSON.stringify(value)}`);
}
