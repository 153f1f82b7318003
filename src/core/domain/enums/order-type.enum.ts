/**
 * Recognised order discriminants
 * Anything else (including null) is treated as an unknown type
 */
export enum OrderType {
  /**
   * Exported to a CSV file
   */
  A = 'A',

  /**
   * Classified by the remote classification service
   */
  B = 'B',

  /**
   * Classified from the order's own flag
   */
  C = 'C',
}

/**
 * Narrow an arbitrary discriminant to a known order type
 */
export function isOrderType(value: unknown): value is OrderType {
  return (
    value === OrderType.A || value === OrderType.B || value === OrderType.C
  );
}
