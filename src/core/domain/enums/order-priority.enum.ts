/**
 * Order priority, derived from the order amount
 */
export enum OrderPriority {
  LOW = 'low',
  HIGH = 'high',
}
