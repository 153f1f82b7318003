import { OrderPriority, OrderStatus } from '../enums';

/**
 * Opaque order identifier, as handed out by the storage adapter
 */
export type OrderId = number | string | null;

/**
 * Order domain model - the record transformed by the processing pipeline
 * Pure TypeScript class with no framework dependencies
 */
export class Order {
  /**
   * Always NEW when loaded; only the processor changes it afterwards
   */
  public status: OrderStatus = OrderStatus.NEW;

  /**
   * Always LOW when loaded; only the priority rule changes it afterwards
   */
  public priority: OrderPriority = OrderPriority.LOW;

  constructor(
    public readonly id: OrderId,
    public readonly type: string | null,
    public readonly amount: number | null = null,
    public readonly flag: boolean | null = null,
  ) {}

  /**
   * Amount used in comparisons (missing or non-numeric counts as zero)
   */
  get effectiveAmount(): number {
    return typeof this.amount === 'number' && !Number.isNaN(this.amount)
      ? this.amount
      : 0;
  }

  /**
   * Flag used in comparisons (missing counts as false)
   */
  get isFlagged(): boolean {
    return this.flag === true;
  }

  /**
   * Fields in export column order: ID, Type, Amount, Flag, Status, Priority
   */
  toRow(): string[] {
    return [
      this.id === null ? '' : String(this.id),
      this.type ?? '',
      this.amount === null ? '' : String(this.amount),
      this.isFlagged ? 'true' : 'false',
      this.status,
      this.priority,
    ];
  }

  /**
   * Plain snapshot for logging and API responses
   */
  toSnapshot(): OrderSnapshot {
    return {
      id: this.id,
      type: this.type,
      amount: this.amount,
      flag: this.flag,
      status: this.status,
      priority: this.priority,
    };
  }
}

/**
 * Serializable view of an order
 */
export interface OrderSnapshot {
  id: OrderId;
  type: string | null;
  amount: number | null;
  flag: boolean | null;
  status: OrderStatus;
  priority: OrderPriority;
}
