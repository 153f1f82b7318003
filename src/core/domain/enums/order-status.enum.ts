/**
 * Order lifecycle states
 * Every order starts as NEW; the processor moves it to exactly one outcome
 */
export enum OrderStatus {
  /**
   * Initial state - order loaded from storage, not yet processed
   */
  NEW = 'new',

  // ============ Type A (CSV export) ============

  /**
   * Order written to its CSV export file
   */
  EXPORTED = 'exported',

  /**
   * Export destination could not be prepared or opened
   */
  EXPORT_FAILED = 'export_failed',

  // ============ Type B (remote classification) ============

  /**
   * Classification data high enough and amount small enough
   */
  PROCESSED = 'processed',

  /**
   * Classification data low, or order flagged
   */
  PENDING = 'pending',

  /**
   * Classification succeeded but no rule accepted the order
   */
  ERROR = 'error',

  /**
   * Classification service answered with a non-success envelope
   */
  API_ERROR = 'api_error',

  /**
   * Classification service could not be reached or answered garbage
   */
  API_FAILURE = 'api_failure',

  // ============ Type C (flag) ============

  COMPLETED = 'completed',
  IN_PROGRESS = 'in_progress',

  // ============ Any type ============

  /**
   * Discriminant not recognised
   */
  UNKNOWN_TYPE = 'unknown_type',

  /**
   * Status and priority could not be persisted
   */
  DB_ERROR = 'db_error',
}

/**
 * Helper to determine if a status records a recovered fault
 */
export function isFailureStatus(status: OrderStatus): boolean {
  return [
    OrderStatus.EXPORT_FAILED,
    OrderStatus.API_ERROR,
    OrderStatus.API_FAILURE,
    OrderStatus.DB_ERROR,
  ].includes(status);
}
