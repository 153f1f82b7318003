import { ClassificationResponse, OrderId } from '../domain/models';

/**
 * Classification adapter interface - abstracts the remote classification service
 */
export interface ClassificationAdapter {
  /**
   * Unique identifier for this adapter (e.g., 'http', 'mock')
   */
  readonly adapterName: string;

  /**
   * Classify an order by its identifier
   * @returns The service envelope, whatever its status
   * @throws ClassificationError when the service cannot produce an envelope
   */
  classify(orderId: OrderId): Promise<ClassificationResponse>;
}

/**
 * Classification-specific fault (transport, timeout, malformed answer)
 */
export class ClassificationError extends Error {
  constructor(
    message: string,
    public code: string,
    public adapterName: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ClassificationError';
  }
}
