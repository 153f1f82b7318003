import {
  ClassificationAdapter,
  ClassificationError,
  ClassificationResponse,
  OrderId,
} from '../../../core';

/**
 * Mock classification adapter for testing
 * Answers per order id; unknown ids get the default response
 */
export class MockClassificationAdapter implements ClassificationAdapter {
  readonly adapterName = 'mock';

  private responses: Map<string, ClassificationResponse | Error> = new Map();
  private calls: OrderId[] = [];

  constructor(
    private readonly defaultResponse: ClassificationResponse = new ClassificationResponse(
      ClassificationResponse.SUCCESS,
      0,
    ),
  ) {}

  async classify(orderId: OrderId): Promise<ClassificationResponse> {
    this.calls.push(orderId);

    const entry = this.responses.get(String(orderId));
    if (entry instanceof Error) {
      throw entry;
    }

    return entry ?? this.defaultResponse;
  }

  // ==================== Testing Utilities ====================

  respondWith(orderId: OrderId, status: string, data = 0): this {
    this.responses.set(String(orderId), new ClassificationResponse(status, data));
    return this;
  }

  failWith(
    orderId: OrderId,
    error: Error = new ClassificationError(
      `Simulated classification failure for order ${orderId}`,
      'SIMULATED',
      this.adapterName,
    ),
  ): this {
    this.responses.set(String(orderId), error);
    return this;
  }

  getCalls(): OrderId[] {
    return [...this.calls];
  }

  clear(): void {
    this.responses.clear();
    this.calls = [];
  }
}
