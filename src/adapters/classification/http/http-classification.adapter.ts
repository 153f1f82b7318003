import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  ClassificationAdapter,
  ClassificationError,
  ClassificationResponse,
  OrderId,
} from '../../../core';
import {
  ClassificationEnvelopeDto,
  SUCCESS_ENVELOPE_STATUS,
} from './classification-envelope.dto';

export interface HttpClassificationOptions {
  /**
   * Service base URL, e.g. https://classifier.internal
   */
  baseUrl: string;

  /**
   * Sent as a bearer token when set
   */
  apiKey?: string;

  /**
   * Request timeout in milliseconds
   * Default: 5000
   */
  timeoutMs?: number;
}

/**
 * HTTP Classification Adapter
 *
 * GET {baseUrl}/orders/{id}/classification -> { "status": "success", "data": 60 }
 *
 * Network failures, timeouts, non-2xx answers and bodies that are not a valid
 * envelope reject with ClassificationError. Any other status than "success" is
 * returned as is, with data 0. No retries.
 */
export class HttpClassificationAdapter implements ClassificationAdapter {
  readonly adapterName = 'http';
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpClassificationOptions) {
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async classify(orderId: OrderId): Promise<ClassificationResponse> {
    const url = this.buildUrl(orderId);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ClassificationError(
          `Classification request for order ${orderId} timed out after ${this.timeoutMs}ms`,
          'TIMEOUT',
          this.adapterName,
          { url },
        );
      }
      throw new ClassificationError(
        `Classification request for order ${orderId} failed: ${error instanceof Error ? error.message : String(error)}`,
        'NETWORK_ERROR',
        this.adapterName,
        { url },
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new ClassificationError(
        `Classification service error: ${response.status} ${response.statusText}`,
        'HTTP_ERROR',
        this.adapterName,
        { url, status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ClassificationError(
        'Classification service returned invalid JSON',
        'INVALID_RESPONSE',
        this.adapterName,
        { url },
      );
    }

    return this.parseEnvelope(body, url);
  }

  private async parseEnvelope(
    body: unknown,
    url: string,
  ): Promise<ClassificationResponse> {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new ClassificationError(
        'Classification service returned a non-object body',
        'INVALID_RESPONSE',
        this.adapterName,
        { url },
      );
    }

    const envelope = plainToInstance(ClassificationEnvelopeDto, body);
    const errors = await validate(envelope);

    if (errors.length > 0) {
      throw new ClassificationError(
        'Classification service returned a malformed envelope',
        'INVALID_RESPONSE',
        this.adapterName,
        { url, properties: errors.map((e) => e.property) },
      );
    }

    if (envelope.status !== SUCCESS_ENVELOPE_STATUS) {
      return new ClassificationResponse(envelope.status, 0);
    }

    return new ClassificationResponse(envelope.status, envelope.data ?? 0);
  }

  private buildUrl(orderId: OrderId): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const id = encodeURIComponent(orderId === null ? '' : String(orderId));
    return `${base}/orders/${id}/classification`;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }
}
