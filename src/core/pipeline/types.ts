import { Order } from '../domain/models';
import { OrderStatus } from '../domain/enums';
import {
  OrderStorageAdapter,
  ClassificationAdapter,
  ExportSink,
  LifecycleHooks,
  Logger,
  UserId,
} from '../interfaces';
import { OrderVariant } from '../state-machine';

/**
 * Order processing context passed through the pipeline
 */
export interface OrderContext {
  // Input
  userId: UserId;
  order: Order;
  variant: OrderVariant;

  // Processing metadata
  batchId: string;
  startTime: Date;

  // Fault absorbed into the order status, if any
  recoveredError?: Error;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  context: OrderContext;
  shouldContinue: boolean;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: OrderContext): Promise<StageResult>;
}

/**
 * Outcome of a type-specific handler
 */
export interface HandlerOutcome {
  status: OrderStatus;
  error?: Error;
}

/**
 * Type-specific order handler
 * Handlers decide a status; they never assign it themselves
 */
export interface OrderHandler {
  readonly name: string;
  handle(order: Order): Promise<HandlerOutcome>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  // Adapters
  storageAdapter: OrderStorageAdapter;
  classificationAdapter: ClassificationAdapter;

  /**
   * Export sink for type A orders; a CsvFileSink is created when omitted
   */
  exportSink?: ExportSink;

  /**
   * Directory for the default CsvFileSink (ignored when exportSink is given)
   */
  exportDirectory?: string;

  // Lifecycle hooks
  hooks?: LifecycleHooks;

  logger?: Logger;

  /**
   * Time source for export file names
   */
  clock?: () => Date;

  /**
   * Log the fate of every order at debug level
   * Default: false
   */
  debug?: boolean;
}

/**
 * Pipeline description, for health and diagnostics
 */
export interface PipelineStatistics {
  stages: string[];
  handlers: string[];
  exportSink: string;
  classificationAdapter: string;
}
