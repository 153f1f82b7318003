import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnModuleDestroy,
  Provider,
} from '@nestjs/common';
import {
  ClassificationAdapter,
  ExportSink,
  OrderProcessor,
  OrderStorageAdapter,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { TypeORMStorageAdapter, createDataSource } from '../../adapters/storage/typeorm';
import { MockClassificationAdapter } from '../../adapters/classification/mock';
import { HttpClassificationAdapter } from '../../adapters/classification/http';
import { CsvFileSink } from '../../adapters/sinks/csv';
import {
  OrderPipelineModuleAsyncConfig,
  OrderPipelineModuleConfig,
  mergeOrderPipelineConfig,
} from './order-pipeline.config';
import {
  CLASSIFICATION_ADAPTER,
  EXPORT_SINK,
  ORDER_PIPELINE_CONFIG,
  ORDER_PROCESSOR,
  STORAGE_ADAPTER,
} from './constants';
import { OrdersController } from './controllers/orders.controller';
import { HealthController } from './controllers/health.controller';
import { OrderPipelineService } from './services/order-pipeline.service';
import { ConfigurationService } from './services/configuration.service';

/**
 * Order Pipeline Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for the order pipeline
 */
@Global()
@Module({})
export class OrderPipelineModule implements OnModuleDestroy {
  constructor(
    @Inject(ORDER_PIPELINE_CONFIG)
    private readonly config: OrderPipelineModuleConfig,
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: OrderStorageAdapter,
  ) {}

  /**
   * Close the storage adapter the module created; custom adapters belong to the caller
   */
  async onModuleDestroy(): Promise<void> {
    if (this.config.storage.type === 'custom' || !this.storageAdapter.close) {
      return;
    }
    await this.storageAdapter.close();
  }
  /**
   * Configure the pipeline synchronously
   */
  static forRoot(config: Partial<OrderPipelineModuleConfig> = {}): DynamicModule {
    return this.build([
      {
        provide: ORDER_PIPELINE_CONFIG,
        useValue: mergeOrderPipelineConfig(config),
      },
    ]);
  }

  /**
   * Configure the pipeline asynchronously
   */
  static forRootAsync(options: OrderPipelineModuleAsyncConfig): DynamicModule {
    return this.build(
      [
        {
          provide: ORDER_PIPELINE_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeOrderPipelineConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
      ],
      options.imports,
    );
  }

  private static build(
    configProviders: Provider[],
    imports: OrderPipelineModuleAsyncConfig['imports'] = [],
  ): DynamicModule {
    return {
      module: OrderPipelineModule,
      imports,
      providers: [...configProviders, ...this.createProviders()],
      controllers: [OrdersController, HealthController],
      exports: [
        ORDER_PIPELINE_CONFIG,
        STORAGE_ADAPTER,
        CLASSIFICATION_ADAPTER,
        EXPORT_SINK,
        ORDER_PROCESSOR,
        OrderPipelineService,
        ConfigurationService,
      ],
    };
  }

  /**
   * Create providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: OrderPipelineModuleConfig) =>
          this.createStorageAdapter(config),
        inject: [ORDER_PIPELINE_CONFIG],
      },
      {
        provide: CLASSIFICATION_ADAPTER,
        useFactory: (config: OrderPipelineModuleConfig) =>
          this.createClassificationAdapter(config),
        inject: [ORDER_PIPELINE_CONFIG],
      },
      {
        provide: EXPORT_SINK,
        useFactory: (config: OrderPipelineModuleConfig): ExportSink =>
          config.export?.sink ??
          new CsvFileSink({ directory: config.export?.directory }),
        inject: [ORDER_PIPELINE_CONFIG],
      },
      {
        provide: ORDER_PROCESSOR,
        useFactory: (
          config: OrderPipelineModuleConfig,
          storageAdapter: OrderStorageAdapter,
          classificationAdapter: ClassificationAdapter,
          exportSink: ExportSink,
        ) =>
          new OrderProcessor({
            storageAdapter,
            classificationAdapter,
            exportSink,
            hooks: config.hooks,
            logger: new Logger(OrderProcessor.name),
            debug: config.debug,
          }),
        inject: [
          ORDER_PIPELINE_CONFIG,
          STORAGE_ADAPTER,
          CLASSIFICATION_ADAPTER,
          EXPORT_SINK,
        ],
      },
      OrderPipelineService,
      ConfigurationService,
    ];
  }

  private static async createStorageAdapter(
    config: OrderPipelineModuleConfig,
  ): Promise<OrderStorageAdapter> {
    switch (config.storage.type) {
      case 'mock':
        return new MockStorageAdapter();

      case 'typeorm': {
        const dataSource = createDataSource(config.storage.options);
        await dataSource.initialize();
        return new TypeORMStorageAdapter(dataSource);
      }

      case 'custom':
        if (!config.storage.adapter) {
          throw new Error('Custom storage adapter not provided');
        }
        return config.storage.adapter;

      default:
        throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
    }
  }

  private static createClassificationAdapter(
    config: OrderPipelineModuleConfig,
  ): ClassificationAdapter {
    const { classification } = config;

    switch (classification.type) {
      case 'mock':
        return new MockClassificationAdapter();

      case 'http':
        if (!classification.baseUrl) {
          throw new Error('Classification baseUrl is required for the http adapter');
        }
        return new HttpClassificationAdapter({
          baseUrl: classification.baseUrl,
          apiKey: classification.apiKey,
          timeoutMs: classification.timeoutMs,
        });

      case 'custom':
        if (!classification.adapter) {
          throw new Error('Custom classification adapter not provided');
        }
        return classification.adapter;

      default:
        throw new Error(`Unknown classification type: ${String(classification.type)}`);
    }
  }
}
