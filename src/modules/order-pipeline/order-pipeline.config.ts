import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import {
  ClassificationAdapter,
  ExportSink,
  LifecycleHooks,
  OrderStorageAdapter,
} from '../../core';
import { DEFAULT_EXPORT_DIRECTORY } from '../../adapters/sinks/csv';

export type PipelineEnvironment = 'development' | 'staging' | 'production' | 'test';

/**
 * Order Pipeline Module Configuration
 */
export interface OrderPipelineModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<PostgresConnectionOptions>;
    adapter?: OrderStorageAdapter;
  };

  /**
   * Classification service configuration
   */
  classification: {
    type: 'mock' | 'http' | 'custom';

    /**
     * Required for the http adapter
     */
    baseUrl?: string;

    /**
     * Bearer token for the http adapter
     */
    apiKey?: string;

    /**
     * Request timeout in milliseconds
     * Default: 5000
     */
    timeoutMs?: number;

    adapter?: ClassificationAdapter;
  };

  /**
   * Export configuration for type A orders
   */
  export?: {
    /**
     * Target directory of the CSV file sink
     * Default: ./storage under the working directory
     */
    directory?: string;

    /**
     * Replaces the CSV file sink entirely
     */
    sink?: ExportSink;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;

  /**
   * Environment-specific settings
   */
  environment?: PipelineEnvironment;

  /**
   * Log the fate of every order at debug level
   */
  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface OrderPipelineModuleAsyncConfig
  extends Pick<FactoryProvider<Partial<OrderPipelineModuleConfig>>, 'useFactory' | 'inject'> {
  imports?: ModuleMetadata['imports'];
}

/**
 * Default configuration values
 */
export const defaultOrderPipelineConfig: OrderPipelineModuleConfig = {
  storage: {
    type: 'mock',
  },
  classification: {
    type: 'mock',
    timeoutMs: 5000,
  },
  export: {
    directory: DEFAULT_EXPORT_DIRECTORY,
  },
  environment: 'development',
  debug: false,
};

/**
 * Overlay a partial configuration on the defaults
 */
export function mergeOrderPipelineConfig(
  config: Partial<OrderPipelineModuleConfig>,
): OrderPipelineModuleConfig {
  return {
    ...defaultOrderPipelineConfig,
    ...config,
    storage: { ...defaultOrderPipelineConfig.storage, ...config.storage },
    classification: {
      ...defaultOrderPipelineConfig.classification,
      ...config.classification,
    },
    export: { ...defaultOrderPipelineConfig.export, ...config.export },
  };
}

const ENVIRONMENTS: readonly PipelineEnvironment[] = [
  'development',
  'staging',
  'production',
  'test',
];

function isEnvironment(value: string): value is PipelineEnvironment {
  return ENVIRONMENTS.some((env) => env === value);
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Build the module configuration from environment variables
 *
 * ORDER_STORAGE         mock | typeorm (default mock)
 * DB_HOST, DB_PORT, DB_USERNAME, DB_PASSWORD, DB_NAME
 * CLASSIFIER_URL        http classification when set, mock otherwise
 * CLASSIFIER_API_KEY, CLASSIFIER_TIMEOUT_MS
 * ORDER_EXPORT_DIR      CSV export directory
 * NODE_ENV
 */
export function orderPipelineConfigFromEnv(
  configService: ConfigService,
): OrderPipelineModuleConfig {
  const storageType =
    configService.get<string>('ORDER_STORAGE') === 'typeorm' ? 'typeorm' : 'mock';
  const classifierUrl = configService.get<string>('CLASSIFIER_URL');
  const nodeEnv = configService.get<string>('NODE_ENV') ?? 'development';
  const environment = isEnvironment(nodeEnv) ? nodeEnv : 'development';

  return mergeOrderPipelineConfig({
    storage:
      storageType === 'typeorm'
        ? {
            type: 'typeorm',
            options: {
              host: configService.get<string>('DB_HOST', 'localhost'),
              port: readInt(configService.get<string>('DB_PORT'), 5432),
              username: configService.get<string>('DB_USERNAME', 'orders'),
              password: configService.get<string>('DB_PASSWORD', 'orders'),
              database: configService.get<string>('DB_NAME', 'orders'),
            },
          }
        : { type: 'mock' },
    classification: classifierUrl
      ? {
          type: 'http',
          baseUrl: classifierUrl,
          apiKey: configService.get<string>('CLASSIFIER_API_KEY'),
          timeoutMs: readInt(configService.get<string>('CLASSIFIER_TIMEOUT_MS'), 5000),
        }
      : { type: 'mock' },
    export: {
      directory:
        configService.get<string>('ORDER_EXPORT_DIR') ?? DEFAULT_EXPORT_DIRECTORY,
    },
    environment,
    debug: environment === 'development',
  });
}
