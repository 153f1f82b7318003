import { Injectable, Inject } from '@nestjs/common';
import type {
  OrderPipelineModuleConfig,
  PipelineEnvironment,
} from '../order-pipeline.config';
import { ORDER_PIPELINE_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the pipeline configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(ORDER_PIPELINE_CONFIG)
    private readonly config: OrderPipelineModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): OrderPipelineModuleConfig {
    return this.config;
  }

  getStorageType(): OrderPipelineModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  getClassificationType(): OrderPipelineModuleConfig['classification']['type'] {
    return this.config.classification.type;
  }

  /**
   * Classification request timeout in milliseconds
   */
  getClassificationTimeout(): number {
    return this.config.classification.timeoutMs ?? 5000;
  }

  /**
   * Directory of the CSV file sink, undefined when a custom sink is configured
   */
  getExportDirectory(): string | undefined {
    return this.config.export?.sink ? undefined : this.config.export?.directory;
  }

  /**
   * Get environment
   */
  getEnvironment(): PipelineEnvironment {
    return this.config.environment || 'development';
  }
}
