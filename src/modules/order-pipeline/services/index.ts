export { OrderPipelineService } from './order-pipeline.service';
export type { ProcessingSummary } from './order-pipeline.service';
export { ConfigurationService } from './configuration.service';
