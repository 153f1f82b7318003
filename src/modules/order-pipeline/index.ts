export { OrderPipelineModule } from './order-pipeline.module';
export * from './order-pipeline.config';
export * from './constants';
export * from './services';
export * from './controllers';
