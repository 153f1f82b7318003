export { MockClassificationAdapter } from './mock-classification.adapter';
