export { HttpClassificationAdapter } from './http-classification.adapter';
export type { HttpClassificationOptions } from './http-classification.adapter';
export { ClassificationEnvelopeDto } from './classification-envelope.dto';
