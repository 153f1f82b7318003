export * from './order.model';
export * from './classification-response.model';
