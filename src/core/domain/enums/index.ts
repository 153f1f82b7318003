export * from './order-status.enum';
export * from './order-priority.enum';
export * from './order-type.enum';
