/**
 * Order status state machine
 * Type dispatch and the rules that decide status and priority
 */

export * from './order-variant';
export * from './status-rules';
