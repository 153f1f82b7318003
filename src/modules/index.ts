/**
 * NestJS integration
 */

export * from './order-pipeline';
