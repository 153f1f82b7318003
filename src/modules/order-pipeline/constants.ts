/**
 * Injection tokens for the order pipeline module
 */

export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const CLASSIFICATION_ADAPTER = Symbol('CLASSIFICATION_ADAPTER');
export const EXPORT_SINK = Symbol('EXPORT_SINK');
export const ORDER_PROCESSOR = Symbol('ORDER_PROCESSOR');
export const ORDER_PIPELINE_CONFIG = Symbol('ORDER_PIPELINE_CONFIG');
