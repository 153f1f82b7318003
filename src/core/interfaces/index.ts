// Interface and type exports
export * from './storage.adapter';
export * from './classification.adapter';
export * from './export-sink.interface';
export * from './configuration.interface';
