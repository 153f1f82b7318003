export { MemoryExportSink } from './memory-export.sink';
