export { CsvFileSink, DEFAULT_EXPORT_DIRECTORY } from './csv-file.sink';
export type { CsvFileSinkOptions, CsvSinkHandle } from './csv-file.sink';
