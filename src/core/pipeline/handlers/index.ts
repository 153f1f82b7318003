export {
  CsvExportHandler,
  exportFileName,
  EXPORT_HEADER_ROW,
  HIGH_VALUE_NOTE_ROW,
} from './csv-export.handler';
export { ClassificationHandler } from './classification.handler';
export { FlagHandler } from './flag.handler';
