export { CsvRecordWriter, formatCsvLine, toCsvRow } from './CsvRecordWriter';
export type { RecordWriter } from './RecordWriter';
