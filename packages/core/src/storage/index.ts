export { PgCleaningStorage } from './pg/pg-cleaning-storage.js';
export type {
  CleaningStorage,
  StorageTransaction,
  RuleRepository,
  RecordReader,
  RecordWriter,
  LedgerReader,
  LedgerWriter,
} from './types.js';
