export { chronicle, SCHEMA_SQL, TABLE_NAME } from './schema.js';
export type { ChronicleRow, NewChronicleRow } from './schema.js';
export {
  PartitionCache,
  findExistingIds,
  findRecordById,
  findRecordsBySource,
  findRecordsInRange,
  insertRecords,
  openReaderPartition,
  openWriterPartition,
  withReader,
} from './partition-store.js';
export type { PartitionDb, PartitionHandle } from './partition-store.js';
export { BlobStore } from './blob-store.js';
export { writeDeadLetters, DEAD_LETTER_DIR } from './dead-letter.js';
export type { DeadLetterEntry } from './dead-letter.js';
