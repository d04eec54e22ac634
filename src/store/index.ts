export {
  readAll,
  readUnique,
  appendRecord,
  writeAll,
  writeJson,
  loadExistingIds,
  repairTail,
  serializeRecord,
} from './record-store.js';

export {
  JsonlRecordSink,
  BufferedRecordSink,
  InMemoryRecordSink,
  prepareOutput,
} from './record-sink.js';
export type { RecordSink, OutputMode } from './record-sink.js';
