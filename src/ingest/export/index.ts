/**
 * Chat export ingestion module
 */

export {
  parseExport,
  readExportFile,
  ExportFileError,
} from './parser.js';

export {
  OpaqueValueSchema,
  RawRecordSchema,
  RawMessageSchema,
  RawContentSchema,
  type RawRecord,
  type RawMessage,
  type RawContent,
} from './types.js';
