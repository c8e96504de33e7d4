/**
 * Transcript normalization module
 */

export {
  BOT_SENDER_ID,
  DEFAULT_MAX_CONVERSATIONS,
  resolveSender,
  isTranscriptMessage,
  formatTranscriptLines,
  normalizeRecord,
  normalizeExport,
  processExportFile,
  type Sender,
  type CanonicalMessage,
  type Conversation,
  type NormalizeOptions,
  type NormalizeProgress,
  type NormalizeResult,
  type ProcessFileResult,
} from './transcript.js';

export {
  cleanText,
  collapseWhitespace,
  decodeEscapes,
  decodeUnicodeEscapes,
  stripMarkdownEmphasis,
  EscapeDecodeError,
  type ByteEscapeMode,
} from './text.js';
