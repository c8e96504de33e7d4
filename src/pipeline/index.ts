/**
 * Classification pipeline module
 */

export {
  DEFAULT_REQUEST_DELAY_MS,
  classifyMany,
  selectRange,
  type IndexRange,
  type ClassifyProgress,
  type ClassifyManyOptions,
  type ClassifyManyResult,
} from './classify.js';

export {
  ConversationsFileError,
  ConversationSchema,
  CanonicalMessageSchema,
  ConversationsFileSchema,
  loadConversations,
  parseConversations,
} from './conversations.js';
