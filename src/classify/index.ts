/**
 * Conversation classification module
 */

export {
  ConversationClassifier,
  buildTranscript,
  type Classifier,
  type ClassifierOptions,
  type ClassificationOutcome,
  type ClassificationFailure,
  type FailureKind,
} from './classifier.js';

export {
  ContractViolationError,
  enforceVerdictContract,
  findContractIssues,
  formatIssue,
  type ContractIssue,
  type ContractCheck,
  type ExplanationField,
} from './contract.js';

export { ANALYSIS_SYSTEM_PROMPT, buildAnalysisUserPrompt } from './prompts.js';

export {
  CATEGORIES,
  SENTIMENTS,
  RATINGS,
  SentimentSchema,
  RatingSchema,
  CategorySchema,
  ClassificationVerdictSchema,
  AnalysisRecordSchema,
  VERDICT_JSON_SCHEMA,
  VERDICT_SCHEMA_NAME,
  type Sentiment,
  type Rating,
  type Category,
  type ClassificationVerdict,
  type AnalysisRecord,
} from './schema.js';
