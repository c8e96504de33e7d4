/**
 * Fine-tuning corpus module
 */

export {
  DEFAULT_FINETUNE_PATH,
  EXPECTED_ROLES,
  REQUIRED_ASSISTANT_FIELDS,
  FineTuningFileError,
  splitJsonlContent,
  validateFineTuningFile,
  validateFineTuningLine,
  validateFineTuningLines,
  type FineTuningLineDiagnostic,
  type FineTuningReport,
  type LineIssueReason,
} from './validate.js';
