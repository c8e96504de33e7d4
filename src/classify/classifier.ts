/**
 * Conversation classifier
 * One schema-constrained LLM request per conversation
 */

import type { ContractPolicy } from '../config/index.js';
import type { LLMProvider } from '../llm/index.js';
import { ProviderError } from '../llm/index.js';
import type { Conversation } from '../normalize/index.js';
import { createLogger, errorMessage, type Logger } from '../utils/index.js';
import {
  ContractViolationError,
  enforceVerdictContract,
  formatIssue,
  type ContractIssue,
} from './contract.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisUserPrompt } from './prompts.js';
import {
  ClassificationVerdictSchema,
  VERDICT_JSON_SCHEMA,
  VERDICT_SCHEMA_NAME,
  type AnalysisRecord,
} from './schema.js';

/**
 * Why a conversation could not be classified
 */
export type FailureKind =
  | 'provider_error'
  | 'invalid_json'
  | 'schema_mismatch'
  | 'contract_violation'
  | 'unexpected';

/**
 * A conversation that produced no verdict
 */
export interface ClassificationFailure {
  conversation_id: string;
  kind: FailureKind;
  message: string;
}

export type ClassificationOutcome =
  | { ok: true; record: AnalysisRecord; issues: ContractIssue[] }
  | { ok: false; failure: ClassificationFailure };

/**
 * Anything that can grade a single conversation
 */
export interface Classifier {
  classify(conversation: Conversation): Promise<ClassificationOutcome>;
}

/**
 * Classifier options
 */
export interface ClassifierOptions {
  provider: LLMProvider;
  model?: string;
  contractPolicy?: ContractPolicy;
  logger?: Logger;
}

/**
 * Join "Sender: text" lines with a blank line between messages
 */
export function buildTranscript(conversation: Conversation): string {
  return conversation.transcript_list_of_messages
    .map(msg => `${msg.sender}: ${msg.text}`)
    .join('\n\n');
}

/**
 * Parse the raw model output into a verdict
 */
function parseVerdict(content: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch (error) {
    return { ok: false, message: `JSON parsing error: ${errorMessage(error)}` };
  }
}

/**
 * LLM-backed classifier
 */
export class ConversationClassifier implements Classifier {
  private readonly provider: LLMProvider;
  private readonly model?: string;
  private readonly contractPolicy: ContractPolicy;
  private readonly log: Logger;

  constructor(options: ClassifierOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.contractPolicy = options.contractPolicy ?? 'coerce';
    this.log = options.logger ?? createLogger({ module: 'classifier' });
  }

  /**
   * Classify one conversation. Never throws; failures are returned.
   */
  async classify(conversation: Conversation): Promise<ClassificationOutcome> {
    const conversationId = conversation.metadata.conversation_id;

    const fail = (kind: FailureKind, message: string): ClassificationOutcome => {
      this.log.warn({ conversationId, kind }, message);
      return { ok: false, failure: { conversation_id: conversationId, kind, message } };
    };

    try {
      const result = await this.provider.chat(
        [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          { role: 'user', content: buildAnalysisUserPrompt(buildTranscript(conversation)) },
        ],
        {
          model: this.model,
          responseFormat: {
            name: VERDICT_SCHEMA_NAME,
            schema: VERDICT_JSON_SCHEMA,
            strict: true,
          },
        }
      );

      const parsed = parseVerdict(result.content);
      if (!parsed.ok) {
        return fail('invalid_json', parsed.message);
      }

      const validated = ClassificationVerdictSchema.safeParse(parsed.value);
      if (!validated.success) {
        const details = validated.error.issues
          .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        return fail('schema_mismatch', `Response does not match the verdict schema: ${details}`);
      }

      const checked = enforceVerdictContract(validated.data, this.contractPolicy);
      if (checked.issues.length > 0) {
        this.log.warn(
          {
            conversationId,
            coerced: checked.coerced,
            issues: checked.issues.map(formatIssue),
          },
          'Verdict contract violation'
        );
      }

      this.log.debug(
        { conversationId, inputTokens: result.inputTokens, outputTokens: result.outputTokens },
        'Conversation classified'
      );

      return {
        ok: true,
        record: { conversation_id: conversationId, llm_classification: checked.verdict },
        issues: checked.issues,
      };
    } catch (error) {
      if (error instanceof ContractViolationError) {
        return fail('contract_violation', error.message);
      }
      if (error instanceof ProviderError) {
        return fail('provider_error', `${error.provider} API error (${error.type}): ${error.message}`);
      }
      return fail('unexpected', `Unexpected error: ${errorMessage(error)}`);
    }
  }
}
