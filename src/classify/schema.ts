/**
 * Classification verdict schema
 * Zod schema for validating responses and the JSON schema sent with requests
 */

import { z } from 'zod';

/**
 * Service categories the classifier may assign
 */
export const CATEGORIES = [
  'Düğün Mekanları',
  'Düğün Organizasyon',
  'Kına Gecesi',
  'Nişan ve Söz',
  'Mezuniyet ve Balo',
  'Doğum Günü & Baby Shower',
  'Düğün Fotoğrafçıları',
  'Catering Firmaları',
  'Gelinlik ve Moda Evleri',
  'Abiye ve Damatlık',
  'Orkestra & DJ',
  'Saç ve Makyaj',
  'Davetiye ve Hediyelikler',
  'Pasta',
  'Alyans ve Takı',
  'Balayı',
  'Diğer',
] as const;

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export const RATINGS = ['good', 'acceptable', 'poor'] as const;

export const SentimentSchema = z.enum(SENTIMENTS);
export const RatingSchema = z.enum(RATINGS);
export const CategorySchema = z.enum(CATEGORIES);

export type Sentiment = z.infer<typeof SentimentSchema>;
export type Rating = z.infer<typeof RatingSchema>;
export type Category = z.infer<typeof CategorySchema>;

/**
 * Structured verdict for one conversation
 */
export const ClassificationVerdictSchema = z.object({
  overall_sentiment: SentimentSchema,
  bot_understanding: RatingSchema,
  bot_performance: RatingSchema,
  categories: z
    .array(CategorySchema)
    .min(1, 'At least one category is required')
    .max(3, 'At most three categories are allowed')
    .refine(items => new Set(items).size === items.length, 'Categories must be distinct'),
  to_improve_understanding: z.string().nullable(),
  to_improve_performance: z.string().nullable(),
}).strict();

export type ClassificationVerdict = z.infer<typeof ClassificationVerdictSchema>;

/**
 * Persisted pairing of a conversation with its verdict
 */
export const AnalysisRecordSchema = z.object({
  conversation_id: z.string(),
  llm_classification: ClassificationVerdictSchema,
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

/**
 * Name of the structured output format
 */
export const VERDICT_SCHEMA_NAME = 'conversation_analysis';

/**
 * JSON schema for the structured output request
 */
export const VERDICT_JSON_SCHEMA = {
  type: 'object',
  properties: {
    overall_sentiment: {
      type: 'string',
      enum: [...SENTIMENTS],
      description: "User's overall sentiment: positive, neutral, or negative",
    },
    bot_understanding: {
      type: 'string',
      enum: ['poor', 'acceptable', 'good'],
      description: "How well the bot understood the user's request",
    },
    bot_performance: {
      type: 'string',
      enum: ['poor', 'acceptable', 'good'],
      description: 'How well the bot performed in finding relevant options',
    },
    categories: {
      type: 'array',
      items: {
        type: 'string',
        enum: [...CATEGORIES],
      },
      minItems: 1,
      maxItems: 3,
      description: 'Up to 3 relevant categories from the predefined list',
    },
    to_improve_understanding: {
      type: ['string', 'null'],
      description: 'Explanation of understanding issues in Turkish (null if good)',
    },
    to_improve_performance: {
      type: ['string', 'null'],
      description: 'Explanation of performance issues in Turkish (null if good)',
    },
  },
  required: [
    'overall_sentiment',
    'bot_understanding',
    'bot_performance',
    'categories',
    'to_improve_understanding',
    'to_improve_performance',
  ],
  additionalProperties: false,
} satisfies Record<string, unknown>;
