/**
 * Chat export type definitions
 * Based on the conversation export format of the support chat platform
 */

import { z } from 'zod';

/**
 * Opaque identifiers and timestamps: strings or numbers, kept as strings
 */
export const OpaqueValueSchema = z.union([z.string(), z.number()]).transform(value => String(value));

/**
 * Message content block
 */
export const RawContentSchema = z.object({
  text: z.string().nullable().optional(),
}).passthrough();
export type RawContent = z.infer<typeof RawContentSchema>;

/**
 * A single exported message
 */
export const RawMessageSchema = z.object({
  type: z.string().nullable().optional(),
  is_internal: z.boolean().nullable().optional(),
  sender_id: OpaqueValueSchema.nullable().optional(),
  content: RawContentSchema.nullable().optional(),
  id: OpaqueValueSchema.nullable().optional(),
  created_at: OpaqueValueSchema.nullable().optional(),
}).passthrough();
export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * One exported conversation
 */
export const RawRecordSchema = z.object({
  conversation_id: OpaqueValueSchema.nullable().optional(),
  messages: z.array(RawMessageSchema).nullable().optional(),
}).passthrough();
export type RawRecord = z.infer<typeof RawRecordSchema>;
