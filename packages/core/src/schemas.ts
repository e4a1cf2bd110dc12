/**
 * Zod validation schemas for mdadf input.
 *
 * Document JSON is checked before it reaches the serializer, so a malformed
 * file fails with the path of the bad value instead of deep inside a render.
 */

import { z } from 'zod';
import type { AdfMark, AdfNode, JsonValue } from '@mdadf/types';

// ============================================================================
// Document Schemas
// ============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const AdfAttrsSchema = z.record(JsonValueSchema);

export const AdfMarkSchema: z.ZodType<AdfMark> = z.object({
  type: z.string().min(1, 'Mark type must not be empty'),
  attrs: AdfAttrsSchema.optional(),
}).strict();

export const AdfNodeSchema: z.ZodType<AdfNode> = z.lazy(() =>
  z.object({
    type: z.string().min(1, 'Node type must not be empty'),
    attrs: AdfAttrsSchema.optional(),
    content: z.array(AdfNodeSchema).optional(),
    text: z.string().optional(),
    marks: z.array(AdfMarkSchema).optional(),
    version: z.number().int().optional(),
  }).strict().superRefine((node, ctx) => {
    if (node.type === 'text' && node.text === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'text nodes require a "text" string', path: ['text'] });
    }
  })
);

/** A full document: the root must be `doc`. */
export const AdfDocumentSchema = AdfNodeSchema.refine(node => node.type === 'doc', {
  message: 'Document root must have type "doc"',
  path: ['type'],
});

// ============================================================================
// Config Schemas
// ============================================================================

export const MdAdfConfigSchema = z.object({
  /** Treat parser warnings as failures */
  strict: z.boolean().default(false),
  /** Report format */
  format: z.enum(['text', 'json']).default('text'),
  /** Indentation of written document JSON */
  jsonIndent: z.number().int().min(0).max(10).default(2),
  /** Require a `doc` root for to-md and check */
  requireDocRoot: z.boolean().default(false),
}).strict();

// ============================================================================
// Inferred Types
// ============================================================================

export type MdAdfConfig = z.infer<typeof MdAdfConfigSchema>;
