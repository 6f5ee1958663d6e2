/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";

// Arguments stay a raw string here: the tool engine parses them and records bad JSON
export const ToolCallRequestSchema = z
  .object({
    id: z.string().min(1).max(200),
    type: z.literal("function").optional(),
    function: z
      .object({
        name: z.string().min(1).max(100),
        arguments: z.string().max(1024 * 1024),
      })
      .strict(),
  })
  .strict();

export const BatchRequestSchema = z
  .object({
    session_id: z
      .string()
      .min(1)
      .max(128)
      .regex(/^[A-Za-z0-9_-]+$/, "session_id may only contain letters, digits, '-' and '_'")
      .optional(),
    tool_calls: z.array(ToolCallRequestSchema).min(1).max(100),
  })
  .strict();

export type BatchRequest = z.infer<typeof BatchRequestSchema>;
