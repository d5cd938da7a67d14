/**
 * Parsing of forced tool-call arguments returned by the model.
 * Uses jsonrepair for slightly malformed JSON and zod for validation.
 */

import { jsonrepair } from "jsonrepair"
import { z } from "zod"
import {
  IMPACT_LEVELS,
  PRIORITY_LEVELS,
  type Impact,
  type Priority,
  type Urgency,
} from "./types.js"

export const CategoryArgumentsSchema = z.object({ category: z.string() })
export const RequestTypeArgumentsSchema = z.object({ request_type: z.string() })
export const PriorityArgumentsSchema = z.object({
  impact: z.enum(IMPACT_LEVELS),
  urgency: z.enum(IMPACT_LEVELS),
  priority: z.enum(PRIORITY_LEVELS).optional(),
})

export interface PriorityAssessment {
  impact: Impact
  urgency: Urgency
  /** The model's own priority, kept for logging; the matrix decides */
  priority: Priority | null
}

/**
 * Parse a tool-call argument string into JSON.
 *
 * @throws SyntaxError if the text cannot be parsed even after repair
 */
export function parseToolArguments(text: string): unknown {
  let repaired: string
  try {
    repaired = jsonrepair(text)
  } catch {
    repaired = text
  }
  return JSON.parse(repaired)
}

/**
 * Extract a value that must be one of `allowed`; anything else is treated as no answer.
 */
function pickAllowed(value: string, allowed: readonly string[]): string | null {
  const trimmed = value.trim()
  return allowed.includes(trimmed) ? trimmed : null
}

export function parseCategoryArguments(text: string, allowed: readonly string[]): string | null {
  const parsed = CategoryArgumentsSchema.safeParse(parseToolArguments(text))
  return parsed.success ? pickAllowed(parsed.data.category, allowed) : null
}

export function parseRequestTypeArguments(text: string, allowed: readonly string[]): string | null {
  const parsed = RequestTypeArgumentsSchema.safeParse(parseToolArguments(text))
  return parsed.success ? pickAllowed(parsed.data.request_type, allowed) : null
}

export function parsePriorityArguments(text: string): PriorityAssessment | null {
  const parsed = PriorityArgumentsSchema.safeParse(parseToolArguments(text))
  if (!parsed.success) return null
  return {
    impact: parsed.data.impact,
    urgency: parsed.data.urgency,
    priority: parsed.data.priority ?? null,
  }
}
