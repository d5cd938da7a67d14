/**
 * Classification port: the boundary between the batch engine and whatever
 * oracle labels a ticket.
 */

export const PRIORITY_LEVELS = ["P1", "P2", "P3", "P4"] as const
export type Priority = (typeof PRIORITY_LEVELS)[number]

export const IMPACT_LEVELS = ["High", "Medium", "Low"] as const
export type Impact = (typeof IMPACT_LEVELS)[number]
export type Urgency = Impact

export interface ClassificationResult {
  category: string | null
  requestType: string | null
  priority: Priority | null
}

export interface CompleteClassification extends ClassificationResult {
  category: string
  requestType: string
  priority: Priority
}

export interface ClassifyOptions {
  /** Aborted when the run is cancelled; implementations stop retrying and reject */
  signal?: AbortSignal
}

/**
 * Implementations perform the staged category, request-type and priority calls
 * and own their retries. A rejection means every attempt was exhausted; a
 * result with trailing nulls means a later stage produced no answer.
 */
export interface TicketClassifier {
  classify(title: string, summary: string, options?: ClassifyOptions): Promise<ClassificationResult>
}
