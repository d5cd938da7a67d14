/**
 * OpenAI implementation of the classification port.
 *
 * A ticket goes through three forced tool calls: category, request type within
 * that category, then impact and urgency (mapped to a priority). Every call is
 * retried with capped exponential backoff; once a stage exhausts its attempts
 * the ticket fails with a ClassificationError.
 */

import OpenAI from "openai"
import { ClassificationError, getErrorMessage } from "../errors.js"
import { createModuleLogger } from "../logger.js"
import { priorityFromImpactUrgency } from "./priority-matrix.js"
import {
  buildCategoryPrompt,
  buildPriorityPrompt,
  buildRequestTypePrompt,
  type ClassificationStage,
  type StagePrompt,
} from "./prompt-builder.js"
import {
  parseCategoryArguments,
  parsePriorityArguments,
  parseRequestTypeArguments,
} from "./response-parser.js"
import { withRetry, type RetryOptions } from "./retry.js"
import type { ServiceCatalog } from "./service-catalog.js"
import type { ClassificationResult, ClassifyOptions, TicketClassifier } from "./types.js"

const log = createModuleLogger("openai-classifier")

/**
 * The slice of the OpenAI SDK the classifier calls.
 */
export interface ChatCompletionsApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<OpenAI.ChatCompletion>
}

export interface OpenAIClassifierOptions {
  catalog: ServiceCatalog
  model: string
  /** Attempts per stage */
  maxRetries: number
  apiKey?: string
  /** Per-request timeout passed to the SDK */
  timeoutMs?: number
  /** Injected completions API (tests) */
  completions?: ChatCompletionsApi
  retry?: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "sleep">
}

function createCompletionsApi(
  apiKey: string | undefined,
  timeoutMs: number | undefined
): ChatCompletionsApi {
  const client = new OpenAI({
    apiKey,
    timeout: timeoutMs,
    // Retries are handled per stage by withRetry
    maxRetries: 0,
  })
  return {
    create: (body, options) => client.chat.completions.create(body, options),
  }
}

export class OpenAITicketClassifier implements TicketClassifier {
  private readonly catalog: ServiceCatalog
  private readonly model: string
  private readonly maxRetries: number
  private readonly completions: ChatCompletionsApi
  private readonly retry: OpenAIClassifierOptions["retry"]

  constructor(options: OpenAIClassifierOptions) {
    this.catalog = options.catalog
    this.model = options.model
    this.maxRetries = options.maxRetries
    this.completions =
      options.completions ?? createCompletionsApi(options.apiKey, options.timeoutMs)
    this.retry = options.retry
  }

  async classify(
    title: string,
    summary: string,
    options: ClassifyOptions = {}
  ): Promise<ClassificationResult> {
    const { signal } = options

    const category = await this.runStage(
      "category",
      buildCategoryPrompt(this.catalog, title, summary),
      (args) => parseCategoryArguments(args, this.catalog.categoryNames),
      signal
    )
    if (!category) {
      log.warn({ title }, "No category returned")
      return { category: null, requestType: null, priority: null }
    }

    const requestType = await this.runStage(
      "request_type",
      buildRequestTypePrompt(this.catalog, category, title, summary),
      (args) => parseRequestTypeArguments(args, this.catalog.requestTypeNames(category)),
      signal
    )
    if (!requestType) {
      log.warn({ title, category }, "No request type returned")
      return { category, requestType: null, priority: null }
    }

    const assessment = await this.runStage(
      "priority",
      buildPriorityPrompt(title, summary),
      parsePriorityArguments,
      signal
    )
    if (!assessment) {
      log.warn({ title, category, requestType }, "No priority assessment returned")
      return { category, requestType, priority: null }
    }

    const priority = priorityFromImpactUrgency(assessment.impact, assessment.urgency)
    if (assessment.priority && assessment.priority !== priority) {
      log.debug(
        { title, ...assessment, modelPriority: assessment.priority, priority },
        "Model priority disagrees with matrix; using matrix"
      )
    }

    return { category, requestType, priority }
  }

  private async runStage<T>(
    stage: ClassificationStage,
    prompt: StagePrompt,
    parse: (args: string) => T | null,
    signal: AbortSignal | undefined
  ): Promise<T | null> {
    try {
      return await withRetry(
        async () => parse(await this.callTool(prompt, signal)),
        {
          ...this.retry,
          maxAttempts: this.maxRetries,
          operation: `${stage}_classification`,
          signal,
        }
      )
    } catch (error) {
      if (signal?.aborted) throw error
      const attempts = `${this.maxRetries} attempt(s)`
      throw new ClassificationError(
        stage,
        `${stage} classification failed after ${attempts}: ${getErrorMessage(error)}`,
        { cause: error }
      )
    }
  }

  /**
   * @returns Arguments of the forced tool call
   * @throws If the completion carries no tool call, so the attempt is retried
   */
  private async callTool(prompt: StagePrompt, signal: AbortSignal | undefined): Promise<string> {
    const completion = await this.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        tools: [{ type: "function", function: prompt.tool }],
        tool_choice: { type: "function", function: { name: prompt.tool.name } },
      },
      { signal }
    )
    const toolCall = completion.choices[0]?.message.tool_calls?.[0]
    if (!toolCall) {
      throw new Error(`No ${prompt.tool.name} tool call in the completion`)
    }
    return toolCall.function.arguments
  }
}
