/**
 * Prompts and tool definitions for the three classification stages.
 *
 * Each stage forces a single function call whose parameters are a JSON schema
 * built from the service catalog, so the model can only answer with a listed
 * value.
 */

import type { ServiceCatalog } from "./service-catalog.js"
import { IMPACT_LEVELS, PRIORITY_LEVELS } from "./types.js"

export type ClassificationStage = "category" | "request_type" | "priority"

export interface ToolDefinition {
  name: string
  description: string
  parameters: Record<string, unknown>
}

export interface StagePrompt {
  system: string
  user: string
  tool: ToolDefinition
}

export const PRIORITY_GUIDELINES = `Priority Matrix (Impact vs Urgency):
- P1: High Impact + High Urgency
- P2: (High Impact + Medium Urgency) or (Medium Impact + High Urgency)
- P3: (High Impact + Low Urgency) or (Medium Impact + Medium Urgency) or (Low Impact + High Urgency)
- P4: (Medium Impact + Low Urgency) or (Low Impact + Medium/Low Urgency)

Impact Levels (based on scope of effect):
- High: Entire location/dept (251+ employees), 10,001+ customers, safety issues, or company reputation
- Medium: 101-250 employees, 1,001-10,000 customers, or business unit impact
- Low: Up to 100 employees or 1,000 customers

Urgency Levels (based on resolution timing):
- High: Complete service outage, safety risk, data breach, strict deadline (<5 days), no workaround
- Medium: Severe impact with temporary workaround, leadership impact, upcoming deadline (>5 days)
- Low: Limited impact with readily available workaround, no critical timeline`

/**
 * Tool schema for picking a category. The description lists every request
 * type so the model sees what each category covers.
 */
export function buildCategoryTool(catalog: ServiceCatalog): ToolDefinition {
  const lines = ["Available categories and their purposes:"]
  for (const category of catalog.categories) {
    lines.push("", `• ${category.name}:`)
    for (const type of category.request_types) {
      lines.push(`  - ${type.name}: ${type.description}`)
    }
  }

  return {
    name: "classify_category",
    description: "Classify a ticket into a service category",
    parameters: {
      type: "object",
      properties: {
        category: {
          type: "string",
          enum: catalog.categoryNames,
          description: lines.join("\n"),
        },
      },
      required: ["category"],
      additionalProperties: false,
    },
  }
}

/**
 * Tool schema for picking a request type within one category.
 */
export function buildRequestTypeTool(
  catalog: ServiceCatalog,
  categoryName: string
): ToolDefinition {
  const category = catalog.findCategory(categoryName)
  const types = category?.request_types ?? []
  const description = [
    "Available request types for this category:",
    ...types.map((type) => `• ${type.name}: ${type.description}`),
  ].join("\n")

  return {
    name: "classify_request_type",
    description: "Classify a ticket into a service request type",
    parameters: {
      type: "object",
      properties: {
        request_type: {
          type: "string",
          enum: types.map((type) => type.name),
          description,
        },
      },
      required: ["request_type"],
      additionalProperties: false,
    },
  }
}

export function buildPriorityTool(): ToolDefinition {
  return {
    name: "classify_priority",
    description: "Classify a ticket's priority based on impact and urgency",
    parameters: {
      type: "object",
      description: PRIORITY_GUIDELINES,
      properties: {
        impact: {
          type: "string",
          enum: [...IMPACT_LEVELS],
          description: "Assess the scope and severity of the issue's effect",
        },
        urgency: {
          type: "string",
          enum: [...IMPACT_LEVELS],
          description: "Assess how quickly the issue needs resolution",
        },
        priority: {
          type: "string",
          enum: [...PRIORITY_LEVELS],
          description: "Final priority based on impact and urgency matrix",
        },
      },
      required: ["impact", "urgency", "priority"],
      additionalProperties: false,
    },
  }
}

export function buildCategoryPrompt(
  catalog: ServiceCatalog,
  title: string,
  summary: string
): StagePrompt {
  return {
    system:
      "You are an expert system designed to classify support tickets into appropriate service categories. " +
      "You will analyze the ticket title and summary to determine the most appropriate category. " +
      "Your response must strictly conform to the provided JSON schema.",
    user: `Please classify this ticket:\nTitle: ${title}\nSummary: ${summary}`,
    tool: buildCategoryTool(catalog),
  }
}

export function buildRequestTypePrompt(
  catalog: ServiceCatalog,
  category: string,
  title: string,
  summary: string
): StagePrompt {
  return {
    system:
      "You are an expert system designed to classify support tickets into appropriate service request types. " +
      "You will analyze the ticket title and summary to determine the most appropriate request type within the given category. " +
      "Your response must strictly conform to the provided JSON schema.",
    user: `Please classify this ticket in category '${category}':\nTitle: ${title}\nSummary: ${summary}`,
    tool: buildRequestTypeTool(catalog, category),
  }
}

export function buildPriorityPrompt(title: string, summary: string): StagePrompt {
  return {
    system:
      "You are an expert system designed to classify IT service tickets based on their impact and urgency levels. " +
      "Analyze the ticket details and determine appropriate impact, urgency, and resulting priority levels according to the provided guidelines. " +
      "Your response must strictly conform to the provided JSON schema.",
    user: `Please assess the priority of this ticket:\nTitle: ${title}\nSummary: ${summary}`,
    tool: buildPriorityTool(),
  }
}
