import { describe, it, expect } from "vitest"
import {
  buildCategoryPrompt,
  buildPriorityTool,
  buildRequestTypePrompt,
} from "./prompt-builder.js"
import { createTestCatalog } from "../../test/test-catalog.js"

describe("buildCategoryPrompt", () => {
  it("restricts the answer to catalog categories and lists their request types", () => {
    const prompt = buildCategoryPrompt(createTestCatalog(), "VPN down", "Cannot connect")

    expect(prompt.user).toBe("Please classify this ticket:\nTitle: VPN down\nSummary: Cannot connect")
    expect(prompt.tool.name).toBe("classify_category")
    expect(prompt.tool.parameters).toMatchObject({
      required: ["category"],
      properties: {
        category: { type: "string", enum: ["Access Management", "Network & Connectivity"] },
      },
    })
    expect(JSON.stringify(prompt.tool.parameters)).toContain("VPN Issue: Remote access VPN problems")
  })
})

describe("buildRequestTypePrompt", () => {
  it("scopes the request types to the chosen category", () => {
    const prompt = buildRequestTypePrompt(
      createTestCatalog(),
      "Access Management",
      "Locked out",
      "Password expired"
    )

    expect(prompt.tool.name).toBe("classify_request_type")
    expect(prompt.tool.parameters).toMatchObject({
      properties: { request_type: { enum: ["Password Reset", "Access Request"] } },
    })
    expect(prompt.user).toContain("category 'Access Management'")
  })
})

describe("buildPriorityTool", () => {
  it("asks for impact, urgency and priority on fixed scales", () => {
    expect(buildPriorityTool().parameters).toMatchObject({
      required: ["impact", "urgency", "priority"],
      properties: {
        impact: { enum: ["High", "Medium", "Low"] },
        urgency: { enum: ["High", "Medium", "Low"] },
        priority: { enum: ["P1", "P2", "P3", "P4"] },
      },
    })
  })
})
