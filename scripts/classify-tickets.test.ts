import { describe, it, expect, vi } from "vitest"
import { InvalidArgumentError } from "commander"
import { loadConfig } from "../src/lib/config.js"
import { applyOverrides, isAffirmative, parsePositiveInt, program } from "./classify-tickets.js"

vi.mock("../src/lib/logger.js", () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn() }
  return { logger: log, logFilePath: null, createModuleLogger: vi.fn(() => log) }
})

describe("parsePositiveInt", () => {
  it("accepts positive integers", () => {
    expect(parsePositiveInt("1")).toBe(1)
    expect(parsePositiveInt("250")).toBe(250)
  })

  it.each(["0", "-3", "1.5", "abc", ""])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError)
  })
})

describe("applyOverrides", () => {
  it("replaces only the values given on the command line", () => {
    const config = loadConfig({})

    const overridden = applyOverrides(config, { batchSize: 16, checkpointInterval: 10 })

    expect(overridden.parallelBatchSize).toBe(16)
    expect(overridden.checkpointInterval).toBe(10)
    expect(overridden.parallelRequests).toBe(4)
    expect(config.parallelBatchSize).toBe(8)
  })
})

describe("isAffirmative", () => {
  it("accepts y and yes in any case", () => {
    expect(isAffirmative("y")).toBe(true)
    expect(isAffirmative(" YES ")).toBe(true)
    expect(isAffirmative("")).toBe(false)
    expect(isAffirmative("no")).toBe(false)
  })
})

describe("program", () => {
  it("registers the process, cleanup, save and version commands", () => {
    expect(program.commands.map((command) => command.name())).toEqual([
      "process",
      "cleanup",
      "save",
      "version",
    ])
  })

  it("offers the process overrides", () => {
    const processCommand = program.commands.find((command) => command.name() === "process")

    expect(processCommand?.options.map((option) => option.long)).toEqual([
      "--fresh",
      "--batch-size",
      "--parallel-requests",
      "--checkpoint-interval",
      "--no-status-bar",
    ])
  })
})
