import { describe, it, expect, vi, afterEach } from "vitest"
import { abortableSleep, computeBackoffMs, withRetry } from "./retry.js"

vi.mock("../logger.js", () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn() }
  return { logger: log, createModuleLogger: vi.fn(() => log) }
})

describe("computeBackoffMs", () => {
  it("doubles from the base delay and caps at the maximum", () => {
    expect(computeBackoffMs(1)).toBe(2000)
    expect(computeBackoffMs(2)).toBe(4000)
    expect(computeBackoffMs(3)).toBe(8000)
    expect(computeBackoffMs(4)).toBe(10000)
    expect(computeBackoffMs(2, 100, 150)).toBe(150)
  })
})

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("timeout")).mockResolvedValueOnce("ok")
    const sleep = vi.fn().mockResolvedValue(undefined)

    await expect(withRetry(fn, { sleep })).resolves.toBe("ok")
    expect(fn).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(2000, undefined)
  })

  it("rethrows the last error once attempts are exhausted", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"))
    const sleep = vi.fn().mockResolvedValue(undefined)

    await expect(withRetry(fn, { maxAttempts: 3, sleep })).rejects.toThrow("third")
    expect(fn).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000])
  })

  it("does not retry once the signal is aborted", async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn().mockRejectedValue(new Error("aborted"))
    const sleep = vi.fn().mockResolvedValue(undefined)

    await expect(withRetry(fn, { signal: controller.signal, sleep })).rejects.toThrow("aborted")
    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })
})

describe("abortableSleep", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("resolves after the delay", async () => {
    vi.useFakeTimers()
    const sleeping = abortableSleep(1000)

    await vi.advanceTimersByTimeAsync(1000)

    await expect(sleeping).resolves.toBeUndefined()
  })

  it("rejects with the abort reason when aborted", async () => {
    const controller = new AbortController()
    const sleeping = abortableSleep(60_000, controller.signal)

    controller.abort(new Error("shutdown"))

    await expect(sleeping).rejects.toThrow("shutdown")
  })

  it("rejects immediately when already aborted", async () => {
    const controller = new AbortController()
    controller.abort(new Error("already"))

    await expect(abortableSleep(10, controller.signal)).rejects.toThrow("already")
  })
})
