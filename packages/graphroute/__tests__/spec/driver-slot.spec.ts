/**
 * Driver Slot Tests
 */

import pino from "pino"
import { describe, it, expect, beforeEach } from "vitest"
import { DriverSlot } from "../../src"
import { FakeDriver, defaultResponder } from "./fixtures/drivers"

const logger = pino({ level: "silent" })

describe("DriverSlot", () => {
  let first: FakeDriver
  let second: FakeDriver
  let slot: DriverSlot

  beforeEach(() => {
    first = new FakeDriver("fake-bolt", "core1:7687", defaultResponder)
    second = new FakeDriver("fake-bolt", "replica1:7687", defaultResponder)
    slot = new DriverSlot(first, logger)
  })

  it("should open one session lazily", () => {
    expect(slot.hasSession).toBe(false)

    const session = slot.ensureSession()

    expect(slot.ensureSession()).toBe(session)
    expect(first.sessions).toHaveLength(1)
  })

  it("should drop the session when the driver is replaced", async () => {
    slot.ensureSession()

    await slot.replaceDriver(second)

    expect(slot.driver).toBe(second)
    expect(slot.hasSession).toBe(false)
    expect(first.sessions[0]?.close).toHaveBeenCalledTimes(1)
    expect(first.close).toHaveBeenCalledTimes(1)
    expect(slot.ensureSession()).toBe(second.sessions[0])
  })

  it("should keep a driver that replaces itself open", async () => {
    await slot.replaceDriver(first)

    expect(first.close).not.toHaveBeenCalled()
  })

  it("should swap and close the old driver when its session fails to close", async () => {
    slot.ensureSession()
    first.sessions[0]?.close.mockRejectedValueOnce(new Error("socket reset"))

    await expect(slot.replaceDriver(second)).resolves.toBeUndefined()

    expect(slot.driver).toBe(second)
    expect(first.close).toHaveBeenCalledTimes(1)
  })

  it("should swap when the old driver fails to close", async () => {
    first.close.mockRejectedValueOnce(new Error("pool busy"))

    await slot.replaceDriver(second)

    expect(slot.driver).toBe(second)
  })

  it("should close the driver even when the session fails to close", async () => {
    slot.ensureSession()
    first.sessions[0]?.close.mockRejectedValueOnce(new Error("socket reset"))

    await expect(slot.close()).rejects.toThrow("socket reset")

    expect(first.close).toHaveBeenCalledTimes(1)
    expect(slot.hasSession).toBe(false)
  })
})
