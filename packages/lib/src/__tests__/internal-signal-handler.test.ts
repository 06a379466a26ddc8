import assert from "node:assert"
import { describe, it } from "node:test"

import { TERMINATION_SIGNALS } from "../internal/constants.js"
import {
  createSignalForwarder,
  createSignalHandler,
} from "../internal/signal-handler.js"
import { FakeChild, FakeSignals } from "./helpers.js"

describe("createSignalHandler", () => {
  it("registers termination listeners and reports the received signal", () => {
    const signals = new FakeSignals()
    const received: NodeJS.Signals[] = []

    const handler = createSignalHandler({
      signals,
      onProcessTerminated: (signal) => received.push(signal),
      onAborted: () => {
        // not used in this test
      },
    })

    for (const sig of TERMINATION_SIGNALS) {
      assert.strictEqual(signals.count(sig), 1, `Expected one listener for ${sig}`)
    }

    signals.emit("SIGINT")
    assert.deepStrictEqual(received, ["SIGINT"])

    handler.cleanup()
    assert.strictEqual(signals.count(), 0)
  })

  it("subscribes to the AbortSignal and unsubscribes on cleanup", () => {
    const controller = new AbortController()
    let aborted = 0

    const handler = createSignalHandler({
      signals: new FakeSignals(),
      abortSignal: controller.signal,
      onAborted: () => {
        aborted++
      },
      onProcessTerminated: () => {
        // not used here
      },
    })

    controller.abort()
    assert.strictEqual(aborted, 1)
    handler.cleanup()
  })

  it("does not call onAborted after cleanup", () => {
    const controller = new AbortController()
    let aborted = 0

    const handler = createSignalHandler({
      signals: new FakeSignals(),
      abortSignal: controller.signal,
      onAborted: () => {
        aborted++
      },
      onProcessTerminated: () => {
        // not used here
      },
    })

    handler.cleanup()
    controller.abort()
    assert.strictEqual(aborted, 0)
  })
})

describe("createSignalForwarder", () => {
  it("kills the child with each forwarded signal", () => {
    const signals = new FakeSignals()
    const child = new FakeChild(1)
    child.exitOnKill = false
    const forwarded: NodeJS.Signals[] = []

    const forwarder = createSignalForwarder({
      child,
      forward: ["SIGTERM", "SIGHUP"],
      signals,
      onForwarded: (signal) => forwarded.push(signal),
    })

    signals.emit("SIGHUP")
    signals.emit("SIGTERM")
    signals.emit("SIGINT")

    assert.deepStrictEqual(child.killed, ["SIGHUP", "SIGTERM"])
    assert.deepStrictEqual(forwarded, ["SIGHUP", "SIGTERM"])

    forwarder.cleanup()
    signals.emit("SIGTERM")
    assert.deepStrictEqual(child.killed, ["SIGHUP", "SIGTERM"])
    assert.strictEqual(signals.count(), 0)
  })

  it("handles but does not pass on signals the child already received", () => {
    const signals = new FakeSignals()
    const child = new FakeChild(1)
    child.exitOnKill = false

    const forwarder = createSignalForwarder({
      child,
      forward: ["SIGINT", "SIGTERM"],
      delivered: ["SIGINT"],
      signals,
    })

    assert.strictEqual(signals.count("SIGINT"), 1)
    signals.emit("SIGINT")
    signals.emit("SIGTERM")
    assert.deepStrictEqual(child.killed, ["SIGTERM"])

    forwarder.cleanup()
    assert.strictEqual(signals.count(), 0)
  })
})
