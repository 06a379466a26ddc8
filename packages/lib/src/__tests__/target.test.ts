import assert from "node:assert"
import { describe, it } from "node:test"

import { GateError } from "../errors.js"
import { formatTarget, parseTarget, parseTargetList } from "../target.js"

const isInvalidTarget = (error: unknown) =>
  error instanceof GateError && error.code === GateError.InvalidTarget

describe("parseTarget", () => {
  it("parses host:port", () => {
    assert.deepStrictEqual(parseTarget("web:8000"), { host: "web", port: 8000 })
  })

  it("parses bracketed IPv6 hosts", () => {
    assert.deepStrictEqual(parseTarget("[::1]:5432"), {
      host: "::1",
      port: 5432,
    })
  })

  it("accepts the object form with a string port", () => {
    assert.deepStrictEqual(parseTarget({ host: " db ", port: "5432" }), {
      host: "db",
      port: 5432,
    })
  })

  it("returns a frozen target", () => {
    assert.ok(Object.isFrozen(parseTarget("web:8000")))
  })

  it("rejects ports outside 1..65535", () => {
    assert.throws(() => parseTarget("web:0"), isInvalidTarget)
    assert.throws(() => parseTarget("web:65536"), isInvalidTarget)
    assert.throws(() => parseTarget({ host: "web", port: 80.5 }), isInvalidTarget)
  })

  it("rejects non-numeric ports", () => {
    assert.throws(() => parseTarget("web:http"), isInvalidTarget)
    assert.throws(() => parseTarget("web:80a"), isInvalidTarget)
    assert.throws(() => parseTarget("web:"), isInvalidTarget)
  })

  it("rejects a missing host or separator", () => {
    assert.throws(() => parseTarget(":8000"), isInvalidTarget)
    assert.throws(() => parseTarget("web"), isInvalidTarget)
  })

  it("asks for brackets around bare IPv6 hosts", () => {
    assert.throws(
      () => parseTarget("::1:5432"),
      (error: unknown) =>
        isInvalidTarget(error) &&
        error instanceof Error &&
        error.message ===
          'Invalid target "::1:5432": IPv6 hosts must be written as [host]:port'
    )
  })
})

describe("formatTarget", () => {
  it("formats plain and IPv6 hosts", () => {
    assert.strictEqual(formatTarget({ host: "web", port: 8000 }), "web:8000")
    assert.strictEqual(formatTarget({ host: "::1", port: 5432 }), "[::1]:5432")
  })
})

describe("parseTargetList", () => {
  it("splits on commas and whitespace", () => {
    assert.deepStrictEqual(parseTargetList("web:8000, db:5432  cache:6379,"), [
      { host: "web", port: 8000 },
      { host: "db", port: 5432 },
      { host: "cache", port: 6379 },
    ])
  })

  it("returns an empty list for a blank string", () => {
    assert.deepStrictEqual(parseTargetList("  "), [])
  })
})
