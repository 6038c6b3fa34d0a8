import { describe, expect, it } from "vitest"
import { LockOrderError } from "./errors.js"
import { SyncRoot } from "./sync-root.js"

describe("SyncRoot", () => {
  it("returns the result of the critical section", () => {
    const lock = new SyncRoot("view")

    expect(lock.run(() => 42)).toBe(42)
  })

  it("reports whether it is held", () => {
    const lock = new SyncRoot("source")

    expect(lock.isHeld).toBe(false)
    const inside = lock.run(() => lock.isHeld)
    expect(inside).toBe(true)
    expect(lock.isHeld).toBe(false)
  })

  it("is re-entrant", () => {
    const lock = new SyncRoot("source")

    const result = lock.run(() => lock.run(() => lock.run(() => "deep")))

    expect(result).toBe("deep")
    expect(lock.isHeld).toBe(false)
  })

  it("releases the lock when the section throws", () => {
    const lock = new SyncRoot("view")

    expect(() =>
      lock.run(() => {
        throw new Error("boom")
      }),
    ).toThrow("boom")
    expect(lock.isHeld).toBe(false)
  })

  it("allows a view lock inside a source lock", () => {
    const source = new SyncRoot("source", "numbers")
    const view = new SyncRoot("view", "squares")

    expect(source.run(() => view.run(() => "ok"))).toBe("ok")
  })

  it("allows one view lock inside another", () => {
    const first = new SyncRoot("view", "first")
    const second = new SyncRoot("view", "second")

    expect(first.run(() => second.run(() => "ok"))).toBe("ok")
  })

  it("rejects a source lock taken inside a view lock", () => {
    const source = new SyncRoot("source", "numbers")
    const view = new SyncRoot("view", "squares")

    expect(() => view.run(() => source.run(() => "never"))).toThrow(
      new LockOrderError("numbers", "squares"),
    )
    expect(source.isHeld).toBe(false)
    expect(view.isHeld).toBe(false)
  })

  it("allows re-entering a source lock that is already held", () => {
    const source = new SyncRoot("source", "numbers")
    const view = new SyncRoot("view", "squares")

    const result = source.run(() => view.run(() => source.run(() => "again")))

    expect(result).toBe("again")
  })

  it("uses the rank as the default name", () => {
    expect(new SyncRoot("view").name).toBe("view")
    expect(new SyncRoot("source", "orders").name).toBe("orders")
  })
})
