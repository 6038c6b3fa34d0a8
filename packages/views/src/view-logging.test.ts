import { configure, getLogger, type LogRecord, reset } from "@logtape/logtape"
import { ObservableRingBuffer } from "@ringview/collections"
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest"
import { createFilter } from "./filters.js"
import { createView } from "./view.js"

describe("view logging", () => {
  const records: LogRecord[] = []

  beforeAll(async () => {
    await configure({
      reset: true,
      sinks: {
        buffer: record => {
          records.push(record)
        },
      },
      loggers: [
        { category: ["ringview"], lowestLevel: "trace", sinks: ["buffer"] },
        { category: ["grid"], lowestLevel: "trace", sinks: ["buffer"] },
        { category: ["logtape", "meta"], lowestLevel: "fatal", sinks: [] },
      ],
    })
  })

  afterAll(async () => {
    await reset()
  })

  beforeEach(() => {
    records.length = 0
  })

  it("records the view lifecycle at debug and each change at trace", () => {
    const source = new ObservableRingBuffer([1, 2])
    const view = createView(source, n => n, { name: "numbers" })

    view.attachFilter(createFilter({ isMatch: () => true }))
    source.addLast(3)
    view.resetFilter()
    view.dispose()

    expect(records.map(r => r.category)).toEqual(
      Array.from({ length: 5 }, () => ["ringview", "view"]),
    )
    expect(records.map(r => [r.level, r.properties])).toEqual([
      ["debug", { name: "numbers", count: 2, reverse: false }],
      ["debug", { name: "numbers", count: 2 }],
      ["trace", { name: "numbers", action: "add", index: 2, count: 3 }],
      ["debug", { name: "numbers" }],
      ["debug", { name: "numbers" }],
    ])
  })

  it("writes to a preferred logger", () => {
    const source = new ObservableRingBuffer<string>()
    const view = createView(source, s => s, {
      logger: getLogger(["grid"]),
      reverse: true,
    })

    source.clear()
    view.dispose()

    expect(records.map(r => r.category)).toEqual([
      ["grid", "view"],
      ["grid", "view"],
      ["grid", "view"],
    ])
    expect(records.map(r => [r.level, r.properties])).toEqual([
      ["debug", { name: "view", count: 0, reverse: true }],
      ["trace", { name: "view", action: "reset", index: -1, count: 0 }],
      ["debug", { name: "view" }],
    ])
  })
})
