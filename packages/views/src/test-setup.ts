// Test setup: surface warnings and errors from ringview loggers on the console

import { configure, getConsoleSink } from "@logtape/logtape"

await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
  },
  loggers: [
    {
      category: ["ringview"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
