import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultConfig } from "../../src/core/config.js"
import { processDocument } from "../../src/core/document.js"
import {
  allocationError,
  configError,
  depthLimitError,
  documentError,
  fileError,
  inputTooLarge,
  ownershipError,
  syntaxError,
  trailingDataError,
  typeMismatchError
} from "../../src/core/errors.js"
import {
  buildReport,
  describeAppError,
  describeEngineError,
  renderHumanReport,
  renderJsonReport
} from "../../src/core/report.js"
import type { FileOutcome } from "../../src/core/types.js"
import { leftOf, rightOf } from "./test-helpers.js"

const outcomes: ReadonlyArray<FileOutcome> = [
  {
    _tag: "FileOk",
    path: "a.json",
    stats: { inputBytes: 5, nodes: 3, peakBytes: 64 },
    output: undefined
  },
  {
    _tag: "FileFailed",
    path: "b.json",
    failure: documentError("b.json", syntaxError("Unterminated array", { offset: 2, line: 1, column: 3 }))
  }
]

describe("describeEngineError", () => {
  it.effect("renders every engine error on one line", () =>
    Effect.sync(() => {
      const position = { offset: 10, line: 2, column: 4 }
      expect(describeEngineError(syntaxError("Invalid literal", position))).toBe(
        "Invalid literal at line 2, column 4"
      )
      expect(describeEngineError(trailingDataError(position))).toBe(
        "Unexpected data after the top-level value at line 2, column 4"
      )
      expect(describeEngineError(depthLimitError(8, position))).toBe("Nesting deeper than 8 levels at line 2, column 4")
      expect(describeEngineError(depthLimitError(8))).toBe("Nesting deeper than 8 levels")
      expect(describeEngineError(allocationError(16, 40, 50))).toBe(
        "Memory limit of 50 bytes exceeded (requested 16, in use 40)"
      )
      expect(describeEngineError(typeMismatchError("String", "Number"))).toBe("Expected String but found Number")
      expect(describeEngineError(ownershipError("value was already destroyed"))).toBe("value was already destroyed")
    }))

  it.effect("prefixes document failures with their path", () =>
    Effect.sync(() => {
      expect(describeAppError({ _tag: "CliError", message: "Unknown command: lint" })).toBe("Unknown command: lint")
      expect(describeAppError(configError("maxDepth is missing"))).toBe("Invalid config: maxDepth is missing")
      expect(describeAppError(fileError("Config file not found: x.json"))).toBe("Config file not found: x.json")
      expect(describeAppError(inputTooLarge("big.json", 20, 10))).toBe(
        "big.json: File is 20 bytes, above the limit of 10"
      )
    }))
})

describe("reports", () => {
  it.effect("human report lists each file and a summary", () =>
    Effect.sync(() => {
      const report = buildReport("check", outcomes)
      expect(report.stats).toEqual({ checked: 2, passed: 1, failed: 1 })
      expect(renderHumanReport(report)).toBe(
        [
          "ok   a.json (3 values)",
          "FAIL b.json: Unterminated array at line 1, column 3",
          "1 of 2 files valid"
        ].join("\n")
      )
    }))

  it.effect("JSON report is rendered by the engine with two-space indent", () =>
    Effect.sync(() => {
      const text = rightOf(renderJsonReport(buildReport("check", outcomes)))
      const expected = {
        command: "check",
        files: [
          { path: "a.json", ok: true, inputBytes: 5, values: 3, peakBytes: 64 },
          {
            path: "b.json",
            ok: false,
            error: {
              tag: "SyntaxError",
              message: "Unterminated array at line 1, column 3",
              offset: 2,
              line: 1,
              column: 3
            }
          }
        ],
        stats: { checked: 2, passed: 1, failed: 1 }
      }
      expect(text).toBe(JSON.stringify(expected, null, 2))
    }))
})

describe("processDocument", () => {
  it.effect("check only parses and reports sizes", () =>
    Effect.sync(() => {
      expect(rightOf(processDocument("check", "[1,2]", defaultConfig))).toEqual({
        stats: { inputBytes: 5, nodes: 3, peakBytes: 64 },
        output: undefined
      })
    }))

  it.effect("format and minify end the output with one line break", () =>
    Effect.sync(() => {
      expect(rightOf(processDocument("format", "{\"a\":[1]}", defaultConfig)).output).toBe(
        "{\n  \"a\": [\n    1\n  ]\n}\n"
      )
      expect(rightOf(processDocument("format", "{\"a\":[1]}", { ...defaultConfig, indent: 1 })).output).toBe(
        "{\n \"a\": [\n  1\n ]\n}\n"
      )
      expect(rightOf(processDocument("minify", "{ \"a\" : [ 1 ] }\n", defaultConfig)).output).toBe(
        "{\"a\":[1]}\n"
      )
    }))

  it.effect("applies the configured limits", () =>
    Effect.sync(() => {
      expect(leftOf(processDocument("check", "[1,2,3]", { ...defaultConfig, memoryLimitBytes: 50 }))).toEqual(
        allocationError(16, 40, 50)
      )
      expect(leftOf(processDocument("check", "[[1]]", { ...defaultConfig, maxDepth: 1 }))._tag).toBe(
        "DepthLimitError"
      )
      expect(leftOf(processDocument("check", "01", { ...defaultConfig, conformance: "strict" }))._tag).toBe(
        "SyntaxError"
      )
    }))

  it.effect("counts input bytes, not characters, for byte input", () =>
    Effect.sync(() => {
      const bytes = new TextEncoder().encode("\"é\"")
      expect(rightOf(processDocument("check", bytes, defaultConfig)).stats.inputBytes).toBe(4)
    }))
})
