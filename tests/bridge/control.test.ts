/**
 * Path: tests/bridge/control.test.ts
 */

import {
    applyUpdatePayload,
    parseUpdatePayload,
} from "../../src/bridge/control"
import { CpuMetric } from "../../src/metrics/CpuMetric"
import { ErrorCode } from "../../src/errors/types"
import { MockMetric } from "../mock/MockMetric"

describe("parseUpdatePayload", () => {
    test("treats an empty payload as no settings", () => {
        expect(parseUpdatePayload(Buffer.from("  "))).toEqual({})
    })

    test("reads known string fields", () => {
        expect(
            parseUpdatePayload(
                '{"interval":"5s","selection_mode":"max","other":"x"}'
            )
        ).toEqual({ interval: "5s", selection_mode: "max" })
    })

    test("rejects invalid JSON", () => {
        expect(() => parseUpdatePayload("{bad")).toThrow(
            expect.objectContaining({
                code: ErrorCode.MESSAGE_PARSE_ERROR,
                message: "Invalid update payload",
            })
        )
    })

    test.each(['{"interval":5}', "[]", '"5s"', "null"])(
        "rejects %s",
        (payload) => {
            expect(() => parseUpdatePayload(payload)).toThrow(
                "Update payload must be an object of strings"
            )
        }
    )
})

describe("applyUpdatePayload", () => {
    test("reconfigures interval and selection mode", () => {
        const metric = new CpuMetric("test/metric/cpu", 2000, "auto", () => [])

        const errors = applyUpdatePayload(
            metric,
            '{"interval":"1m30s","selection_mode":"first"}'
        )

        expect(errors).toEqual([])
        expect(metric.interval).toBe(90000)
        expect(metric.mode).toBe("first")
    })

    test("ignores settings a metric does not support", () => {
        const metric = new MockMetric("a", "test/metric/a")

        expect(applyUpdatePayload(metric, '{"interval":"5s"}')).toEqual([])
    })

    test("reports an invalid interval", () => {
        const metric = new CpuMetric("test/metric/cpu", 2000, "auto", () => [])

        const [zero] = applyUpdatePayload(metric, '{"interval":"0s"}')
        const [later] = applyUpdatePayload(metric, '{"interval":"later"}')

        expect(zero.message).toBe("Invalid interval for cpu: 0")
        expect(later.message).toBe('invalid duration: "later"')
        expect(metric.interval).toBe(2000)
    })

    test("applies the selection mode when the interval is invalid", () => {
        const metric = new CpuMetric("test/metric/cpu", 2000, "auto", () => [])

        const errors = applyUpdatePayload(
            metric,
            '{"interval":"bogus","selection_mode":"max"}'
        )

        expect(errors.map((error) => error.message)).toEqual([
            'invalid duration: "bogus"',
        ])
        expect(metric.mode).toBe("max")
        expect(metric.interval).toBe(2000)
    })

    test("applies the interval when the selection mode is invalid", () => {
        const metric = new CpuMetric("test/metric/cpu", 2000, "auto", () => [])

        const errors = applyUpdatePayload(
            metric,
            '{"interval":"5s","selection_mode":"median"}'
        )

        expect(errors.map((error) => error.message)).toEqual([
            "Invalid selection mode: median",
        ])
        expect(metric.interval).toBe(5000)
        expect(metric.mode).toBe("auto")
    })

    test("throws for a malformed payload", () => {
        const metric = new CpuMetric("test/metric/cpu", 2000, "auto", () => [])

        expect(() => applyUpdatePayload(metric, "{bad")).toThrow(
            "Invalid update payload"
        )
    })
})
