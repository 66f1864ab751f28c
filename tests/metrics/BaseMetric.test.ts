/**
 * Path: tests/metrics/BaseMetric.test.ts
 */

import { BaseMetric } from "../../src/metrics/BaseMetric"
import {
    ErrNoChange,
    MetricError,
    errNotSupported,
} from "../../src/metrics/errors"
import { ErrorCode } from "../../src/errors/types"

// 미리 정한 결과를 차례로 돌려주는 메트릭
class ScriptedMetric extends BaseMetric {
    outcomes: Array<Error | null> = []
    collected = 0

    constructor(interval = 20) {
        super("scripted", "test/metric/scripted", interval)
    }

    protected async collect(): Promise<void> {
        this.collected++
        const outcome = this.outcomes.shift()
        if (outcome) {
            throw outcome
        }
    }

    protected text(): string {
        return `{"collected":${this.collected}}`
    }
}

function nextUpdate(metric: BaseMetric): Promise<Error | null> {
    return new Promise((resolve) => {
        const listener = (error: Error | null) => {
            metric.off("updated", listener)
            resolve(error)
        }
        metric.on("updated", listener)
    })
}

describe("BaseMetric", () => {
    let controller: AbortController
    let metric: ScriptedMetric

    beforeEach(() => {
        controller = new AbortController()
        metric = new ScriptedMetric()
    })

    afterEach(() => {
        metric.stop()
    })

    test("collects once on start", async () => {
        await metric.start(controller.signal)

        expect(metric.collected).toBe(1)
        expect(metric.isRunning).toBe(true)
        expect(metric.type()).toBe("scripted")
        expect(metric.topic()).toBe("test/metric/scripted")
    })

    test("ignores no-change on the first collect", async () => {
        metric.outcomes = [ErrNoChange]

        await expect(metric.start(controller.signal)).resolves.toBeUndefined()
    })

    test("fails to start when the first collect fails", async () => {
        const error = errNotSupported("scripted")
        metric.outcomes = [error]

        await expect(metric.start(controller.signal)).rejects.toBe(error)
        expect(metric.isRunning).toBe(false)
    })

    test("rejects a second start", async () => {
        await metric.start(controller.signal)

        await expect(metric.start(controller.signal)).rejects.toMatchObject({
            code: ErrorCode.ALREADY_RUNNING,
            message: "scripted is already running",
        })
    })

    test("cannot be restarted after stop", async () => {
        metric.stop()

        await expect(metric.start(controller.signal)).rejects.toMatchObject({
            code: ErrorCode.METRIC_START_FAILED,
            message: "scripted has been stopped",
        })
    })

    test("requires a positive interval", async () => {
        const idle = new ScriptedMetric(0)

        await expect(idle.start(controller.signal)).rejects.toMatchObject({
            code: ErrorCode.METRIC_START_FAILED,
            message: "scripted has no update interval",
        })
    })

    test("emits each outcome on the interval", async () => {
        const failure = new MetricError(ErrorCode.METRIC_UPDATE_FAILED, "x")
        await metric.start(controller.signal)

        metric.outcomes = [null, failure]
        await expect(nextUpdate(metric)).resolves.toBeNull()
        await expect(nextUpdate(metric)).resolves.toBe(failure)
    })

    test("stop emits close once", () => {
        const onClose = jest.fn()
        metric.on("close", onClose)

        metric.stop()
        metric.stop()

        expect(onClose).toHaveBeenCalledTimes(1)
        expect(metric.isRunning).toBe(false)
    })

    test("stops when the signal aborts", async () => {
        const onClose = jest.fn()
        metric.on("close", onClose)
        await metric.start(controller.signal)

        controller.abort()

        expect(onClose).toHaveBeenCalledTimes(1)
        expect(metric.isRunning).toBe(false)
    })

    test("setInterval validates and updates the interval", async () => {
        await metric.start(controller.signal)

        expect(() => metric.setInterval(0)).toThrow(
            "Invalid interval for scripted: 0"
        )
        metric.setInterval(10)
        expect(metric.interval).toBe(10)
        await expect(nextUpdate(metric)).resolves.toBeNull()
    })

    test("update collects without emitting", async () => {
        const onUpdated = jest.fn()
        metric.on("updated", onUpdated)
        metric.outcomes = [null, ErrNoChange]

        await metric.update()
        await expect(metric.update()).rejects.toBe(ErrNoChange)
        expect(onUpdated).not.toHaveBeenCalled()
    })

    test("appendText appends to the given buffer", async () => {
        await metric.start(controller.signal)

        expect(metric.appendText().toString()).toBe('{"collected":1}')
        expect(metric.appendText(Buffer.from("v=")).toString()).toBe(
            'v={"collected":1}'
        )
    })
})
