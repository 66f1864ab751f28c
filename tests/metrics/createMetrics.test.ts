/**
 * Path: tests/metrics/createMetrics.test.ts
 */

import { CpuMetric, MemoryMetric, createMetrics } from "../../src/metrics"
import { testConfig } from "../helpers/config"

describe("createMetrics", () => {
    test("creates the enabled metrics with their topics", () => {
        const metrics = createMetrics(
            testConfig({
                interval: 3000,
                metrics: {
                    cpu: {
                        enabled: true,
                        topic: "test/cpu",
                        interval: 500,
                        selectionMode: "max",
                    },
                    memory: { enabled: true },
                },
            })
        )

        expect(metrics.map((metric) => metric.type())).toEqual([
            "cpu",
            "memory",
        ])
        expect(metrics.map((metric) => metric.topic())).toEqual([
            "test/cpu",
            "test/metric/memory",
        ])

        const [cpu, memory] = metrics
        expect(cpu).toBeInstanceOf(CpuMetric)
        expect(cpu instanceof CpuMetric && cpu.interval).toBe(500)
        expect(cpu instanceof CpuMetric && cpu.mode).toBe("max")
        expect(memory instanceof MemoryMetric && memory.interval).toBe(3000)
    })

    test("skips disabled metrics", () => {
        expect(createMetrics(testConfig())).toEqual([])
    })
})
