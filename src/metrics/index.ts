/**
 * Path: src/metrics/index.ts
 * 설정에서 활성화된 메트릭 생성
 */

import { AppConfig } from "../config/types"
import { CpuMetric } from "./CpuMetric"
import { MemoryMetric } from "./MemoryMetric"
import { IMetric } from "./types"

export function createMetrics(config: AppConfig): IMetric[] {
    const { cpu, memory } = config.metrics
    const metrics: IMetric[] = []

    if (cpu.enabled) {
        metrics.push(
            new CpuMetric(
                cpu.topic ?? `${config.baseTopic}/metric/cpu`,
                cpu.interval ?? config.interval,
                cpu.selectionMode
            )
        )
    }
    if (memory.enabled) {
        metrics.push(
            new MemoryMetric(
                memory.topic ?? `${config.baseTopic}/metric/memory`,
                memory.interval ?? config.interval
            )
        )
    }

    return metrics
}

export * from "./types"
export * from "./errors"
export { BaseMetric } from "./BaseMetric"
export { CpuMetric } from "./CpuMetric"
export { MemoryMetric } from "./MemoryMetric"
