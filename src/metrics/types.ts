/**
 * Path: src/metrics/types.ts
 * 메트릭(producer) 인터페이스 정의
 */

import { Discovery } from "../discovery/Discovery"

export type UpdatedListener = (error: Error | null) => void
export type CloseListener = () => void

export interface MetricEvents {
    updated: UpdatedListener
    close: CloseListener
}

/**
 * 브리지가 사용하는 메트릭 인터페이스
 * - 자체 주기로 갱신하고 결과를 "updated" 이벤트로 전달
 * - stop 이후 "close" 이벤트 (재시작 불가)
 */
export interface IMetric {
    type(): string
    topic(): string
    start(signal: AbortSignal): Promise<void>
    stop(): void
    // 주기와 무관하게 즉시 갱신. 결과는 updated 이벤트로 보내지 않는다
    update(): Promise<void>
    // 현재 값을 wire 텍스트로 직렬화해 buffer 뒤에 붙인다
    appendText(buffer?: Buffer): Buffer

    on(event: "updated", listener: UpdatedListener): unknown
    on(event: "close", listener: CloseListener): unknown
    off(event: "updated", listener: UpdatedListener): unknown
    off(event: "close", listener: CloseListener): unknown
}

export interface IDiscoverer {
    discover(discovery: Discovery): void
}

export interface IReconfigurable {
    setInterval(ms: number): void
}

export interface ISelectable {
    setSelectionMode(mode: string): void
}

export function isDiscoverer(metric: IMetric): metric is IMetric & IDiscoverer {
    return "discover" in metric && typeof metric.discover === "function"
}

export function isReconfigurable(
    metric: IMetric
): metric is IMetric & IReconfigurable {
    return "setInterval" in metric && typeof metric.setInterval === "function"
}

export function isSelectable(metric: IMetric): metric is IMetric & ISelectable {
    return (
        "setSelectionMode" in metric &&
        typeof metric.setSelectionMode === "function"
    )
}
