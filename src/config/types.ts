/**
 * Path: src/config/types.ts
 * Configuration 타입 정의
 */

import { QoS } from "../broker/types"

export interface AppConfig {
    baseTopic: string // 기본 mqttop
    interval: number // 메트릭 기본 갱신 주기 (ms)
    dataPath?: string // 이전 디스커버리 문서 저장 위치
    mockBroker: boolean // true 면 브로커 대신 stdout 출력
    offlineAfterFailures: number // 연속 실패 N 회 후 offline (0 이면 사용 안 함)
    mqtt: MqttConfig
    discovery: DiscoveryConfig
    metrics: MetricsConfig
}

export interface MqttConfig {
    broker: string // scheme://host:port
    clientId: string
    username: string
    password: string
    keepAlive: number // ms
    reconnectInterval: number // ms
    connectTimeout: number // ms
    birthWillEnabled: boolean
    birthWillTopic: string
    willPayload: string
    willQos: QoS
    willRetained: boolean
}

export type DiscoveryMethod = "device" | "components" | "nodes"

export const DISCOVERY_METHODS: DiscoveryMethod[] = [
    "device",
    "components",
    "nodes",
]

export interface DiscoveryConfig {
    enabled: boolean
    prefix: string // homeassistant
    deviceName?: string
    nodeId: string
    availability: string
    retained: boolean
    qos: QoS
    waitTopic?: string
    waitPayload?: string
    method: DiscoveryMethod
    settleDelay: number // ms
}

export interface MetricConfig {
    enabled: boolean
    interval?: number
    topic?: string
}

export type SelectionMode = "auto" | "first" | "max" | "average"

export const SELECTION_MODES: SelectionMode[] = [
    "auto",
    "first",
    "max",
    "average",
]

export interface CpuMetricConfig extends MetricConfig {
    selectionMode: SelectionMode
}

export interface MetricsConfig {
    cpu: CpuMetricConfig
    memory: MetricConfig
}

/**
 * 설정 소스. 환경변수 외 다른 소스로 교체할 때 구현
 */
export interface IConfigLoader {
    loadConfig(): AppConfig
}
