/**
 * Path: src/bridge/types.ts
 * Bridge 옵션 및 내부 이벤트 타입
 */

import { IBrokerClient } from "../broker/types"
import { Discovery } from "../discovery/Discovery"
import { IMetric } from "../metrics/types"
import { StateTransitionEvent } from "../states/types"

export interface BridgeOptions {
    client?: IBrokerClient // 기본: 설정으로 만든 MqttBrokerClient
    discovery?: Discovery // 기본: discovery.enabled 이면 새 문서
    migrate?: boolean // device <-> components 마이그레이션 발행
    metrics?: IMetric[] // 기본: createMetrics(config)
    baseTopic?: string
    offlineAfterFailures?: number
}

// 중앙 발행 루프가 소비하는 이벤트
export type BridgeEvent =
    | { type: "update"; metric: IMetric }
    | { type: "rediscover"; metric: IMetric }

export interface BridgeEvents {
    stateChange: (event: StateTransitionEvent) => void
}
