/**
 * Path: src/states/types.ts
 * 브리지 상태 정의 및 상태 전이 관리
 */

export enum BridgeState {
    INITIAL = "INITIAL",
    CONNECTING = "CONNECTING",
    STARTING = "STARTING",
    READY = "READY",
    ERROR = "ERROR",
    STOPPING = "STOPPING",
    STOPPED = "STOPPED",
}

export const validStateTransitions: Record<BridgeState, BridgeState[]> = {
    [BridgeState.INITIAL]: [BridgeState.CONNECTING],
    [BridgeState.CONNECTING]: [
        BridgeState.STARTING,
        BridgeState.ERROR, // 연결 실패
    ],
    [BridgeState.ERROR]: [
        BridgeState.CONNECTING, // 재시도
    ],
    [BridgeState.STARTING]: [
        BridgeState.READY,
        BridgeState.STOPPING, // 시작 중 취소
    ],
    [BridgeState.READY]: [BridgeState.STOPPING],
    [BridgeState.STOPPING]: [BridgeState.STOPPED],
    [BridgeState.STOPPED]: [],
}

export interface StateTransitionEvent {
    previousState: BridgeState
    currentState: BridgeState
    timestamp: number
}
