// src/managers/StateManager.ts
/**
 * StateManager
 *
 * 메트릭 토픽별 생존(liveness) 상태를 관리하는 맵
 * - 메트릭 시작 시 등록, 이벤트 루프 종료 시 삭제
 * - compareAndSwap 으로 상태 전이만 감지
 * - last-will 토픽으로 발행할 스냅샷 직렬화
 */

import { OutcomeKind } from "../metrics/errors"

class StateManager {
    private componentStates: Map<string, boolean> = new Map()

    store(topic: string, state: boolean): void {
        this.componentStates.set(topic, state)
    }

    load(topic: string): boolean | undefined {
        return this.componentStates.get(topic)
    }

    delete(topic: string): boolean {
        return this.componentStates.delete(topic)
    }

    /**
     * 현재 값이 expected 일 때만 next 로 바꾼다. 등록되지 않은 토픽은 false.
     */
    compareAndSwap(topic: string, expected: boolean, next: boolean): boolean {
        const current = this.componentStates.get(topic)
        if (current === undefined || current !== expected) {
            return false
        }
        this.componentStates.set(topic, next)
        return true
    }

    /**
     * 갱신 결과를 상태에 반영한다. 상태가 바뀌었으면 true.
     * 성공 / no-change / rescanned 는 healthy 로 전이한다.
     * 런타임 에러는 상태를 바꾸지 않는다 (offline 전환은 markOffline).
     */
    transition(topic: string, outcome: OutcomeKind): boolean {
        if (outcome === "error") {
            return false
        }
        return this.compareAndSwap(topic, false, true)
    }

    markOffline(topic: string): boolean {
        return this.compareAndSwap(topic, true, false)
    }

    snapshot(): Record<string, boolean> {
        return Object.fromEntries(this.componentStates)
    }

    // {"topic":true,...} (등록 순서 유지)
    serialize(): string {
        const entries = Array.from(this.componentStates).map(
            ([topic, state]) => `${JSON.stringify(topic)}:${state}`
        )
        return `{${entries.join(",")}}`
    }
}

export default StateManager
