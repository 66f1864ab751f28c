/**
 * Path: src/metrics/errors.ts
 * 메트릭 갱신 결과(outcome) 정의
 * - null: 값 변경됨
 * - ErrNoChange: 변경 없음
 * - ErrRescanned: 하위 엔티티 구성이 바뀜 (재디스커버리 필요)
 * - 그 외 에러: 갱신 실패
 */

import { BridgeError, ErrorCode, ErrorSeverity } from "../errors/types"

export class MetricError extends BridgeError {
    constructor(
        code: ErrorCode,
        message: string,
        originalError?: Error,
        severity: ErrorSeverity = ErrorSeverity.LOW
    ) {
        super(code, message, originalError, severity)
        this.name = "MetricError"
    }
}

export const ErrNoChange = new MetricError(ErrorCode.NO_CHANGE, "no change")
export const ErrRescanned = new MetricError(ErrorCode.RESCANNED, "rescanned")

export type OutcomeKind = "success" | "no-change" | "rescanned" | "error"

export function isNoChange(error: unknown): boolean {
    return error instanceof BridgeError && error.code === ErrorCode.NO_CHANGE
}

export function isRescanned(error: unknown): boolean {
    return error instanceof BridgeError && error.code === ErrorCode.RESCANNED
}

export function classifyOutcome(error: Error | null | undefined): OutcomeKind {
    if (!error) {
        return "success"
    }
    if (isNoChange(error)) {
        return "no-change"
    }
    if (isRescanned(error)) {
        return "rescanned"
    }
    return "error"
}

export function errNotSupported(metric: string, error?: Error): MetricError {
    return new MetricError(
        ErrorCode.NOT_SUPPORTED,
        `${metric} is not supported${error ? ` (${error.message})` : ""}`,
        error,
        ErrorSeverity.MEDIUM
    )
}

export function errAlreadyRunning(metric: string): MetricError {
    return new MetricError(
        ErrorCode.ALREADY_RUNNING,
        `${metric} is already running`
    )
}
