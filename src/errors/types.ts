/**
 * Path: src/errors/types.ts
 * 브리지 에러 타입 정의
 */

export enum ErrorCode {
    // 설정
    NO_METRICS = "NO_METRICS",
    INVALID_CONFIG = "INVALID_CONFIG",

    // 브로커 연결 / 메시지
    CONNECTION_FAILED = "CONNECTION_FAILED",
    CONNECTION_CLOSED = "CONNECTION_CLOSED",
    PUBLISH_FAILED = "PUBLISH_FAILED",
    SUBSCRIPTION_FAILED = "SUBSCRIPTION_FAILED",
    UNSUBSCRIPTION_FAILED = "UNSUBSCRIPTION_FAILED",
    MESSAGE_PARSE_ERROR = "MESSAGE_PARSE_ERROR",

    // 메트릭
    METRIC_START_FAILED = "METRIC_START_FAILED",
    METRIC_UPDATE_FAILED = "METRIC_UPDATE_FAILED",
    NO_CHANGE = "NO_CHANGE",
    RESCANNED = "RESCANNED",
    NOT_SUPPORTED = "NOT_SUPPORTED",
    ALREADY_RUNNING = "ALREADY_RUNNING",

    // 디스커버리
    DISCOVERY_FAILED = "DISCOVERY_FAILED",

    INVALID_STATE = "INVALID_STATE",
    INTERNAL_ERROR = "INTERNAL_ERROR",
}

export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
    CRITICAL = "CRITICAL",
}

export class BridgeError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly originalError?: Error,
        public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM
    ) {
        super(message)
        this.name = "BridgeError"
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}
