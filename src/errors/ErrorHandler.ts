/**
 * Path: src/errors/ErrorHandler.ts
 */

import { BridgeError, ErrorCode, ErrorSeverity } from "./types"

export interface IErrorHandler {
    handleError(error: unknown): BridgeError
    handleFatalError(error: Error): void
    handleMetricError(metricType: string, error: unknown): BridgeError
    normalize(error: unknown): BridgeError
}

export class ErrorHandler implements IErrorHandler {
    constructor(
        private readonly onFatalError: () => Promise<void>,
        private readonly onError: (error: BridgeError) => void
    ) {}

    handleError(error: unknown): BridgeError {
        const bridgeError = this.normalize(error)
        this.onError(bridgeError)
        return bridgeError
    }

    handleFatalError(error: Error): void {
        const bridgeError =
            error instanceof BridgeError &&
            error.severity === ErrorSeverity.CRITICAL
                ? error
                : new BridgeError(
                      ErrorCode.INTERNAL_ERROR,
                      "Fatal error occurred",
                      error,
                      ErrorSeverity.CRITICAL
                  )
        this.onError(bridgeError)
        this.onFatalError().catch((fatal: unknown) =>
            this.onError(this.normalize(fatal))
        )
    }

    // 메트릭 런타임 에러는 기록만 한다 (CRITICAL 만 예외)
    handleMetricError(metricType: string, error: unknown): BridgeError {
        const bridgeError =
            error instanceof BridgeError
                ? error
                : new BridgeError(
                      ErrorCode.METRIC_UPDATE_FAILED,
                      `Error updating ${metricType}: ${describe(error)}`,
                      error instanceof Error ? error : undefined
                  )
        if (bridgeError.severity === ErrorSeverity.CRITICAL) {
            this.handleFatalError(bridgeError)
        } else {
            this.onError(bridgeError)
        }
        return bridgeError
    }

    normalize(error: unknown): BridgeError {
        if (error instanceof BridgeError) {
            return error
        }

        if (error instanceof Error) {
            return new BridgeError(
                ErrorCode.INTERNAL_ERROR,
                error.message,
                error,
                ErrorSeverity.MEDIUM
            )
        }

        return new BridgeError(
            ErrorCode.INTERNAL_ERROR,
            "Unknown error occurred",
            undefined,
            ErrorSeverity.LOW
        )
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
