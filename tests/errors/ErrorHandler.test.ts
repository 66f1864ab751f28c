/**
 * Path: tests/errors/ErrorHandler.test.ts
 * ErrorHandler 클래스의 테스트
 */

import { ErrorHandler } from "../../src/errors/ErrorHandler"
import {
    BridgeError,
    ErrorCode,
    ErrorSeverity,
    toError,
} from "../../src/errors/types"

describe("ErrorHandler", () => {
    let errorHandler: ErrorHandler
    let onFatalErrorMock: jest.Mock<Promise<void>, []>
    let onErrorMock: jest.Mock<void, [BridgeError]>

    beforeEach(() => {
        onFatalErrorMock = jest.fn(() => Promise.resolve())
        onErrorMock = jest.fn()
        errorHandler = new ErrorHandler(onFatalErrorMock, onErrorMock)
    })

    test("handleError processes and returns a BridgeError", () => {
        const genericError = new Error("A generic error occurred")

        const result = errorHandler.handleError(genericError)

        expect(result).toBeInstanceOf(BridgeError)
        expect(result.code).toBe(ErrorCode.INTERNAL_ERROR)
        expect(result.message).toBe("A generic error occurred")
        expect(result.originalError).toBe(genericError)
        expect(result.severity).toBe(ErrorSeverity.MEDIUM)
        expect(onErrorMock).toHaveBeenCalledWith(result)
    })

    test("handleError passes through BridgeError", () => {
        const bridgeError = new BridgeError(
            ErrorCode.CONNECTION_FAILED,
            "Connection failed",
            undefined,
            ErrorSeverity.HIGH
        )

        const result = errorHandler.handleError(bridgeError)

        expect(result).toBe(bridgeError)
        expect(onErrorMock).toHaveBeenCalledWith(bridgeError)
    })

    test("handleError wraps non-error values", () => {
        const result = errorHandler.handleError("boom")

        expect(result.message).toBe("Unknown error occurred")
        expect(result.severity).toBe(ErrorSeverity.LOW)
    })

    test("handleFatalError processes and triggers fatal callback", () => {
        const criticalError = new Error("Critical system failure")

        errorHandler.handleFatalError(criticalError)

        expect(onFatalErrorMock).toHaveBeenCalled()
        expect(onErrorMock).toHaveBeenCalledWith(
            expect.objectContaining({
                message: "Fatal error occurred",
                originalError: criticalError,
                severity: ErrorSeverity.CRITICAL,
            })
        )
    })

    test("handleMetricError treats critical errors as fatal", () => {
        const critical = new BridgeError(
            ErrorCode.METRIC_UPDATE_FAILED,
            "Critical metric error",
            undefined,
            ErrorSeverity.CRITICAL
        )

        errorHandler.handleMetricError("cpu", critical)

        expect(onFatalErrorMock).toHaveBeenCalled()
        expect(onErrorMock).toHaveBeenCalledWith(critical)
    })

    test("handleMetricError only records other errors", () => {
        const result = errorHandler.handleMetricError(
            "cpu",
            new Error("read failed")
        )

        expect(onFatalErrorMock).not.toHaveBeenCalled()
        expect(result.code).toBe(ErrorCode.METRIC_UPDATE_FAILED)
        expect(result.message).toBe("Error updating cpu: read failed")
        expect(onErrorMock).toHaveBeenCalledWith(result)
    })

    test("BridgeError formats its code", () => {
        const error = new BridgeError(ErrorCode.NO_METRICS, "no metrics")

        expect(error.toString()).toBe("BridgeError[NO_METRICS]: no metrics")
        expect(toError("text")).toEqual(new Error("text"))
    })
})
