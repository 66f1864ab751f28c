/**
 * Path: src/bridge/control.ts
 * <topic>/update 페이로드 처리
 * 예) {"interval": "5s", "selection_mode": "max"}
 */

import { BridgeError, ErrorCode, toError } from "../errors/types"
import { IMetric, isReconfigurable, isSelectable } from "../metrics/types"
import { parseDuration } from "../utils/duration"

export interface UpdatePayload {
    interval?: string
    selection_mode?: string
}

export function parseUpdatePayload(payload: Buffer | string): UpdatePayload {
    const text = payload.toString().trim()
    if (text === "") {
        return {}
    }

    let parsed: unknown
    try {
        parsed = JSON.parse(text)
    } catch (error) {
        throw new BridgeError(
            ErrorCode.MESSAGE_PARSE_ERROR,
            "Invalid update payload",
            toError(error)
        )
    }

    if (
        typeof parsed !== "object" ||
        parsed === null ||
        Array.isArray(parsed) ||
        !Object.values(parsed).every((value) => typeof value === "string")
    ) {
        throw new BridgeError(
            ErrorCode.MESSAGE_PARSE_ERROR,
            "Update payload must be an object of strings"
        )
    }

    const result: UpdatePayload = {}
    const fields = new Map<string, unknown>(Object.entries(parsed))
    const interval = fields.get("interval")
    const mode = fields.get("selection_mode")
    if (typeof interval === "string") {
        result.interval = interval
    }
    if (typeof mode === "string") {
        result.selection_mode = mode
    }
    return result
}

/**
 * 페이로드의 설정을 메트릭에 적용한다. 지원하지 않는 항목은 무시.
 * 항목별로 따로 적용하고, 적용하지 못한 항목의 에러를 반환한다.
 * 페이로드 자체가 잘못되었으면 throw.
 */
export function applyUpdatePayload(
    metric: IMetric,
    payload: Buffer | string
): Error[] {
    const update = parseUpdatePayload(payload)
    const errors: Error[] = []
    const apply = (setting: () => void) => {
        try {
            setting()
        } catch (error) {
            errors.push(toError(error))
        }
    }

    const { interval, selection_mode: mode } = update
    if (interval !== undefined && isReconfigurable(metric)) {
        apply(() => metric.setInterval(parseDuration(interval)))
    }
    if (mode !== undefined && isSelectable(metric)) {
        apply(() => metric.setSelectionMode(mode))
    }
    return errors
}
