/**
 * Path: src/utils/duration.ts
 * "1m30s", "500ms", "2s" 형식의 기간 문자열 처리 (단위: ms)
 */

const UNITS: Record<string, number> = {
    ns: 1e-6,
    us: 1e-3,
    "µs": 1e-3,
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
}

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y

export function parseDuration(text: string): number {
    const input = text.trim()
    if (input === "") {
        throw new Error("invalid duration: empty string")
    }
    if (/^\d+$/.test(input)) {
        return parseInt(input, 10)
    }

    let sign = 1
    let rest = input
    if (rest[0] === "-" || rest[0] === "+") {
        sign = rest[0] === "-" ? -1 : 1
        rest = rest.slice(1)
    }
    if (rest === "0") {
        return 0
    }

    let total = 0
    SEGMENT.lastIndex = 0
    while (SEGMENT.lastIndex < rest.length) {
        const start = SEGMENT.lastIndex
        const match = SEGMENT.exec(rest)
        if (!match || match.index !== start) {
            throw new Error(`invalid duration: "${text}"`)
        }
        total += parseFloat(match[1]) * UNITS[match[2]]
    }

    return sign * total
}

export function formatDuration(ms: number): string {
    if (ms === 0) {
        return "0s"
    }
    if (ms < 1000) {
        return `${ms}ms`
    }

    let rest = ms
    let out = ""
    const hours = Math.floor(rest / UNITS.h)
    rest -= hours * UNITS.h
    const minutes = Math.floor(rest / UNITS.m)
    rest -= minutes * UNITS.m

    if (hours > 0) out += `${hours}h`
    if (hours > 0 || minutes > 0) out += `${minutes}m`
    out += `${rest / 1000}s`
    return out
}
