/**
 * Path: src/discovery/Origin.ts
 * 디스커버리 origin 정보
 */

export const ORIGIN_NAME = "mqttop"
export const VERSION = "1.0.0"

export interface Origin {
    name: string
    sw?: string
    url?: string
}

export function createOrigin(): Origin {
    return { name: ORIGIN_NAME, sw: VERSION }
}
