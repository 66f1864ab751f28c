/**
 * Path: src/discovery/Device.ts
 * 디스커버리 device 정보
 * - 식별자: machine-id 의 sha256 (base64url), 없으면 hostname
 * - 이름: hostname (기본 hostname 이면 생략)
 */

import crypto from "crypto"
import fs from "fs"
import os from "os"

export type Connection = [string, string]

export interface Device {
    cu?: string // configuration url
    cns?: Connection[]
    hw?: string
    ids?: string[]
    mf?: string
    mdl?: string
    mdl_id?: string
    name?: string
    sn?: string
    sa?: string
    sw?: string
}

export const DEVICE_STRING_KEYS = [
    "cu",
    "hw",
    "mf",
    "mdl",
    "mdl_id",
    "name",
    "sn",
    "sa",
    "sw",
] as const

const MACHINE_ID_PATHS = ["/etc/machine-id", "/var/lib/dbus/machine-id"]
const DMI_DIR = "/sys/class/dmi/id"
const DEFAULT_HOSTNAMES = ["localhost", "debian"]
const DEFAULT_DEVICE_NAME = "Mqttop"

export function titleCase(value: string): string {
    return value.replace(
        /(^|[^a-zA-Z])([a-z])/g,
        (_match, before: string, letter: string) =>
            `${before}${letter.toUpperCase()}`
    )
}

export function deviceIdentifier(machineId: string): string {
    return crypto.createHash("sha256").update(machineId).digest("base64url")
}

/**
 * 현재 호스트의 Device.
 * name 이 "hostname" 이거나 비어 있으면 hostname 을 사용한다.
 */
export function createDevice(name?: string): Device {
    const hostname = os.hostname()
    const machineId =
        MACHINE_ID_PATHS.map(readTrimmed).find((id) => id !== undefined) ??
        hostname

    const device: Device = {
        ids: [deviceIdentifier(machineId)],
        sw: `${os.type()} ${os.release()}`,
    }

    if (name && name !== "hostname") {
        device.name = name
    } else if (!DEFAULT_HOSTNAMES.includes(hostname)) {
        device.name = titleCase(hostname)
    } else {
        device.name = DEFAULT_DEVICE_NAME
    }

    const model =
        readTrimmed(`${DMI_DIR}/product_name`) ??
        readTrimmed(`${DMI_DIR}/board_name`)
    if (model) {
        device.mdl = model
    }
    const vendor =
        readTrimmed(`${DMI_DIR}/sys_vendor`) ??
        readTrimmed(`${DMI_DIR}/board_vendor`)
    if (vendor) {
        device.mf = vendor
    }

    return device
}

// 읽을 수 없거나 비어 있으면 undefined
function readTrimmed(path: string): string | undefined {
    try {
        const value = fs.readFileSync(path, "utf8").trim()
        return value === "" ? undefined : value
    } catch {
        return undefined
    }
}
