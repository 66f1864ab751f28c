/**
 * Path: tests/discovery/Device.test.ts
 */

import os from "os"
import {
    createDevice,
    deviceIdentifier,
    titleCase,
} from "../../src/discovery/Device"
import { createOrigin } from "../../src/discovery/Origin"

describe("Device", () => {
    test.each([
        ["living-room", "Living-Room"],
        ["nas01", "Nas01"],
        ["my_host", "My_Host"],
        ["Already", "Already"],
    ])("title-cases %s", (input, expected) => {
        expect(titleCase(input)).toBe(expected)
    })

    test("hashes the machine id into a url-safe identifier", () => {
        expect(deviceIdentifier("test-machine")).toBe(
            "L0ExxraAplACnt820_3mN_jCINXbPTsFhN6HD2StkvY"
        )
    })

    test("uses the configured device name", () => {
        const device = createDevice("Kitchen Pi")

        expect(device.name).toBe("Kitchen Pi")
        expect(device.ids).toHaveLength(1)
        expect(device.sw).toBe(`${os.type()} ${os.release()}`)
    })

    test("always names the device", () => {
        expect(createDevice().name).toEqual(expect.any(String))
        expect(createDevice("hostname").name).not.toBe("hostname")
    })

    test("origin carries the bridge version", () => {
        expect(createOrigin()).toEqual({ name: "mqttop", sw: "1.0.0" })
    })
})
