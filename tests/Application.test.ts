/**
 * Path: tests/Application.test.ts
 * mock 브로커(stdout 출력)로 애플리케이션 시작/종료 확인
 */

import fs from "fs"
import os from "os"
import path from "path"
import { Application } from "../src/main"

const FIXTURE_ENV = path.join(__dirname, "fixtures/app.env")

describe("Application", () => {
    let app: Application | undefined
    let output: string[]
    let signals: Array<string | symbol>

    beforeEach(() => {
        output = []
        signals = []
        jest.spyOn(process.stdout, "write").mockImplementation((chunk) => {
            output.push(String(chunk))
            return true
        })
        jest.spyOn(process, "on").mockImplementation((event) => {
            signals.push(event)
            return process
        })
    })

    afterEach(async () => {
        await app?.shutdown()
        app = undefined
        jest.restoreAllMocks()
        delete process.env.DATA_PATH
        delete process.env.DISCOVERY_ENABLED
    })

    test("starts the bridge on the mock broker and shuts it down", async () => {
        app = await Application.create(FIXTURE_ENV)

        await app.start()

        expect(app.getStatus()).toBe("running")
        expect(signals).toEqual(
            expect.arrayContaining(["SIGINT", "SIGTERM"])
        )
        expect(
            output.some((chunk) => chunk.includes('"apptest/bridge/status"'))
        ).toBe(true)

        await app.shutdown()
        expect(app.getStatus()).toBe("stopped")
        expect(output.join("")).toContain(
            '{\n  "apptest/bridge/status": "offline"\n}\n'
        )
    })

    test("saves the discovery document to the data path", async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-data-"))
        process.env.DATA_PATH = dir
        process.env.DISCOVERY_ENABLED = "true"
        try {
            app = await Application.create(FIXTURE_ENV)
            await app.start()

            const saved = JSON.parse(
                fs.readFileSync(path.join(dir, "discovery.json"), "utf8")
            )
            expect(saved._method).toBe("nodes")
            expect(Object.keys(saved._nodes)).toEqual(
                expect.arrayContaining(["memory", "bridge"])
            )
        } finally {
            await app?.shutdown()
            fs.rmSync(dir, { recursive: true, force: true })
        }
    })
})
