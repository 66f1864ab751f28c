/**
 * Path: tests/broker/MockBrokerClient.test.ts
 */

import { Writable } from "stream"
import { MockBrokerClient } from "../../src/broker/MockBrokerClient"
import { BrokerMessage } from "../../src/broker/types"

describe("MockBrokerClient", () => {
    let client: MockBrokerClient

    beforeEach(() => {
        client = new MockBrokerClient()
    })

    test("connects immediately unless deferred", async () => {
        const token = client.connect()

        await token.done()
        expect(token.error()).toBeUndefined()
        expect(client.isConnected()).toBe(true)
        expect(client.connectCount).toBe(1)
    })

    test("deferred connect completes on demand", () => {
        const deferred = new MockBrokerClient({ deferConnect: true })
        const token = deferred.connect()

        expect(token.isDone()).toBe(false)
        deferred.completeConnect(new Error("refused"))
        expect(token.error()).toEqual(new Error("refused"))
        expect(deferred.isConnected()).toBe(false)
    })

    test("delivers messages to matching subscriptions", () => {
        const received: BrokerMessage[] = []
        client.subscribeMultiple({ "a/+/update": 0, "a/x/stop": 0 }, (_c, m) =>
            received.push(m)
        )

        expect(client.deliver("a/x/update", "go")).toBe(1)
        expect(client.deliver("b/x/update")).toBe(0)
        expect(received.map((m) => [m.topic, m.payload.toString()])).toEqual([
            ["a/x/update", "go"],
        ])
    })

    test("records publishes and skips failed ones", () => {
        client.failPublish((topic) =>
            topic === "bad" ? new Error("denied") : undefined
        )

        const failed = client.publish("bad", 0, false, "x")
        client.publish("good", 1, true, Buffer.from("y"))

        expect(failed.error()).toEqual(new Error("denied"))
        expect(client.published).toEqual([
            { topic: "good", qos: 1, retained: true, payload: "y" },
        ])
    })

    test("failed subscriptions register nothing", () => {
        client.failSubscribe(() => new Error("denied"))

        const token = client.subscribe("a", 0, () => undefined)

        expect(token.error()).toEqual(new Error("denied"))
        expect(client.isSubscribed("a")).toBe(false)
    })

    test("callback message is delivered on subscribe", () => {
        const payloads: string[] = []
        client.setCallbackMessage("hello")
        client.subscribe("a", 0, (_c, message) =>
            payloads.push(message.payload.toString())
        )

        expect(payloads).toEqual(["hello"])
    })

    test("writes publishes to the output stream as JSON", () => {
        const chunks: string[] = []
        const output = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk.toString())
                callback()
            },
        })
        const printing = new MockBrokerClient({ output })

        printing.publish("t/json", 0, false, '{"a":1}')
        printing.publish("t/text", 0, false, "offline")

        expect(chunks.join("")).toBe(
            '{\n  "t/json": {\n    "a": 1\n  }\n}\n' +
                '{\n  "t/text": "offline"\n}\n'
        )
    })

    test("waitForPublish resolves on the next matching publish", async () => {
        client.publish("t", 0, false, "old")
        const waiting = client.waitForPublish("t", (m) => m.payload === "new")

        client.publish("t", 0, false, "other")
        client.publish("t", 0, false, "new")

        await expect(waiting).resolves.toEqual({
            topic: "t",
            qos: 0,
            retained: false,
            payload: "new",
        })
    })
})
