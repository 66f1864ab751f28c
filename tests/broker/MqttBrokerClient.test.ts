/**
 * Path: tests/broker/MqttBrokerClient.test.ts
 * mqtt 클라이언트를 가짜 구현으로 바꿔 어댑터 동작 확인
 */

import { EventEmitter } from "events"
import { connect, MqttClient } from "mqtt"
import { MqttBrokerClient } from "../../src/broker/MqttBrokerClient"
import { BrokerMessage } from "../../src/broker/types"
import { ErrorCode } from "../../src/errors/types"
import { testConfig } from "../helpers/config"

jest.mock("mqtt", () => ({ connect: jest.fn() }))

interface Grant {
    topic: string
    qos: number
}

class FakeMqttClient extends EventEmitter {
    connected = false
    connectCalls = 0
    grantedQos = 0
    publishError?: Error
    published: Array<{ topic: string; payload: string; retain: boolean }> = []
    subscribed: string[] = []
    unsubscribed: string[] = []
    ended: boolean[] = []

    connect(): this {
        this.connectCalls++
        return this
    }

    publish(
        topic: string,
        payload: string | Buffer,
        options: { qos: number; retain: boolean },
        callback: (error?: Error) => void
    ): this {
        this.published.push({
            topic,
            payload: payload.toString(),
            retain: options.retain,
        })
        callback(this.publishError)
        return this
    }

    subscribe(
        subscriptions: Record<string, { qos: number }>,
        callback: (error: Error | null, granted?: Grant[]) => void
    ): this {
        const topics = Object.keys(subscriptions)
        this.subscribed.push(...topics)
        callback(
            null,
            topics.map((topic) => ({ topic, qos: this.grantedQos }))
        )
        return this
    }

    unsubscribe(
        topics: string[],
        _options: object,
        callback: (error?: Error) => void
    ): this {
        this.unsubscribed.push(...topics)
        callback()
        return this
    }

    end(force: boolean, _options?: object, callback?: () => void): this {
        this.ended.push(force)
        this.connected = false
        callback?.()
        return this
    }
}

describe("MqttBrokerClient", () => {
    const connectMock = jest.mocked(connect)
    let fake: FakeMqttClient

    beforeEach(() => {
        fake = new FakeMqttClient()
        connectMock.mockReset()
        // 테스트에서는 MqttClient 가 쓰는 메서드만 가진 가짜 클라이언트를 돌려준다
        connectMock.mockReturnValue(fake as unknown as MqttClient)
    })

    test("creates a manual-connect client with the last will", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)

        expect(connectMock).toHaveBeenCalledWith(
            "tcp://localhost:1883",
            expect.objectContaining({
                manualConnect: true,
                clientId: "test-client",
                username: undefined,
                keepalive: 30,
                reconnectPeriod: 1000,
                will: {
                    topic: "test/bridge/status",
                    payload: Buffer.from("offline"),
                    qos: 1,
                    retain: true,
                },
            })
        )
        expect(client.optionsReader().willTopic).toBe("test/bridge/status")
    })

    test("omits the last will when disabled", () => {
        const client = new MqttBrokerClient({
            ...testConfig().mqtt,
            birthWillEnabled: false,
        })

        const options = connectMock.mock.calls[0][1]
        expect(options?.will).toBeUndefined()
        expect(client.optionsReader().willTopic).toBe("")
    })

    test("connect completes on the connect event", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)

        const token = client.connect()
        expect(client.connect()).toBe(token)
        expect(fake.connectCalls).toBe(1)
        expect(token.isDone()).toBe(false)

        fake.connected = true
        fake.emit("connect")

        expect(token.isDone()).toBe(true)
        expect(token.error()).toBeUndefined()
        expect(client.isConnected()).toBe(true)
    })

    test("connect fails on an error before connecting", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)

        const token = client.connect()
        fake.emit("error", new Error("refused"))

        expect(token.error()).toMatchObject({
            code: ErrorCode.CONNECTION_FAILED,
            message: "Unable to connect to tcp://localhost:1883: refused",
        })
    })

    test("publish reports broker errors", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)

        const ok = client.publish("t/a", 0, true, "1")
        fake.publishError = new Error("denied")
        const failed = client.publish("t/b", 0, false, "2")

        expect(ok.error()).toBeUndefined()
        expect(failed.error()).toMatchObject({
            code: ErrorCode.PUBLISH_FAILED,
            message: "Unable to publish to t/b: denied",
        })
        expect(fake.published).toEqual([
            { topic: "t/a", payload: "1", retain: true },
            { topic: "t/b", payload: "2", retain: false },
        ])
    })

    test("routes messages to matching subscriptions", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)
        const received: BrokerMessage[] = []

        const token = client.subscribeMultiple(
            { "t/+/update": 0, "t/a/stop": 0 },
            (_client, message) => received.push(message)
        )
        fake.emit("message", "t/a/update", Buffer.from("go"), { retain: true })
        fake.emit("message", "t/b/other", Buffer.from("no"), { retain: false })

        expect(token.error()).toBeUndefined()
        expect(fake.subscribed).toEqual(["t/+/update", "t/a/stop"])
        expect(received).toEqual([
            { topic: "t/a/update", payload: Buffer.from("go"), retained: true },
        ])
    })

    test("a rejected subscription removes its handler", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)
        const handler = jest.fn()
        fake.grantedQos = 128

        const token = client.subscribe("t/a", 0, handler)
        fake.emit("message", "t/a", Buffer.from("x"), { retain: false })

        expect(token.error()).toMatchObject({
            code: ErrorCode.SUBSCRIPTION_FAILED,
            message: "Unable to subscribe to t/a",
        })
        expect(handler).not.toHaveBeenCalled()
    })

    test("unsubscribe stops routing", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)
        const handler = jest.fn()
        client.subscribe("t/a", 0, handler)

        const token = client.unsubscribe("t/a")
        fake.emit("message", "t/a", Buffer.from("x"), { retain: false })

        expect(token.error()).toBeUndefined()
        expect(fake.unsubscribed).toEqual(["t/a"])
        expect(handler).not.toHaveBeenCalled()
    })

    test("disconnect ends the client gracefully", () => {
        const client = new MqttBrokerClient(testConfig().mqtt)

        client.disconnect(500)

        expect(fake.ended).toEqual([false])
    })
})
