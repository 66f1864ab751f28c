/**
 * Path: src/broker/MockBrokerClient.ts
 * 네트워크 없는 브로커 클라이언트
 * - 발행/구독 기록 (테스트 검증용)
 * - deliver 로 수신 메시지 시뮬레이션
 * - output 스트림이 있으면 발행 내용을 JSON 으로 출력 (dry-run)
 */

import { EventEmitter } from "events"
import {
    BrokerMessage,
    IBrokerClient,
    IToken,
    MessageHandler,
    QoS,
    WillOptions,
} from "./types"
import { Token } from "./Token"
import { matchTopic } from "./topic"
import { Logger } from "../utils/logger"

export interface PublishedMessage {
    topic: string
    qos: QoS
    retained: boolean
    payload: string
}

interface Subscription {
    qos: QoS
    handler: MessageHandler
}

export interface MockBrokerClientOptions {
    will?: Partial<WillOptions>
    output?: NodeJS.WritableStream
    // true 면 connect 토큰은 completeConnect 호출 전까지 완료되지 않는다
    deferConnect?: boolean
}

type FailureRule = (topic: string) => Error | undefined

export class MockBrokerClient extends EventEmitter implements IBrokerClient {
    readonly published: PublishedMessage[] = []
    readonly unsubscribed: string[] = []
    connectCount = 0
    disconnectCount = 0

    private connected = false
    private subscriptions = new Map<string, Subscription>()
    private callbackMessage?: Buffer
    private pendingConnect?: Token
    private connectFailure?: Error
    private publishFailure?: FailureRule
    private subscribeFailure?: FailureRule
    private readonly will: WillOptions
    private readonly logger = Logger.getInstance("MockBrokerClient")

    constructor(private readonly options: MockBrokerClientOptions = {}) {
        super()
        this.will = {
            willTopic: options.will?.willTopic ?? "",
            willPayload: options.will?.willPayload ?? Buffer.alloc(0),
            willQos: options.will?.willQos ?? 0,
            willRetained: options.will?.willRetained ?? false,
        }
    }

    isConnected(): boolean {
        return this.connected
    }

    connect(): IToken {
        this.connectCount++

        if (this.options.deferConnect) {
            this.pendingConnect = new Token()
            return this.pendingConnect
        }

        if (this.connectFailure) {
            return Token.resolved(this.connectFailure)
        }
        this.connected = true
        return Token.resolved()
    }

    // deferConnect 모드에서 보류된 connect 완료
    completeConnect(error?: Error): void {
        const token = this.pendingConnect
        if (!token) {
            return
        }
        this.pendingConnect = undefined
        this.connected = error === undefined
        token.complete(error)
    }

    disconnect(_quiesceMs: number): void {
        this.disconnectCount++
        this.connected = false
        this.emit("disconnect")
    }

    publish(
        topic: string,
        qos: QoS,
        retained: boolean,
        payload: string | Buffer
    ): IToken {
        const failure = this.publishFailure?.(topic)
        if (failure) {
            return Token.resolved(failure)
        }

        const message: PublishedMessage = {
            topic,
            qos,
            retained,
            payload: payload.toString(),
        }
        this.published.push(message)
        this.write(message)
        this.emit("publish", message)

        return Token.resolved()
    }

    subscribe(topic: string, qos: QoS, handler: MessageHandler): IToken {
        return this.subscribeMultiple({ [topic]: qos }, handler)
    }

    subscribeMultiple(
        filters: Record<string, QoS>,
        handler: MessageHandler
    ): IToken {
        const topics = Object.keys(filters)
        for (const topic of topics) {
            const failure = this.subscribeFailure?.(topic)
            if (failure) {
                return Token.resolved(failure)
            }
        }

        for (const topic of topics) {
            this.subscriptions.set(topic, { qos: filters[topic], handler })
        }

        const callbackMessage = this.callbackMessage
        if (callbackMessage) {
            for (const topic of topics) {
                handler(this, { topic, payload: callbackMessage })
            }
        }

        return Token.resolved()
    }

    unsubscribe(...topics: string[]): IToken {
        for (const topic of topics) {
            this.subscriptions.delete(topic)
            this.unsubscribed.push(topic)
        }
        return Token.resolved()
    }

    optionsReader(): WillOptions {
        return this.will
    }

    /**
     * 구독 중인 핸들러로 메시지 전달. 호출된 핸들러 수를 반환
     */
    deliver(topic: string, payload: string | Buffer = ""): number {
        const message: BrokerMessage = {
            topic,
            payload: Buffer.isBuffer(payload) ? payload : Buffer.from(payload),
        }

        let delivered = 0
        for (const [filter, subscription] of this.subscriptions) {
            if (matchTopic(filter, topic)) {
                subscription.handler(this, message)
                delivered++
            }
        }
        return delivered
    }

    // 이후 구독마다 즉시 이 payload 로 핸들러 호출
    setCallbackMessage(payload?: string | Buffer): void {
        this.callbackMessage =
            payload === undefined ? undefined : Buffer.from(payload)
    }

    failConnect(error?: Error): void {
        this.connectFailure = error
    }

    failPublish(rule?: FailureRule): void {
        this.publishFailure = rule
    }

    failSubscribe(rule?: FailureRule): void {
        this.subscribeFailure = rule
    }

    isSubscribed(topic: string): boolean {
        return this.subscriptions.has(topic)
    }

    subscribedTopics(): string[] {
        return Array.from(this.subscriptions.keys())
    }

    publishesTo(topic: string): PublishedMessage[] {
        return this.published.filter((message) => message.topic === topic)
    }

    /**
     * 조건에 맞는 다음 발행을 기다린다 (이미 기록된 발행은 보지 않음)
     */
    waitForPublish(
        topic: string,
        predicate: (message: PublishedMessage) => boolean = () => true,
        timeoutMs = 2000
    ): Promise<PublishedMessage> {
        return new Promise((resolve, reject) => {
            const onPublish = (message: PublishedMessage) => {
                if (message.topic === topic && predicate(message)) {
                    clearTimeout(timer)
                    this.off("publish", onPublish)
                    resolve(message)
                }
            }
            const timer = setTimeout(() => {
                this.off("publish", onPublish)
                reject(new Error(`Timed out waiting for publish to ${topic}`))
            }, timeoutMs)

            this.on("publish", onPublish)
        })
    }

    private write(message: PublishedMessage): void {
        const output = this.options.output
        if (!output) {
            return
        }

        try {
            output.write(
                JSON.stringify(
                    { [message.topic]: decodePayload(message.payload) },
                    null,
                    2
                ) + "\n"
            )
        } catch (error) {
            this.logger.error(`Error encoding ${message.topic}`, error)
        }
    }
}

// JSON 이 아닌 payload 는 문자열 그대로
function decodePayload(payload: string): unknown {
    try {
        return JSON.parse(payload)
    } catch {
        return payload
    }
}
