/**
 * Path: src/broker/MqttBrokerClient.ts
 * mqtt 패키지 클라이언트를 IBrokerClient 로 감싼 어댑터
 * - 재연결은 mqtt 클라이언트(reconnectPeriod)가 담당
 * - 수신 메시지는 필터가 일치하는 핸들러로 라우팅
 */

import { connect, IClientOptions, MqttClient } from "mqtt"
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
import { MqttConfig } from "../config/types"
import { BridgeError, ErrorCode } from "../errors/types"
import { Logger } from "../utils/logger"

export class MqttBrokerClient implements IBrokerClient {
    private readonly client: MqttClient
    private readonly handlers = new Map<string, MessageHandler>()
    private readonly will: WillOptions
    private readonly logger = Logger.getInstance("MqttBrokerClient")
    private connectToken?: Token

    constructor(private readonly config: MqttConfig) {
        this.will = {
            willTopic: config.birthWillEnabled ? config.birthWillTopic : "",
            willPayload: Buffer.from(config.willPayload),
            willQos: config.willQos,
            willRetained: config.willRetained,
        }
        this.client = connect(config.broker, this.clientOptions())
        this.setupClientEventHandlers()
    }

    private clientOptions(): IClientOptions {
        const options: IClientOptions = {
            manualConnect: true,
            clientId: this.config.clientId || undefined,
            username: this.config.username || undefined,
            password: this.config.password || undefined,
            reconnectPeriod: this.config.reconnectInterval,
            connectTimeout: this.config.connectTimeout,
        }
        if (this.config.keepAlive > 0) {
            options.keepalive = Math.round(this.config.keepAlive / 1000)
        }
        if (this.will.willTopic) {
            options.will = {
                topic: this.will.willTopic,
                payload: this.will.willPayload,
                qos: this.will.willQos,
                retain: this.will.willRetained,
            }
        }
        return options
    }

    private setupClientEventHandlers(): void {
        this.client.on("connect", () => {
            this.logger.debug("Connected to broker", {
                broker: this.config.broker,
            })
            this.connectToken?.complete()
        })

        this.client.on("error", (error: Error) => {
            const token = this.connectToken
            if (token && !token.isDone()) {
                token.complete(
                    new BridgeError(
                        ErrorCode.CONNECTION_FAILED,
                        `Unable to connect to ${this.config.broker}: ${error.message}`,
                        error
                    )
                )
                return
            }
            this.logger.warnError("Broker client error", error)
        })

        this.client.on("close", () => {
            this.logger.debug("Broker connection closed")
        })

        this.client.on("message", (topic: string, payload: Buffer, packet) => {
            this.route({ topic, payload, retained: packet.retain })
        })
    }

    private route(message: BrokerMessage): void {
        for (const [filter, handler] of this.handlers) {
            if (matchTopic(filter, message.topic)) {
                handler(this, message)
            }
        }
    }

    isConnected(): boolean {
        return this.client.connected
    }

    connect(): IToken {
        if (this.connectToken) {
            return this.connectToken
        }
        this.connectToken = new Token()
        this.client.connect()
        return this.connectToken
    }

    disconnect(quiesceMs: number): void {
        const force = setTimeout(() => this.client.end(true), quiesceMs)
        this.client.end(false, {}, () => clearTimeout(force))
    }

    publish(
        topic: string,
        qos: QoS,
        retained: boolean,
        payload: string | Buffer
    ): IToken {
        const token = new Token()
        this.client.publish(topic, payload, { qos, retain: retained }, (error) => {
            token.complete(
                error
                    ? new BridgeError(
                          ErrorCode.PUBLISH_FAILED,
                          `Unable to publish to ${topic}: ${error.message}`,
                          error
                      )
                    : undefined
            )
        })
        return token
    }

    subscribe(topic: string, qos: QoS, handler: MessageHandler): IToken {
        return this.subscribeMultiple({ [topic]: qos }, handler)
    }

    subscribeMultiple(
        filters: Record<string, QoS>,
        handler: MessageHandler
    ): IToken {
        const token = new Token()
        const topics = Object.keys(filters)
        for (const topic of topics) {
            this.handlers.set(topic, handler)
        }

        const subscriptions: Record<string, { qos: QoS }> = {}
        for (const topic of topics) {
            subscriptions[topic] = { qos: filters[topic] }
        }

        this.client.subscribe(subscriptions, (error, granted) => {
            // qos 128 은 브로커가 거부한 구독
            const rejected = granted?.find((grant) => grant.qos === 128)
            if (error || rejected) {
                topics.forEach((topic) => this.handlers.delete(topic))
                token.complete(
                    new BridgeError(
                        ErrorCode.SUBSCRIPTION_FAILED,
                        `Unable to subscribe to ${topics.join(", ")}`,
                        error ?? undefined
                    )
                )
                return
            }
            token.complete()
        })
        return token
    }

    unsubscribe(...topics: string[]): IToken {
        const token = new Token()
        topics.forEach((topic) => this.handlers.delete(topic))
        this.client.unsubscribe(topics, {}, (error) => {
            token.complete(
                error
                    ? new BridgeError(
                          ErrorCode.UNSUBSCRIPTION_FAILED,
                          `Unable to unsubscribe from ${topics.join(", ")}`,
                          error
                      )
                    : undefined
            )
        })
        return token
    }

    optionsReader(): WillOptions {
        return this.will
    }
}
