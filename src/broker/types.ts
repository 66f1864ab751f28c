/**
 * Path: src/broker/types.ts
 * 브로커 클라이언트 인터페이스 정의
 */

export type QoS = 0 | 1 | 2

/**
 * 진행 중인 비동기 브로커 작업 (connect / publish / subscribe)
 */
export interface IToken {
    done(): Promise<void>
    error(): Error | undefined
    isDone(): boolean
}

export interface BrokerMessage {
    topic: string
    payload: Buffer
    retained?: boolean
}

export type MessageHandler = (client: IBrokerClient, message: BrokerMessage) => void

/**
 * 클라이언트 생성 시 고정되는 last-will 설정
 */
export interface WillOptions {
    readonly willTopic: string
    readonly willPayload: Buffer
    readonly willQos: QoS
    readonly willRetained: boolean
}

export interface IBrokerClient {
    connect(): IToken
    disconnect(quiesceMs: number): void
    isConnected(): boolean
    publish(topic: string, qos: QoS, retained: boolean, payload: string | Buffer): IToken
    subscribe(topic: string, qos: QoS, handler: MessageHandler): IToken
    subscribeMultiple(filters: Record<string, QoS>, handler: MessageHandler): IToken
    unsubscribe(...topics: string[]): IToken
    optionsReader(): WillOptions
}
