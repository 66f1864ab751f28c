/**
 * Path: src/bridge/Bridge.ts
 * 메트릭 -> 브로커 브리지
 * - 메트릭별 이벤트 루프가 갱신 결과를 분류해 중앙 이벤트 채널로 전달
 * - 중앙 발행 루프가 값 발행과 재디스커버리를 순서대로 처리
 * - 토픽별 생존 상태가 바뀔 때만 last-will 토픽에 스냅샷 발행
 */

import { EventEmitter } from "events"
import { AppConfig } from "../config/types"
import { DEFAULT_BASE_TOPIC } from "../config/EnvConfigLoader"
import { IBrokerClient, IToken, MessageHandler } from "../broker/types"
import { MqttBrokerClient } from "../broker/MqttBrokerClient"
import { Token, waitToken } from "../broker/Token"
import { Discovery } from "../discovery/Discovery"
import { Option, Platform } from "../discovery/options"
import { ErrorHandler } from "../errors/ErrorHandler"
import {
    BridgeError,
    ErrorCode,
    ErrorSeverity,
    toError,
} from "../errors/types"
import StateManager from "../managers/StateManager"
import { createMetrics } from "../metrics"
import { OutcomeKind, classifyOutcome } from "../metrics/errors"
import { IMetric, isDiscoverer } from "../metrics/types"
import {
    BridgeState,
    StateTransitionEvent,
    validStateTransitions,
} from "../states/types"
import { Channel, maybeSend } from "../utils/Channel"
import { Logger } from "../utils/logger"
import { sleep } from "../utils/signal"
import { applyUpdatePayload } from "./control"
import { BridgeEvent, BridgeEvents, BridgeOptions } from "./types"

export const BRIDGE_NODE = "bridge"
export const DISCONNECT_QUIESCE = 500
const DEFAULT_SETTLE_DELAY = 1000

interface OutcomeStream {
    outcomes: Channel<Error | null>
    detach: () => void
}

export class Bridge extends EventEmitter {
    private readonly client: IBrokerClient
    private readonly baseTopic: string
    private readonly discovery?: Discovery
    private readonly migrate: boolean
    private readonly settleDelay: number
    private readonly offlineAfterFailures: number
    private readonly slots: Array<IMetric | undefined>
    private readonly loaded = new Set<IMetric>()
    private readonly stateMap = new StateManager()
    private readonly failures = new Map<string, number>()
    private readonly loops = new Set<Promise<void>>()
    private readonly logger = Logger.getInstance("Bridge")
    private readonly errorHandler: ErrorHandler

    private state = BridgeState.INITIAL
    private starting?: Promise<void>
    private controller?: AbortController
    private readonly events = new Channel<BridgeEvent>()
    private inflight?: IToken
    private startError?: Error
    private cursor = 0
    private isReady = false
    private isDone = false

    private resolveReady: () => void = () => undefined
    private resolveDone: () => void = () => undefined
    private readonly readyPromise = new Promise<void>((resolve) => {
        this.resolveReady = resolve
    })
    private readonly donePromise = new Promise<void>((resolve) => {
        this.resolveDone = resolve
    })

    emit<K extends keyof BridgeEvents>(
        event: K,
        ...args: Parameters<BridgeEvents[K]>
    ): boolean {
        return super.emit(event, ...args)
    }

    on<K extends keyof BridgeEvents>(event: K, listener: BridgeEvents[K]): this {
        return super.on(event, listener)
    }

    constructor(config: AppConfig, options: BridgeOptions = {}) {
        super()
        this.client = options.client ?? new MqttBrokerClient(config.mqtt)
        this.slots = [...(options.metrics ?? createMetrics(config))]
        this.baseTopic =
            options.baseTopic || config.baseTopic || DEFAULT_BASE_TOPIC
        this.migrate = options.migrate ?? false
        this.settleDelay = config.discovery.settleDelay ?? DEFAULT_SETTLE_DELAY
        this.offlineAfterFailures =
            options.offlineAfterFailures ?? config.offlineAfterFailures ?? 0
        this.discovery = options.discovery ?? this.createDiscovery(config)
        this.errorHandler = new ErrorHandler(
            () => this.stop(),
            (error) => this.logError(error)
        )
    }

    /**
     * 브로커에 연결하고 시작 절차를 비동기로 진행한다.
     * 메트릭이 없거나 첫 연결이 실패하면 reject. 두 번째 호출은 아무것도 하지 않는다.
     */
    async start(signal?: AbortSignal): Promise<void> {
        if (this.slots.length === 0) {
            throw new BridgeError(
                ErrorCode.NO_METRICS,
                "no metrics",
                undefined,
                ErrorSeverity.HIGH
            )
        }

        this.starting ??= this.launch(signal)
        try {
            await this.starting
        } catch (error) {
            this.starting = undefined
            throw error
        }
    }

    ready(): Promise<void> {
        return this.readyPromise
    }

    done(): Promise<void> {
        return this.donePromise
    }

    // 시작 절차에서 처음 발생한 에러
    error(): Error | undefined {
        return this.startError
    }

    getState(): BridgeState {
        return this.state
    }

    /**
     * 여러 번, 그리고 시작 전후 언제든 호출할 수 있다.
     */
    async stop(): Promise<void> {
        this.logger.debug("Stopping bridge")
        if (this.starting) {
            try {
                await this.starting
            } catch (error) {
                this.logger.debug("Bridge was not started", {
                    error: toError(error).message,
                })
                return
            }
        }

        const controller = this.controller
        if (!controller) {
            return
        }

        await Promise.race([this.readyPromise, this.donePromise])
        controller.abort()
        await this.donePromise
    }

    /**
     * ready 이후에는 바로 시작(재디스커버리 포함),
     * 그 전에는 목록에 추가되어 시작 절차에서 처리된다.
     */
    async addMetric(metric: IMetric, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted || this.isDone || this.controller?.signal.aborted) {
            return
        }

        const index = this.slots.push(metric) - 1
        const controller = this.controller
        if (!this.isReady || !controller) {
            return
        }
        await this.startMetric(controller.signal, index, metric, true)
    }

    // 시작되어 이벤트 루프가 돌고 있는 메트릭 (목록 순서)
    metrics(): IMetric[] {
        return this.slots.filter(
            (metric): metric is IMetric =>
                metric !== undefined && this.loaded.has(metric)
        )
    }

    states(): Record<string, boolean> {
        return this.stateMap.snapshot()
    }

    /**
     * 모든 메트릭을 즉시 갱신하고 결과를 발행한다
     */
    async update(): Promise<void> {
        const signal = this.controller?.signal
        if (!signal || signal.aborted) {
            return
        }

        await Promise.all(
            this.metrics().map(async (metric) => {
                let error: Error | null = null
                try {
                    await metric.update()
                } catch (updateError) {
                    error = toError(updateError)
                }

                const outcome = classifyOutcome(error)
                await this.updateState(signal, metric, outcome)

                switch (outcome) {
                    case "success":
                    case "no-change":
                        maybeSend(signal, this.events, {
                            type: "update",
                            metric,
                        })
                        break
                    case "rescanned":
                        this.sendRediscover(signal, metric)
                        break
                    default:
                        this.errorHandler.handleMetricError(metric.type(), error)
                }
            })
        )
    }

    /**
     * 브리지 자체 컴포넌트 (update 버튼)
     */
    discover(discovery: Discovery): void {
        const id = `${discovery.origin.name}_update`
        discovery.addComponent(BRIDGE_NODE, id, {
            [Option.Platform]: Platform.Button,
            [Option.Name]: "Update",
            [Option.DeviceClass]: "restart",
            [Option.AvailabilityTopic]: discovery.availabilityTopic,
            [Option.AvailabilityTemplate]:
                "{{ iif(value == 'offline', value, 'online') }}",
            [Option.CommandTopic]: `${this.baseTopic}/bridge/update`,
            [Option.UniqueID]: id,
        })
    }

    private createDiscovery(config: AppConfig): Discovery | undefined {
        if (!config.discovery.enabled) {
            return undefined
        }
        try {
            return new Discovery(config.discovery)
        } catch (error) {
            this.logger.error("Unable to get discovery", error)
            return undefined
        }
    }

    private async launch(signal?: AbortSignal): Promise<void> {
        this.setState(BridgeState.CONNECTING)

        const parent = signal ?? new AbortController().signal
        const error = await waitToken(parent, this.client.connect())
        if (error) {
            this.setState(BridgeState.ERROR)
            throw new BridgeError(
                ErrorCode.CONNECTION_FAILED,
                "Failed to connect to broker",
                error,
                ErrorSeverity.HIGH
            )
        }

        const controller = new AbortController()
        this.controller = controller
        if (parent.aborted) {
            controller.abort()
        } else {
            parent.addEventListener("abort", () => controller.abort(), {
                once: true,
            })
        }
        // 취소되면 대기 중인 소비 루프를 깨운다
        controller.signal.addEventListener(
            "abort",
            () => this.events.close(),
            { once: true }
        )

        this.setState(BridgeState.STARTING)
        this.run(controller.signal).catch((runError: unknown) =>
            this.errorHandler.handleError(runError)
        )
    }

    private async run(signal: AbortSignal): Promise<void> {
        try {
            await this.startup(signal)
            if (!signal.aborted) {
                this.isReady = true
                this.setState(BridgeState.READY)
                this.resolveReady()
                this.logger.info("Bridge ready", {
                    metrics: this.metrics().length,
                })
                await this.loop(signal)
            }
        } finally {
            await this.shutdown()
        }
    }

    private async startup(signal: AbortSignal): Promise<void> {
        // 길이를 매번 다시 읽는다 (ready 전에 추가된 메트릭 포함)
        for (; this.cursor < this.slots.length; this.cursor++) {
            const metric = this.slots[this.cursor]
            if (metric) {
                await this.startMetric(signal, this.cursor, metric, false)
            }
            if (signal.aborted) {
                return
            }
        }

        this.recordError(
            await waitToken(signal, this.publishStates(false)),
            "Unable to publish states"
        )

        this.recordError(
            await waitToken(
                signal,
                this.client.subscribe(`${this.baseTopic}/bridge/stop`, 0, () => {
                    this.stop().catch((error: unknown) =>
                        this.logger.error("Unable to stop bridge", error)
                    )
                })
            ),
            "Unable to subscribe bridge stop"
        )

        this.recordError(
            await waitToken(
                signal,
                this.client.subscribe(
                    `${this.baseTopic}/bridge/update`,
                    0,
                    () => {
                        this.update().catch((error: unknown) =>
                            this.logger.error("Unable to update bridge", error)
                        )
                    }
                )
            ),
            "Unable to subscribe bridge update"
        )

        if (this.discovery && !signal.aborted) {
            try {
                await this.discoverAll(signal, this.discovery)
            } catch (error) {
                this.recordError(toError(error), "Unable to publish discovery")
            }
        }

        // 시작 절차 중에 추가된 메트릭
        while (this.cursor < this.slots.length && !signal.aborted) {
            const index = this.cursor++
            const metric = this.slots[index]
            if (metric) {
                await this.startMetric(signal, index, metric, true)
            }
        }
    }

    private async startMetric(
        signal: AbortSignal,
        index: number,
        metric: IMetric,
        discover: boolean
    ): Promise<void> {
        const topic = metric.topic()
        if (!topic) {
            this.logger.debug("No topic, skipping", { metric: metric.type() })
            this.slots[index] = undefined
            return
        }

        try {
            await metric.start(signal)
        } catch (error) {
            this.logger.error(`Could not start ${metric.type()}`, error)
            this.stateMap.store(topic, false)
            this.slots[index] = undefined
            return
        }
        this.stateMap.store(topic, true)
        const stream = this.attach(signal, metric)

        const error = await waitToken(
            signal,
            this.client.subscribeMultiple(
                { [`${topic}/update`]: 0, [`${topic}/stop`]: 0 },
                this.metricHandler(signal, index, metric)
            )
        )
        if (error) {
            this.logger.error(`Could not subscribe to ${topic}`, error)
            stream.detach()
            metric.stop()
            this.stateMap.store(topic, false)
            this.slots[index] = undefined
            return
        }

        this.loaded.add(metric)
        const loop: Promise<void> = this.loopMetric(signal, index, metric, stream)
            .catch((loopError: unknown) =>
                this.logger.error(`Metric loop failed: ${topic}`, loopError)
            )
            .then(() => {
                this.loops.delete(loop)
            })
        this.loops.add(loop)

        if (discover) {
            this.sendRediscover(signal, metric)
        }
    }

    private attach(signal: AbortSignal, metric: IMetric): OutcomeStream {
        const outcomes = new Channel<Error | null>()
        const onUpdated = (error: Error | null) => {
            outcomes.send(error)
        }
        const onClose = () => outcomes.close()

        metric.on("updated", onUpdated)
        metric.on("close", onClose)
        signal.addEventListener("abort", onClose, { once: true })
        if (signal.aborted) {
            outcomes.close()
        }

        return {
            outcomes,
            detach: () => {
                metric.off("updated", onUpdated)
                metric.off("close", onClose)
                signal.removeEventListener("abort", onClose)
            },
        }
    }

    private async loopMetric(
        signal: AbortSignal,
        index: number,
        metric: IMetric,
        stream: OutcomeStream
    ): Promise<void> {
        const topic = metric.topic()
        try {
            for (;;) {
                const result = await stream.outcomes.receive()
                if (!result.ok || signal.aborted) {
                    return
                }
                await this.handleOutcome(signal, metric, result.value)
            }
        } finally {
            stream.detach()
            metric.stop()
            this.stateMap.delete(topic)
            this.failures.delete(topic)
            this.slots[index] = undefined
            this.loaded.delete(metric)
            this.logger.debug("Metric unloaded", { topic })

            if (!signal.aborted) {
                const unsubscribed = await waitToken(
                    signal,
                    this.client.unsubscribe(`${topic}/update`, `${topic}/stop`)
                )
                if (unsubscribed) {
                    this.logger.warnError(
                        `Unable to unsubscribe from ${topic}`,
                        unsubscribed
                    )
                }

                const error = await waitToken(signal, this.publishStates(false))
                if (error) {
                    this.logger.warnError("Unable to publish states", error)
                }
            }
        }
    }

    private async handleOutcome(
        signal: AbortSignal,
        metric: IMetric,
        error: Error | null
    ): Promise<void> {
        const outcome = classifyOutcome(error)
        const changed = await this.updateState(signal, metric, outcome)

        switch (outcome) {
            case "success":
                maybeSend(signal, this.events, { type: "update", metric })
                break
            case "no-change":
                // 회복한 경우에만 값을 다시 발행
                if (changed) {
                    maybeSend(signal, this.events, { type: "update", metric })
                }
                break
            case "rescanned":
                this.sendRediscover(signal, metric)
                break
            default:
                this.errorHandler.handleMetricError(metric.type(), error)
        }
    }

    /**
     * 상태가 바뀌었으면 스냅샷을 발행하고 true.
     * 런타임 에러는 offlineAfterFailures 가 설정된 경우에만 offline 으로 전환한다.
     */
    private async updateState(
        signal: AbortSignal,
        metric: IMetric,
        outcome: OutcomeKind
    ): Promise<boolean> {
        const topic = metric.topic()
        let changed: boolean

        if (outcome === "error") {
            const failures = (this.failures.get(topic) ?? 0) + 1
            this.failures.set(topic, failures)
            changed =
                this.offlineAfterFailures > 0 &&
                failures >= this.offlineAfterFailures &&
                this.stateMap.markOffline(topic)
        } else {
            this.failures.delete(topic)
            changed = this.stateMap.transition(topic, outcome)
        }

        if (!changed) {
            return false
        }

        this.logger.debug("State changed", {
            topic,
            state: this.stateMap.load(topic),
        })
        const error = await waitToken(signal, this.publishStates(false))
        if (error) {
            this.logger.warnError("Unable to publish states", error)
        }
        return true
    }

    private metricHandler(
        signal: AbortSignal,
        index: number,
        metric: IMetric
    ): MessageHandler {
        return (_client, message) => {
            // 슬롯이 비워진 메트릭은 구독 해제 전에 온 메시지도 무시
            if (this.slots[index] !== metric) {
                return
            }
            if (message.topic.endsWith("/update")) {
                this.handleUpdate(signal, metric, message.payload).catch(
                    (error: unknown) =>
                        this.logger.error(
                            `Unable to update ${metric.type()}`,
                            error
                        )
                )
            } else if (message.topic.endsWith("/stop")) {
                this.logger.info("Stopping metric", { topic: metric.topic() })
                metric.stop()
            }
        }
    }

    private async handleUpdate(
        signal: AbortSignal,
        metric: IMetric,
        payload: Buffer
    ): Promise<void> {
        try {
            for (const error of applyUpdatePayload(metric, payload)) {
                this.logger.warnError(
                    `Invalid setting for ${metric.type()}`,
                    error
                )
            }
        } catch (error) {
            this.logger.warnError(
                `Invalid update payload for ${metric.type()}`,
                error
            )
        }

        try {
            await metric.update()
        } catch (error) {
            this.logger.debug(`No update for ${metric.type()}`, {
                error: toError(error).message,
            })
            return
        }
        maybeSend(signal, this.events, { type: "update", metric })
    }

    private sendRediscover(signal: AbortSignal, metric: IMetric): void {
        if (this.discovery) {
            maybeSend(signal, this.events, { type: "rediscover", metric })
        }
    }

    /**
     * 중앙 발행 루프. 취소되거나 이벤트 채널이 닫히면 종료
     */
    private async loop(signal: AbortSignal): Promise<void> {
        for (;;) {
            const result = await this.events.receive()
            if (!result.ok || signal.aborted) {
                return
            }

            const event = result.value
            switch (event.type) {
                case "update":
                    this.publishMetric(event.metric)
                    break
                case "rediscover":
                    try {
                        await this.rediscover(signal, event.metric)
                    } catch (error) {
                        this.logger.warnError(
                            "Unable to publish discovery",
                            error
                        )
                    }
                    break
            }
        }
    }

    private publishMetric(metric: IMetric): void {
        let payload: Buffer
        try {
            payload = metric.appendText()
        } catch (error) {
            this.logger.warnError(`Unable to marshal ${metric.type()}`, error)
            return
        }

        // 마지막으로 보낸 발행만 결과를 확인한다
        const token = this.client.publish(metric.topic(), 0, false, payload)
        this.inflight = token
        token
            .done()
            .then(() => {
                if (this.inflight !== token) {
                    return
                }
                this.inflight = undefined
                const error = token.error()
                if (error) {
                    this.logger.warnError("Unable to publish update", error)
                }
            })
            .catch((error: unknown) =>
                this.logger.error("Publish token failed", error)
            )
    }

    private async discoverAll(
        signal: AbortSignal,
        discovery: Discovery
    ): Promise<void> {
        for (const metric of this.metrics()) {
            if (isDiscoverer(metric)) {
                metric.discover(discovery)
            }
        }
        this.discover(discovery)

        await discovery.publish(signal, this.client, this.migrate)
        await discovery.subscribeStatus(
            signal,
            this.client,
            async (statusSignal) => {
                if (await sleep(this.settleDelay, statusSignal)) {
                    await this.update()
                }
            }
        )
    }

    /**
     * 해당 타입의 컴포넌트를 placeholder 로 줄인 뒤 다시 채우고,
     * 그 타입에 속한 부분만 발행한다
     */
    private async rediscover(signal: AbortSignal, metric: IMetric): Promise<void> {
        const discovery = this.discovery
        if (!discovery || !isDiscoverer(metric)) {
            return
        }

        const type = metric.type()
        const previous = discovery.clearNode(type)
        metric.discover(discovery)
        discovery.mergeNode(type, previous)

        this.logger.debug("Rediscovering", { type })
        await discovery.publish(signal, this.client, false, type)
    }

    private publishStates(lwt: boolean): IToken {
        const options = this.client.optionsReader()
        // birth/will 이 꺼져 있으면 상태를 발행하지 않는다
        if (!options.willTopic) {
            return Token.resolved()
        }
        const payload = lwt ? options.willPayload : this.stateMap.serialize()
        return this.client.publish(
            options.willTopic,
            options.willQos,
            options.willRetained,
            payload
        )
    }

    private async shutdown(): Promise<void> {
        this.setState(BridgeState.STOPPING)
        this.controller?.abort()

        if (this.client.isConnected()) {
            const error = await waitToken(
                AbortSignal.timeout(DISCONNECT_QUIESCE),
                this.publishStates(true)
            )
            if (error) {
                this.logger.warnError("Unable to publish offline state", error)
            }
            this.client.disconnect(DISCONNECT_QUIESCE)
        }

        this.events.close()
        while (this.loops.size > 0) {
            await Promise.all(this.loops)
        }

        this.isDone = true
        this.setState(BridgeState.STOPPED)
        this.resolveDone()
        this.logger.info("Bridge stopped")
    }

    // 메트릭 런타임 에러(LOW/MEDIUM)는 경고로만 남긴다
    private logError(error: BridgeError): void {
        switch (error.severity) {
            case ErrorSeverity.HIGH:
            case ErrorSeverity.CRITICAL:
                this.logger.error(error.message, error)
                break
            default:
                this.logger.warnError(error.message, error)
        }
    }

    private recordError(error: Error | undefined, message: string): void {
        if (!error) {
            return
        }
        this.logger.error(message, error)
        this.startError ??= error
    }

    private setState(newState: BridgeState): void {
        if (this.state === newState) {
            return
        }
        if (!validStateTransitions[this.state].includes(newState)) {
            this.errorHandler.handleError(
                new BridgeError(
                    ErrorCode.INVALID_STATE,
                    `Invalid state transition from ${this.state} to ${newState}`,
                    undefined,
                    ErrorSeverity.HIGH
                )
            )
            return
        }

        const event: StateTransitionEvent = {
            previousState: this.state,
            currentState: newState,
            timestamp: Date.now(),
        }
        this.state = newState
        this.emit("stateChange", event)
    }
}
