/**
 * Path: src/metrics/BaseMetric.ts
 * 주기 기반 메트릭 기본 구현
 * - interval 마다 collect() 실행 후 "updated" 이벤트 발행
 * - start 는 한 번만 가능, stop 후 "close" 이벤트
 */

import { EventEmitter } from "events"
import { IMetric, IReconfigurable, MetricEvents } from "./types"
import { MetricError, errAlreadyRunning } from "./errors"
import { BridgeError, ErrorCode, toError } from "../errors/types"
import { Logger } from "../utils/logger"
import { formatDuration } from "../utils/duration"

export abstract class BaseMetric
    extends EventEmitter
    implements IMetric, IReconfigurable
{
    protected readonly logger: Logger
    private timer?: NodeJS.Timeout
    private started = false
    private stopped = false
    private collecting = false
    private detachSignal?: () => void

    protected constructor(
        private readonly metricType: string,
        private readonly metricTopic: string,
        private intervalMs: number
    ) {
        super()
        this.logger = Logger.getInstance(`metric:${metricType}`)
    }

    emit<K extends keyof MetricEvents>(
        event: K,
        ...args: Parameters<MetricEvents[K]>
    ): boolean {
        return super.emit(event, ...args)
    }

    on<K extends keyof MetricEvents>(event: K, listener: MetricEvents[K]): this {
        return super.on(event, listener)
    }

    off<K extends keyof MetricEvents>(event: K, listener: MetricEvents[K]): this {
        return super.off(event, listener)
    }

    type(): string {
        return this.metricType
    }

    topic(): string {
        return this.metricTopic
    }

    get interval(): number {
        return this.intervalMs
    }

    get isRunning(): boolean {
        return this.started && !this.stopped
    }

    async start(signal: AbortSignal): Promise<void> {
        if (this.stopped) {
            throw new MetricError(
                ErrorCode.METRIC_START_FAILED,
                `${this.metricType} has been stopped`
            )
        }
        if (this.started) {
            throw errAlreadyRunning(this.metricType)
        }
        if (this.intervalMs <= 0) {
            throw new MetricError(
                ErrorCode.METRIC_START_FAILED,
                `${this.metricType} has no update interval`
            )
        }

        // 첫 값 수집 (지원하지 않는 환경이면 여기서 실패)
        await this.initialize()

        this.started = true
        const onAbort = () => this.stop()
        signal.addEventListener("abort", onAbort, { once: true })
        this.detachSignal = () => signal.removeEventListener("abort", onAbort)

        if (signal.aborted) {
            this.stop()
            return
        }
        this.schedule()
        this.logger.debug("Metric started", {
            topic: this.metricTopic,
            interval: formatDuration(this.intervalMs),
        })
    }

    stop(): void {
        if (this.stopped) {
            return
        }
        this.stopped = true
        clearInterval(this.timer)
        this.timer = undefined
        this.detachSignal?.()
        this.detachSignal = undefined
        this.emit("close")
    }

    async update(): Promise<void> {
        await this.collect()
    }

    setInterval(ms: number): void {
        if (ms <= 0) {
            throw new BridgeError(
                ErrorCode.INVALID_CONFIG,
                `Invalid interval for ${this.metricType}: ${ms}`
            )
        }
        this.intervalMs = ms
        if (this.timer) {
            clearInterval(this.timer)
            this.schedule()
        }
        this.logger.debug("Interval changed", {
            interval: formatDuration(ms),
        })
    }

    appendText(buffer: Buffer = Buffer.alloc(0)): Buffer {
        return Buffer.concat([buffer, Buffer.from(this.text())])
    }

    /**
     * 시작 시 한 번 호출. 기본은 첫 collect, no-change 는 무시
     */
    protected async initialize(): Promise<void> {
        try {
            await this.collect()
        } catch (error) {
            if (
                !(error instanceof BridgeError) ||
                error.code !== ErrorCode.NO_CHANGE
            ) {
                throw error
            }
        }
    }

    /**
     * 값을 새로 읽는다. 변경이 없으면 ErrNoChange, 구성이 바뀌었으면 ErrRescanned 로 reject
     */
    protected abstract collect(): Promise<void>

    // 현재 값의 wire 텍스트
    protected abstract text(): string

    private schedule(): void {
        this.timer = setInterval(() => {
            this.tick().catch((error: unknown) =>
                this.logger.error("Metric tick failed", error)
            )
        }, this.intervalMs)
    }

    private async tick(): Promise<void> {
        if (this.collecting || this.stopped) {
            return
        }

        this.collecting = true
        let outcome: Error | null = null
        try {
            await this.collect()
        } catch (error) {
            outcome = toError(error)
        } finally {
            this.collecting = false
        }

        if (!this.stopped) {
            this.emit("updated", outcome)
        }
    }
}
