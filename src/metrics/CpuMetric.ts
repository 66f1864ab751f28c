/**
 * Path: src/metrics/CpuMetric.ts
 * CPU 사용률 메트릭
 * - 코어별 사용률은 직전 샘플과의 차이로 계산
 * - 코어 수가 바뀌면 ErrRescanned (재디스커버리)
 */

import os from "os"
import { BaseMetric } from "./BaseMetric"
import { ErrNoChange, ErrRescanned, errNotSupported } from "./errors"
import { IDiscoverer, ISelectable } from "./types"
import { SELECTION_MODES, SelectionMode } from "../config/types"
import { BridgeError, ErrorCode, toError } from "../errors/types"
import { Discovery, availabilityTemplate } from "../discovery/Discovery"
import { Diagnostic, Option, Platform } from "../discovery/options"

export type CpuTimes = os.CpuInfo["times"]
export type CpuReader = () => CpuTimes[]

export interface CoreUsage {
    core: number
    usage: number
}

const readCpus: CpuReader = () => os.cpus().map((cpu) => cpu.times)

export class CpuMetric extends BaseMetric implements IDiscoverer, ISelectable {
    private previous: CpuTimes[] = []
    private cores: CoreUsage[] = []
    private usage = 0

    constructor(
        topic: string,
        interval: number,
        private selectionMode: SelectionMode = "auto",
        private readonly read: CpuReader = readCpus
    ) {
        super("cpu", topic, interval)
    }

    get mode(): SelectionMode {
        return this.selectionMode
    }

    get coreCount(): number {
        return this.cores.length
    }

    setSelectionMode(mode: string): void {
        const match = SELECTION_MODES.find((option) => option === mode)
        if (!match) {
            throw new BridgeError(
                ErrorCode.INVALID_CONFIG,
                `Invalid selection mode: ${mode}`
            )
        }
        this.selectionMode = match
        this.usage = this.select(this.cores)
    }

    protected async collect(): Promise<void> {
        const samples = this.sample()
        const rescanned =
            this.previous.length > 0 && samples.length !== this.previous.length

        const cores = samples.map((times, core) => ({
            core,
            usage: usageOf(times, rescanned ? undefined : this.previous[core]),
        }))
        const usage = this.select(cores)
        const changed =
            cores.length !== this.cores.length ||
            usage !== this.usage ||
            cores.some((core, i) => core.usage !== this.cores[i].usage)

        this.previous = samples
        this.cores = cores
        this.usage = usage

        if (rescanned) {
            throw ErrRescanned
        }
        if (!changed) {
            throw ErrNoChange
        }
    }

    protected text(): string {
        return JSON.stringify({ usage: this.usage, cores: this.cores })
    }

    discover(discovery: Discovery): void {
        const avail = availabilityTemplate(this.topic())
        const prefix = `${discovery.origin.name}_cpu`
        const sensor = (
            id: string,
            name: string,
            template: string,
            enabled: boolean
        ) =>
            discovery.addComponent(this.type(), id, {
                [Option.Platform]: Platform.Sensor,
                [Option.Name]: name,
                [Option.Icon]: "mdi:cpu-64-bit",
                [Option.EntityCategory]: Diagnostic,
                [Option.StateTopic]: this.topic(),
                [Option.AvailabilityTopic]: discovery.availabilityTopic,
                [Option.AvailabilityTemplate]: avail,
                [Option.ValueTemplate]: template,
                [Option.UnitOfMeasurement]: "%",
                [Option.UniqueID]: id,
                [Option.EnabledByDefault]: enabled,
            })

        sensor(prefix, "CPU usage", "{{ value_json.usage }}", true)
        for (const { core } of this.cores) {
            sensor(
                `${prefix}_core_${core}`,
                `Core ${core} usage`,
                `{{ value_json.cores[${core}].usage }}`,
                false
            )
        }
    }

    private sample(): CpuTimes[] {
        let samples: CpuTimes[]
        try {
            samples = this.read()
        } catch (error) {
            throw errNotSupported(this.type(), toError(error))
        }
        // 일부 컨테이너 환경은 코어 정보를 주지 않는다
        if (samples.length === 0) {
            throw errNotSupported(this.type())
        }
        return samples
    }

    private select(cores: CoreUsage[]): number {
        if (cores.length === 0) {
            return 0
        }
        switch (this.selectionMode) {
            case "first":
                return cores[0].usage
            case "max":
                return Math.max(...cores.map((core) => core.usage))
            default:
                return round(
                    cores.reduce((sum, core) => sum + core.usage, 0) /
                        cores.length
                )
        }
    }
}

function total(times: CpuTimes): number {
    return times.user + times.nice + times.sys + times.idle + times.irq
}

// previous 가 없으면 부팅 이후 누적값 기준
export function usageOf(current: CpuTimes, previous?: CpuTimes): number {
    const elapsed = total(current) - (previous ? total(previous) : 0)
    const idle = current.idle - (previous ? previous.idle : 0)
    if (elapsed <= 0) {
        return 0
    }
    return round((1 - idle / elapsed) * 100)
}

function round(value: number): number {
    return Math.round(value * 10) / 10
}
