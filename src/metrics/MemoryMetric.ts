/**
 * Path: src/metrics/MemoryMetric.ts
 * 메모리 사용량 메트릭 (bytes)
 */

import os from "os"
import { BaseMetric } from "./BaseMetric"
import { ErrNoChange } from "./errors"
import { IDiscoverer } from "./types"
import { Discovery, availabilityTemplate } from "../discovery/Discovery"
import { Diagnostic, Option, Platform } from "../discovery/options"

export interface MemorySample {
    total: number
    free: number
}

export interface MemoryValue {
    total: number
    used: number
    free: number
}

export type MemoryReader = () => MemorySample

const SIZE_UNIT = "B"

const readMemory: MemoryReader = () => ({
    total: os.totalmem(),
    free: os.freemem(),
})

export class MemoryMetric extends BaseMetric implements IDiscoverer {
    private value: MemoryValue = { total: 0, used: 0, free: 0 }
    private sampled = false

    constructor(
        topic: string,
        interval: number,
        private readonly read: MemoryReader = readMemory
    ) {
        super("memory", topic, interval)
    }

    get current(): MemoryValue {
        return { ...this.value }
    }

    protected async collect(): Promise<void> {
        const { total, free } = this.read()
        const next: MemoryValue = { total, used: total - free, free }

        const unchanged =
            this.sampled &&
            next.total === this.value.total &&
            next.free === this.value.free
        this.value = next
        this.sampled = true

        if (unchanged) {
            throw ErrNoChange
        }
    }

    protected text(): string {
        return JSON.stringify(this.value)
    }

    discover(discovery: Discovery): void {
        const prefix = `${discovery.origin.name}_memory`
        const common = {
            [Option.Platform]: Platform.Sensor,
            [Option.Icon]: "mdi:memory",
            [Option.EntityCategory]: Diagnostic,
            [Option.AvailabilityTopic]: discovery.availabilityTopic,
            [Option.AvailabilityTemplate]: availabilityTemplate(this.topic()),
            [Option.StateTopic]: this.topic(),
        }

        discovery.addComponent(this.type(), prefix, {
            ...common,
            [Option.Name]: "Memory usage",
            [Option.ValueTemplate]:
                "{{ 100 * value_json.used / value_json.total }}",
            [Option.UnitOfMeasurement]: "%",
            [Option.SuggestedDisplayPrecision]: 1,
            [Option.JSONAttributesTopic]: this.topic(),
            [Option.UniqueID]: prefix,
        })

        for (const field of ["total", "used", "free"]) {
            const id = `${prefix}_${field}`
            discovery.addComponent(this.type(), id, {
                ...common,
                [Option.Name]: `Memory ${field}`,
                [Option.DeviceClass]: "data_size",
                [Option.ValueTemplate]: `{{ value_json.${field} }}`,
                [Option.UnitOfMeasurement]: SIZE_UNIT,
                [Option.UniqueID]: id,
                [Option.EnabledByDefault]: false,
            })
        }
    }
}
