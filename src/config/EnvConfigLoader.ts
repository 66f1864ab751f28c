/**
 * Path: src/config/EnvConfigLoader.ts
 * EnvConfigLoader 구현
 * - .env 파일(dotenv) + 환경 변수에서 설정 로드
 * - 토픽 앞/뒤의 "~" 는 base topic 으로 치환
 */
import dotenv from "dotenv"
import {
    AppConfig,
    CpuMetricConfig,
    DISCOVERY_METHODS,
    DiscoveryConfig,
    IConfigLoader,
    MetricConfig,
    MqttConfig,
    SELECTION_MODES,
} from "./types"
import { QoS } from "../broker/types"
import { BridgeError, ErrorCode } from "../errors/types"
import { parseDuration } from "../utils/duration"

export const DEFAULT_BASE_TOPIC = "mqttop"
export const DEFAULT_INTERVAL = 2000

/**
 * topic 의 앞 또는 뒤에 있는 "~" 를 base 로 치환
 */
export function replaceBase(base: string, topic: string): string {
    if (topic === "" || base === "") {
        return topic
    }
    let result = topic
    if (result.startsWith("~")) {
        result = base + result.slice(1)
    }
    if (result.endsWith("~")) {
        result = result.slice(0, -1) + base
    }
    return result
}

/**
 * scheme 이 없으면 tcp://, 포트가 없으면 1883
 */
export function normalizeBroker(address: string): string {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(address)
        ? address
        : `tcp://${address}`

    let url: URL
    try {
        url = new URL(withScheme)
    } catch (error) {
        throw new BridgeError(
            ErrorCode.INVALID_CONFIG,
            `Invalid broker address: ${address}`,
            error instanceof Error ? error : undefined
        )
    }
    if (url.port === "") {
        url.port = "1883"
    }
    return `${url.protocol}//${url.host}${url.pathname === "/" ? "" : url.pathname}`
}

export class EnvConfigLoader implements IConfigLoader {
    private readonly env: Record<string, string | undefined>

    constructor(envPath?: string, env: NodeJS.ProcessEnv = process.env) {
        // .env 파일 값은 이미 설정된 환경변수를 덮어쓰지 않는다
        const { parsed } = dotenv.config({
            path: envPath,
            processEnv: {},
        })
        this.env = { ...parsed, ...env }
    }

    loadConfig(): AppConfig {
        const baseTopic = this.string("BASE_TOPIC") ?? DEFAULT_BASE_TOPIC
        const interval = this.duration("METRIC_INTERVAL") ?? DEFAULT_INTERVAL
        const topic = (value: string) => replaceBase(baseTopic, value)

        const mqtt: MqttConfig = {
            broker: normalizeBroker(this.string("MQTT_BROKER") ?? "localhost"),
            clientId: this.string("MQTT_CLIENT_ID") ?? "",
            username: this.string("MQTT_USERNAME") ?? "",
            password: this.string("MQTT_PASSWORD") ?? "",
            keepAlive: this.duration("MQTT_KEEP_ALIVE") ?? 30000,
            reconnectInterval: this.duration("MQTT_RECONNECT_INTERVAL") ?? 1000,
            connectTimeout: this.duration("MQTT_CONNECT_TIMEOUT") ?? 30000,
            birthWillEnabled: this.boolean("BIRTH_LWT_ENABLED") ?? true,
            birthWillTopic: topic(
                this.string("BIRTH_LWT_TOPIC") ?? "~/bridge/status"
            ),
            willPayload: "offline",
            willQos: 1,
            willRetained: true,
        }

        let deviceName = this.string("DISCOVERY_DEVICE_NAME")
        if (deviceName === "username") {
            deviceName = mqtt.username
        }

        const discovery: DiscoveryConfig = {
            enabled: this.boolean("DISCOVERY_ENABLED") ?? true,
            prefix: this.string("DISCOVERY_PREFIX") ?? "homeassistant",
            deviceName,
            nodeId: this.string("DISCOVERY_NODE_ID") ?? "mqttop",
            availability: topic(
                this.string("DISCOVERY_AVAILABILITY") ?? mqtt.birthWillTopic
            ),
            retained: this.boolean("DISCOVERY_RETAINED") ?? true,
            qos: this.qos("DISCOVERY_QOS") ?? 0,
            waitTopic: this.string("DISCOVERY_WAIT_TOPIC"),
            waitPayload: this.string("DISCOVERY_WAIT_PAYLOAD"),
            method:
                this.oneOf("DISCOVERY_METHOD", DISCOVERY_METHODS) ?? "nodes",
            settleDelay: this.duration("DISCOVERY_SETTLE_DELAY") ?? 1000,
        }

        const cpu: CpuMetricConfig = {
            ...this.metric("CPU", `${baseTopic}/metric/cpu`, topic),
            selectionMode:
                this.oneOf("CPU_SELECTION_MODE", SELECTION_MODES) ?? "auto",
        }
        const memory = this.metric(
            "MEMORY",
            `${baseTopic}/metric/memory`,
            topic
        )

        return {
            baseTopic,
            interval,
            dataPath: this.string("DATA_PATH"),
            mockBroker: this.boolean("MOCK_BROKER") ?? false,
            offlineAfterFailures:
                this.count("METRIC_OFFLINE_AFTER_FAILURES") ?? 0,
            mqtt,
            discovery,
            metrics: { cpu, memory },
        }
    }

    private metric(
        prefix: string,
        defaultTopic: string,
        topic: (value: string) => string
    ): MetricConfig {
        return {
            enabled: this.boolean(`${prefix}_ENABLED`) ?? true,
            interval: this.duration(`${prefix}_INTERVAL`),
            topic: topic(this.string(`${prefix}_TOPIC`) ?? defaultTopic),
        }
    }

    private string(name: string): string | undefined {
        const value = this.env[name]?.trim()
        return value ? value : undefined
    }

    private boolean(name: string): boolean | undefined {
        const value = this.string(name)?.toLowerCase()
        if (value === undefined) {
            return undefined
        }
        if (["1", "true", "yes", "on"].includes(value)) {
            return true
        }
        if (["0", "false", "no", "off"].includes(value)) {
            return false
        }
        throw this.invalid(name, value)
    }

    private duration(name: string): number | undefined {
        const value = this.string(name)
        if (value === undefined) {
            return undefined
        }
        try {
            const ms = parseDuration(value)
            if (ms < 0) {
                throw new Error("negative duration")
            }
            return ms
        } catch (error) {
            throw this.invalid(name, value, error)
        }
    }

    private count(name: string): number | undefined {
        const value = this.string(name)
        if (value === undefined) {
            return undefined
        }
        if (!/^\d+$/.test(value)) {
            throw this.invalid(name, value)
        }
        return Number(value)
    }

    private qos(name: string): QoS | undefined {
        const value = this.string(name)
        switch (value) {
            case undefined:
                return undefined
            case "0":
                return 0
            case "1":
                return 1
            case "2":
                return 2
            default:
                throw this.invalid(name, value)
        }
    }

    private oneOf<T extends string>(
        name: string,
        allowed: readonly T[]
    ): T | undefined {
        const value = this.string(name)
        if (value === undefined) {
            return undefined
        }
        const match = allowed.find((option) => option === value)
        if (match === undefined) {
            throw this.invalid(name, value)
        }
        return match
    }

    private invalid(name: string, value: string, cause?: unknown): BridgeError {
        return new BridgeError(
            ErrorCode.INVALID_CONFIG,
            `Invalid value for ${name}: "${value}"`,
            cause instanceof Error ? cause : undefined
        )
    }
}
