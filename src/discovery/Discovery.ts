/**
 * Path: src/discovery/Discovery.ts
 * 자동 디스커버리 문서
 * - components: unique id -> 컴포넌트
 * - nodes: 메트릭 타입 -> 그 타입이 소유한 컴포넌트 id 목록
 * - method 에 따라 device / components / nodes 단위로 발행
 */

import fs from "fs/promises"
import { IBrokerClient } from "../broker/types"
import { waitToken } from "../broker/Token"
import {
    DISCOVERY_METHODS,
    DiscoveryConfig,
    DiscoveryMethod,
} from "../config/types"
import { BridgeError, ErrorCode } from "../errors/types"
import { Logger } from "../utils/logger"
import { abortPromise } from "../utils/signal"
import {
    Component,
    Option,
    isPlaceholder,
    placeholder,
    platformOf,
} from "./options"
import { Connection, DEVICE_STRING_KEYS, Device, createDevice } from "./Device"
import { ORIGIN_NAME, Origin, createOrigin } from "./Origin"

export const MIGRATE_PAYLOAD = '{"migrate_discovery": true}'

// 파일에 저장되는 형태. 발행 페이로드에는 _nodes / _method 가 없다
export interface DiscoveryDocument {
    o: Origin
    dev: Device
    cmps: Record<string, Component>
    _nodes?: Record<string, string[]>
    _method?: DiscoveryMethod
}

export type StatusHandler = (signal: AbortSignal) => Promise<void>

export function availabilityTemplate(topic: string): string {
    return `{{ iif(value_json[${JSON.stringify(topic)}]|default, 'online', 'offline') if value_json is defined else value }}`
}

export class Discovery {
    readonly components = new Map<string, Component>()
    readonly nodes = new Map<string, string[]>()
    readonly objectId: string
    readonly nodeId: string
    method: DiscoveryMethod
    availabilityTopic: string

    private gateOpen = false
    private readonly logger = Logger.getInstance("Discovery")

    constructor(
        private readonly config: DiscoveryConfig,
        readonly device: Device = createDevice(config.deviceName),
        readonly origin: Origin = createOrigin()
    ) {
        this.nodeId = config.nodeId || ORIGIN_NAME
        this.method = config.method
        this.availabilityTopic = config.availability
        this.objectId = objectIdOf(device)
    }

    static fromJSON(value: unknown, config: DiscoveryConfig): Discovery {
        const doc = parseDocument(value)
        const discovery = new Discovery(config, doc.dev, doc.o)
        if (doc._method) {
            discovery.method = doc._method
        }
        for (const [id, component] of Object.entries(doc.cmps)) {
            discovery.components.set(id, component)
        }
        for (const [node, ids] of Object.entries(doc._nodes ?? {})) {
            discovery.nodes.set(node, [...ids])
        }
        return discovery
    }

    static async load(path: string, config: DiscoveryConfig): Promise<Discovery> {
        const text = await fs.readFile(path, "utf8")
        return Discovery.fromJSON(JSON.parse(text), config)
    }

    async write(path: string): Promise<void> {
        await fs.writeFile(path, `${JSON.stringify(this, null, 2)}\n`)
    }

    toJSON(): DiscoveryDocument {
        const doc: DiscoveryDocument = {
            o: this.origin,
            dev: this.device,
            cmps: Object.fromEntries(this.components),
        }
        if (this.nodes.size > 0) {
            doc._nodes = Object.fromEntries(this.nodes)
        }
        doc._method = this.method
        return doc
    }

    /**
     * 컴포넌트를 등록하고 node 목록에 id 를 추가한다
     */
    addComponent(node: string, id: string, component: Component): void {
        this.components.set(id, component)
        const ids = this.nodes.get(node) ?? []
        if (!ids.includes(id)) {
            ids.push(id)
        }
        this.nodes.set(node, ids)
    }

    nodeOf(id: string): string | undefined {
        for (const [node, ids] of this.nodes) {
            if (ids.includes(id)) {
                return node
            }
        }
        return undefined
    }

    /**
     * node 의 컴포넌트를 platform 만 남긴 placeholder 로 줄이고 목록을 비운다.
     * 이전 id 목록을 반환한다.
     */
    clearNode(node: string): string[] {
        const ids = this.nodes.get(node) ?? []
        for (const id of ids) {
            const component = this.components.get(id)
            if (component) {
                this.components.set(id, placeholder(component))
            }
        }
        this.nodes.set(node, [])
        return ids
    }

    // 이전 목록과 현재 목록의 합집합 (정렬, 중복 제거)
    mergeNode(node: string, previous: string[]): string[] {
        const merged = Array.from(
            new Set([...previous, ...(this.nodes.get(node) ?? [])])
        ).sort()
        this.nodes.set(node, merged)
        return merged
    }

    topic(
        prefix: string,
        component: string,
        nodeId: string,
        objectId?: string
    ): string {
        const elems = nodeId
            ? [prefix, component, nodeId, objectId || this.objectId, "config"]
            : [prefix, component, objectId || this.objectId, "config"]
        return elems.join("/")
    }

    /**
     * waitTopic 이 설정되어 있으면 waitPayload 가 올 때까지 대기 (한 번만)
     */
    async wait(signal: AbortSignal, client: IBrokerClient): Promise<void> {
        const topic = this.config.waitTopic
        if (!topic || this.gateOpen) {
            return
        }
        const expected = this.config.waitPayload

        let release: (error?: Error) => void = () => undefined
        const released = new Promise<Error | undefined>((resolve) => {
            release = resolve
        })

        const token = client.subscribe(topic, 0, (_client, message) => {
            if (expected && message.payload.toString() !== expected) {
                return
            }
            waitToken(signal, client.unsubscribe(topic)).then(release, release)
        })
        const error = await waitToken(signal, token)
        if (error) {
            throw new BridgeError(
                ErrorCode.SUBSCRIPTION_FAILED,
                `Failed to subscribe ${topic}`,
                error
            )
        }
        if (signal.aborted) {
            return
        }

        this.logger.info("Waiting for discovery", { topic })
        const aborted = abortPromise(signal)
        try {
            const result = await Promise.race([
                released,
                aborted.promise.then(() => undefined),
            ])
            if (result) {
                throw result
            }
        } finally {
            aborted.cleanup()
        }
        if (!signal.aborted) {
            this.gateOpen = true
        }
    }

    /**
     * method 에 따라 문서를 발행한다. nodes 를 주면 해당 타입만 발행
     * (device method 는 항상 문서 전체).
     * 발행이 끝나면 placeholder 컴포넌트를 정리한다.
     */
    async publish(
        signal: AbortSignal,
        client: IBrokerClient,
        migrate: boolean,
        ...nodes: string[]
    ): Promise<void> {
        await this.wait(signal, client)
        if (signal.aborted) {
            return
        }

        this.logger.debug("Publishing discovery", {
            method: this.method,
            nodes,
        })
        try {
            switch (this.method) {
                case "device":
                    await this.publishDevice(signal, client, migrate)
                    break
                case "components":
                    await this.publishComponents(signal, client, migrate, nodes)
                    break
                case "nodes":
                    await this.publishNodes(signal, client, nodes)
                    break
            }
        } catch (error) {
            this.logger.error("Unsuccessful discovery", error)
            throw error
        }

        if (!signal.aborted) {
            this.prune(this.method === "device" ? [] : nodes)
        }
    }

    /**
     * <prefix>/status 에 "online" 이 오면 handler 실행
     */
    async subscribeStatus(
        signal: AbortSignal,
        client: IBrokerClient,
        handler: StatusHandler
    ): Promise<void> {
        const topic = `${this.config.prefix}/status`
        const token = client.subscribe(topic, 0, (_client, message) => {
            if (signal.aborted || message.payload.toString() !== "online") {
                return
            }
            this.logger.debug("Discovery prefix online", { topic })
            handler(signal).catch((error: unknown) =>
                this.logger.error("Status handler failed", error)
            )
        })
        const error = await waitToken(signal, token)
        if (error) {
            throw new BridgeError(
                ErrorCode.SUBSCRIPTION_FAILED,
                `Failed to subscribe ${topic}`,
                error
            )
        }
    }

    // 컴포넌트별 토픽에 migrate 페이로드 (components -> device 첫 단계)
    async migrate(signal: AbortSignal, client: IBrokerClient): Promise<void> {
        for (const [id, component] of this.components) {
            if (signal.aborted) {
                return
            }
            await this.send(
                signal,
                client,
                this.componentTopic(id, component),
                MIGRATE_PAYLOAD
            )
        }
    }

    // device 토픽에 migrate 페이로드 (device -> components 첫 단계)
    async rollback(signal: AbortSignal, client: IBrokerClient): Promise<void> {
        await this.send(signal, client, this.deviceTopic(), MIGRATE_PAYLOAD)
    }

    async removeComponents(
        signal: AbortSignal,
        client: IBrokerClient,
        ...ids: string[]
    ): Promise<void> {
        for (const [id, component] of this.components) {
            if (signal.aborted) {
                return
            }
            if (ids.length > 0 && !ids.includes(id)) {
                continue
            }
            await this.send(
                signal,
                client,
                this.componentTopic(id, component),
                ""
            )
        }
    }

    async removeDevice(signal: AbortSignal, client: IBrokerClient): Promise<void> {
        await this.send(signal, client, this.deviceTopic(), "")
    }

    /**
     * 이전 문서에만 있는 컴포넌트를 placeholder 로 추가한다.
     * method 가 device <-> components 로 바뀌었으면 true (migrate 필요).
     */
    diff(old?: Discovery): boolean {
        if (!old) {
            return false
        }
        for (const [id, component] of old.components) {
            if (this.components.has(id) || isPlaceholder(component)) {
                continue
            }
            const node = old.nodeOf(id)
            if (node) {
                this.addComponent(node, id, placeholder(component))
            } else {
                this.components.set(id, placeholder(component))
            }
        }
        return shouldMigrate(this.method, old.method)
    }

    private async publishDevice(
        signal: AbortSignal,
        client: IBrokerClient,
        migrate: boolean
    ): Promise<void> {
        if (migrate) {
            await this.migrate(signal, client)
        }
        if (signal.aborted) {
            return
        }
        await this.send(
            signal,
            client,
            this.deviceTopic(),
            this.payload(this.components)
        )
        if (migrate) {
            await this.removeComponents(signal, client)
        }
    }

    private async publishComponents(
        signal: AbortSignal,
        client: IBrokerClient,
        migrate: boolean,
        nodes: string[]
    ): Promise<void> {
        if (migrate) {
            await this.rollback(signal, client)
        }
        for (const [id, component] of this.select(nodes)) {
            if (signal.aborted) {
                return
            }
            let payload = ""
            if (!isPlaceholder(component)) {
                const body: Component = {
                    ...component,
                    o: this.origin,
                    dev: this.device,
                }
                delete body[Option.Platform]
                payload = JSON.stringify(body)
            }
            await this.send(
                signal,
                client,
                this.componentTopic(id, component),
                payload
            )
        }
        if (migrate && !signal.aborted) {
            await this.removeDevice(signal, client)
        }
    }

    private async publishNodes(
        signal: AbortSignal,
        client: IBrokerClient,
        nodes: string[]
    ): Promise<void> {
        const selected = nodes.length > 0 ? nodes : Array.from(this.nodes.keys())
        for (const node of selected) {
            if (signal.aborted) {
                return
            }
            const components = this.select([node])
            if (components.length === 0) {
                continue
            }
            await this.send(
                signal,
                client,
                this.deviceTopic(`${this.nodeId}_${node}`),
                this.payload(components)
            )
        }
    }

    // nodes 가 비어 있으면 전체
    private select(nodes: string[]): Array<[string, Component]> {
        if (nodes.length === 0) {
            return Array.from(this.components)
        }
        const selected: Array<[string, Component]> = []
        const seen = new Set<string>()
        for (const node of nodes) {
            for (const id of this.nodes.get(node) ?? []) {
                const component = this.components.get(id)
                if (component && !seen.has(id)) {
                    seen.add(id)
                    selected.push([id, component])
                }
            }
        }
        return selected
    }

    // 발행된 placeholder 제거
    private prune(nodes: string[]): void {
        const scope = new Set(this.select(nodes).map(([id]) => id))
        const removed = new Set<string>()
        for (const [id, component] of this.components) {
            if (scope.has(id) && isPlaceholder(component)) {
                this.components.delete(id)
                removed.add(id)
            }
        }
        if (removed.size === 0) {
            return
        }
        for (const [node, ids] of this.nodes) {
            this.nodes.set(
                node,
                ids.filter((id) => !removed.has(id))
            )
        }
    }

    private payload(components: Iterable<[string, Component]>): string {
        return JSON.stringify({
            o: this.origin,
            dev: this.device,
            cmps: Object.fromEntries(components),
        })
    }

    private deviceTopic(nodeId: string = this.nodeId): string {
        return this.topic(this.config.prefix, "device", nodeId, this.objectId)
    }

    private componentTopic(id: string, component: Component): string {
        return this.topic(
            this.config.prefix,
            platformOf(component),
            this.nodeId,
            id
        )
    }

    private async send(
        signal: AbortSignal,
        client: IBrokerClient,
        topic: string,
        payload: string
    ): Promise<void> {
        const token = client.publish(
            topic,
            this.config.qos,
            this.config.retained,
            payload
        )
        const error = await waitToken(signal, token)
        if (error) {
            throw new BridgeError(
                ErrorCode.PUBLISH_FAILED,
                `Failed to publish ${topic}`,
                error
            )
        }
    }
}

function shouldMigrate(method: DiscoveryMethod, old: DiscoveryMethod): boolean {
    switch (old) {
        case "device":
            return method === "components"
        case "components":
            return method === "device"
        default:
            return false
    }
}

function objectIdOf(device: Device): string {
    if (device.ids && device.ids.length > 0) {
        return device.ids.join("_")
    }
    if (device.cns && device.cns.length > 0) {
        return device.cns.map(([, id]) => id).join("_")
    }
    throw new BridgeError(ErrorCode.DISCOVERY_FAILED, "No object id")
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string")
}

function isConnection(value: unknown): value is Connection {
    return (
        Array.isArray(value) &&
        value.length === 2 &&
        typeof value[0] === "string" &&
        typeof value[1] === "string"
    )
}

function invalidDocument(reason: string): BridgeError {
    return new BridgeError(
        ErrorCode.DISCOVERY_FAILED,
        `Invalid discovery document: ${reason}`
    )
}

function parseOrigin(value: unknown): Origin {
    if (!isRecord(value)) {
        throw invalidDocument("origin")
    }
    const { name, sw, url } = value
    if (typeof name !== "string") {
        throw invalidDocument("origin name")
    }
    const origin: Origin = { name }
    if (typeof sw === "string") {
        origin.sw = sw
    }
    if (typeof url === "string") {
        origin.url = url
    }
    return origin
}

function parseDevice(value: unknown): Device {
    if (!isRecord(value)) {
        throw invalidDocument("device")
    }
    const device: Device = {}
    for (const key of DEVICE_STRING_KEYS) {
        const field = value[key]
        if (typeof field === "string") {
            device[key] = field
        }
    }
    const { ids, cns } = value
    if (isStringArray(ids)) {
        device.ids = [...ids]
    }
    if (Array.isArray(cns) && cns.every(isConnection)) {
        device.cns = cns.map(([type, id]): Connection => [type, id])
    }
    return device
}

function parseDocument(value: unknown): DiscoveryDocument {
    if (!isRecord(value)) {
        throw invalidDocument("not an object")
    }
    const { o, dev, cmps, _nodes, _method } = value
    if (!isRecord(cmps)) {
        throw invalidDocument("components")
    }

    const components: Record<string, Component> = {}
    for (const [id, component] of Object.entries(cmps)) {
        if (!isRecord(component)) {
            throw invalidDocument(`component ${id}`)
        }
        components[id] = component
    }

    const doc: DiscoveryDocument = {
        o: parseOrigin(o),
        dev: parseDevice(dev),
        cmps: components,
    }

    if (_nodes !== undefined) {
        if (!isRecord(_nodes)) {
            throw invalidDocument("nodes")
        }
        const nodes: Record<string, string[]> = {}
        for (const [node, ids] of Object.entries(_nodes)) {
            if (!isStringArray(ids)) {
                throw invalidDocument(`node ${node}`)
            }
            nodes[node] = ids
        }
        doc._nodes = nodes
    }

    if (_method !== undefined) {
        const method = DISCOVERY_METHODS.find((option) => option === _method)
        if (!method) {
            throw invalidDocument(`method ${String(_method)}`)
        }
        doc._method = method
    }

    return doc
}
