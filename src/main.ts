#!/usr/bin/env node
/**
 * Path: src/main.ts
 * Purpose: 애플리케이션 초기화 및 실행 관리
 */

import path from "path"
import { Bridge } from "./bridge/Bridge"
import { IBrokerClient } from "./broker/types"
import { MockBrokerClient } from "./broker/MockBrokerClient"
import { MqttBrokerClient } from "./broker/MqttBrokerClient"
import { AppConfig, IConfigLoader } from "./config/types"
import { EnvConfigLoader } from "./config/EnvConfigLoader"
import { Discovery } from "./discovery/Discovery"
import { VERSION } from "./discovery/Origin"
import { ErrorHandler } from "./errors/ErrorHandler"
import { toError } from "./errors/types"
import { createMetrics } from "./metrics"
import { Logger } from "./utils/logger"

const DISCOVERY_FILE = "discovery.json"

interface PreparedDiscovery {
    discovery?: Discovery
    migrate: boolean
}

class Application {
    private readonly logger = Logger.getInstance("Application")
    private isRunning = false
    private isShuttingDown = false // 종료 중인지 여부

    constructor(
        private readonly config: AppConfig,
        private readonly bridge: Bridge,
        private readonly errorHandler: ErrorHandler,
        private readonly discovery?: Discovery
    ) {}

    static async create(envPath?: string): Promise<Application> {
        const configLoader: IConfigLoader = new EnvConfigLoader(envPath)
        const config = configLoader.loadConfig()
        const logger = Logger.getInstance("Application")

        const errorHandler = new ErrorHandler(
            async () => {
                logger.error("Fatal error occurred")
                process.exit(1)
            },
            (error) => logger.error("Non-fatal error", error)
        )

        const { discovery, migrate } = await Application.prepareDiscovery(
            config
        )
        const bridge = new Bridge(config, {
            client: Application.createClient(config),
            metrics: createMetrics(config),
            discovery,
            migrate,
        })

        return new Application(config, bridge, errorHandler, discovery)
    }

    protected static createClient(config: AppConfig): IBrokerClient {
        if (!config.mockBroker) {
            return new MqttBrokerClient(config.mqtt)
        }

        // 브로커 대신 stdout 으로 출력
        return new MockBrokerClient({
            output: process.stdout,
            will: config.mqtt.birthWillEnabled
                ? {
                      willTopic: config.mqtt.birthWillTopic,
                      willPayload: Buffer.from(config.mqtt.willPayload),
                      willQos: config.mqtt.willQos,
                      willRetained: config.mqtt.willRetained,
                  }
                : undefined,
        })
    }

    /**
     * 이전 디스커버리 문서와 비교해 삭제할 컴포넌트와 마이그레이션 여부를 결정
     */
    protected static async prepareDiscovery(
        config: AppConfig
    ): Promise<PreparedDiscovery> {
        const logger = Logger.getInstance("Application")
        if (!config.discovery.enabled) {
            return { migrate: false }
        }

        let discovery: Discovery
        try {
            discovery = new Discovery(config.discovery)
        } catch (error) {
            logger.error("Unable to get discovery", error)
            return { migrate: false }
        }

        if (!config.dataPath) {
            return { discovery, migrate: false }
        }

        const file = path.join(config.dataPath, DISCOVERY_FILE)
        let old: Discovery | undefined
        try {
            old = await Discovery.load(file, config.discovery)
        } catch (error) {
            logger.warnError(`Unable to load ${file}`, error)
        }

        const migrate = discovery.diff(old)
        if (migrate) {
            logger.info("Migrating discovery", {
                from: old?.method,
                to: discovery.method,
            })
        }
        return { discovery, migrate }
    }

    public async start(): Promise<void> {
        if (this.isRunning) return

        try {
            this.logger.info("Starting bridge", { version: VERSION })
            await this.bridge.start()
            await Promise.race([this.bridge.ready(), this.bridge.done()])

            const error = this.bridge.error()
            if (error) {
                this.errorHandler.handleError(error)
            }

            await this.saveDiscovery()
            this.setupSignalHandlers()
            this.isRunning = true
        } catch (error) {
            await this.shutdown()
            throw error
        }
    }

    private async saveDiscovery(): Promise<void> {
        if (!this.discovery || !this.config.dataPath) {
            return
        }
        const file = path.join(this.config.dataPath, DISCOVERY_FILE)
        try {
            await this.discovery.write(file)
        } catch (error) {
            this.logger.warnError(`Unable to write ${file}`, error)
        }
    }

    private setupSignalHandlers(): void {
        const shutdownHandler = async (signal: string) => {
            if (this.isShuttingDown) return // 중복 실행 방지
            this.isShuttingDown = true

            this.logger.info(
                `Received ${signal}. Initiating graceful shutdown...`
            )
            await this.shutdown()
            process.exit(0)
        }

        const handle = (signal: string) => {
            shutdownHandler(signal).catch((error: unknown) =>
                this.errorHandler.handleFatalError(toError(error))
            )
        }
        process.on("SIGINT", () => handle("SIGINT"))
        process.on("SIGTERM", () => handle("SIGTERM"))
    }

    public async shutdown(): Promise<void> {
        this.logger.info("Shutting down...")
        try {
            await this.bridge.stop()
        } catch (error) {
            this.errorHandler.handleError(error)
        }
        this.isRunning = false
        this.logger.info("Shutdown process completed.")
    }

    public getStatus(): string {
        return this.isRunning ? "running" : "stopped"
    }
}

async function main(): Promise<void> {
    const app = await Application.create()
    await app.start()
}

if (require.main === module) {
    main().catch((error: unknown) => {
        Logger.getInstance("Application").error(
            "Application failed to start",
            error
        )
        process.exit(1)
    })
}

export { Application, IConfigLoader }
