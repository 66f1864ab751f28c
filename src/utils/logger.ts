/**
 * Path: src/utils/logger.ts
 * 모듈별 winston 로거
 * - LOG_LEVEL 로 레벨 지정 (silent 이면 출력 없음)
 * - LOG_DIR 이 지정되면 일별 로그 파일 기록
 */

import path from "path"
import winston from "winston"
import DailyRotateFile from "winston-daily-rotate-file"

type Meta = Record<string, unknown>

export class Logger {
    private logger: winston.Logger
    private static instances: Map<string, Logger> = new Map()

    private constructor(module: string) {
        const level = process.env.LOG_LEVEL || "info"
        this.logger = winston.createLogger({
            level: level === "silent" ? "error" : level,
            silent: level === "silent",
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            defaultMeta: { module },
            transports: this.getTransports(),
        })
    }

    static getInstance(module: string): Logger {
        let logger = Logger.instances.get(module)
        if (!logger) {
            logger = new Logger(module)
            Logger.instances.set(module, logger)
        }
        return logger
    }

    private getTransports(): winston.transport[] {
        const transports: winston.transport[] = [
            // 콘솔 출력
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.simple()
                ),
            }),
        ]

        const dir = process.env.LOG_DIR
        if (!dir) {
            return transports
        }

        transports.push(
            // 일별 로그 파일
            new DailyRotateFile({
                filename: path.join(dir, "application-%DATE%.log"),
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
            }),

            // 에러 로그 파일
            new DailyRotateFile({
                filename: path.join(dir, "error-%DATE%.log"),
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
                level: "error",
            })
        )

        return transports
    }

    info(message: string, meta?: Meta): void {
        this.logger.info(message, meta)
    }

    error(message: string, error?: unknown): void {
        this.logger.error(message, errorMeta(error))
    }

    warn(message: string, meta?: Meta): void {
        this.logger.warn(message, meta)
    }

    // 경고 + 에러 정보
    warnError(message: string, error: unknown): void {
        this.logger.warn(message, errorMeta(error))
    }

    debug(message: string, meta?: Meta): void {
        this.logger.debug(message, meta)
    }
}

function errorMeta(error: unknown): Meta {
    if (error instanceof Error) {
        return { error: error.message, stack: error.stack }
    }
    if (error === undefined) {
        return {}
    }
    return { error: String(error) }
}
