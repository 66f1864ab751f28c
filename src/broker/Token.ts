/**
 * Path: src/broker/Token.ts
 * 비동기 브로커 작업 토큰
 */

import { IToken } from "./types"
import { abortPromise } from "../utils/signal"

export class Token implements IToken {
    private err?: Error
    private completed = false
    private resolveDone: () => void = () => undefined
    private readonly donePromise = new Promise<void>((resolve) => {
        this.resolveDone = resolve
    })

    static resolved(error?: Error): Token {
        const token = new Token()
        token.complete(error)
        return token
    }

    // 한 번만 완료된다. 이후 호출은 무시
    complete(error?: Error): void {
        if (this.completed) {
            return
        }
        this.completed = true
        this.err = error
        this.resolveDone()
    }

    done(): Promise<void> {
        return this.donePromise
    }

    error(): Error | undefined {
        return this.err
    }

    isDone(): boolean {
        return this.completed
    }
}

/**
 * 토큰 완료와 signal 중단 중 먼저 일어난 쪽을 기다린다.
 * 중단이 먼저면 에러 없이 undefined (abandoned).
 */
export async function waitToken(
    signal: AbortSignal,
    token: IToken
): Promise<Error | undefined> {
    if (signal.aborted) {
        return undefined
    }
    if (token.isDone()) {
        return token.error()
    }

    const aborted = abortPromise(signal)
    try {
        const finished = await Promise.race([
            token.done().then(() => true),
            aborted.promise.then(() => false),
        ])
        return finished ? token.error() : undefined
    } finally {
        aborted.cleanup()
    }
}
