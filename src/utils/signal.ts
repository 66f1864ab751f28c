/**
 * Path: src/utils/signal.ts
 * AbortSignal 헬퍼
 */

export interface AbortWait {
    promise: Promise<void>
    cleanup: () => void
}

/**
 * signal 이 중단되면 resolve 되는 promise. 사용 후 cleanup 으로 리스너를 제거한다.
 */
export function abortPromise(signal: AbortSignal): AbortWait {
    if (signal.aborted) {
        return { promise: Promise.resolve(), cleanup: () => undefined }
    }

    let listener: (() => void) | undefined
    const promise = new Promise<void>((resolve) => {
        listener = () => resolve()
        signal.addEventListener("abort", listener, { once: true })
    })

    return {
        promise,
        cleanup: () => {
            if (listener) {
                signal.removeEventListener("abort", listener)
                listener = undefined
            }
        },
    }
}

/**
 * ms 만큼 대기. 대기 중 signal 이 중단되면 false.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (!signal) {
        await new Promise((resolve) => setTimeout(resolve, ms))
        return true
    }
    if (signal.aborted) {
        return false
    }

    const aborted = abortPromise(signal)
    let timer: NodeJS.Timeout | undefined
    try {
        return await Promise.race([
            new Promise<boolean>((resolve) => {
                timer = setTimeout(() => resolve(true), ms)
            }),
            aborted.promise.then(() => false),
        ])
    } finally {
        clearTimeout(timer)
        aborted.cleanup()
    }
}
