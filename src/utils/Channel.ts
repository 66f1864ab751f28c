/**
 * Path: src/utils/Channel.ts
 * 비동기 FIFO 채널
 * - 여러 생산자가 send, 하나의 소비 루프가 receive
 * - close 이후 버퍼에 남은 값은 계속 receive 가능
 */

export type ChannelResult<T> = { ok: true; value: T } | { ok: false }

type Receiver<T> = (result: ChannelResult<T>) => void

export class Channel<T> {
    private buffer: T[] = []
    private receivers: Receiver<T>[] = []
    private isClosed = false

    send(value: T): boolean {
        if (this.isClosed) {
            return false
        }

        const receiver = this.receivers.shift()
        if (receiver) {
            receiver({ ok: true, value })
        } else {
            this.buffer.push(value)
        }
        return true
    }

    receive(): Promise<ChannelResult<T>> {
        if (this.buffer.length > 0) {
            const value = this.buffer[0]
            this.buffer.shift()
            return Promise.resolve({ ok: true, value })
        }
        if (this.isClosed) {
            return Promise.resolve({ ok: false })
        }
        return new Promise((resolve) => this.receivers.push(resolve))
    }

    close(): void {
        if (this.isClosed) {
            return
        }
        this.isClosed = true

        const receivers = this.receivers
        this.receivers = []
        receivers.forEach((receiver) => receiver({ ok: false }))
    }
}

/**
 * signal 이 이미 중단되었으면 보내지 않고 false 를 반환한다.
 * 값의 타입은 채널에서만 추론한다.
 */
export function maybeSend<T>(
    signal: AbortSignal,
    channel: Channel<T>,
    value: NoInfer<T>
): boolean {
    if (signal.aborted) {
        return false
    }
    return channel.send(value)
}
