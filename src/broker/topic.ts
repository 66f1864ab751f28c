/**
 * Path: src/broker/topic.ts
 */

/**
 * MQTT 토픽 필터 매칭 (+ 는 한 레벨, # 는 나머지 전체)
 */
export function matchTopic(filter: string, topic: string): boolean {
    if (filter === topic) {
        return true
    }

    const filterLevels = filter.split("/")
    const topicLevels = topic.split("/")

    for (let i = 0; i < filterLevels.length; i++) {
        const level = filterLevels[i]
        if (level === "#") {
            return i === filterLevels.length - 1
        }
        if (i >= topicLevels.length) {
            return false
        }
        if (level !== "+" && level !== topicLevels[i]) {
            return false
        }
    }

    return filterLevels.length === topicLevels.length
}
