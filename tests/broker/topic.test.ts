/**
 * Path: tests/broker/topic.test.ts
 */

import { matchTopic } from "../../src/broker/topic"

describe("matchTopic", () => {
    test.each([
        ["a/b/c", "a/b/c", true],
        ["a/+/c", "a/b/c", true],
        ["a/+", "a/b/c", false],
        ["a/#", "a/b/c", true],
        ["a/#", "a", true],
        ["#", "x/y", true],
        ["a/b", "a/b/c", false],
        ["a/b/c", "a/b", false],
        ["a/#/c", "a/b/c", false],
    ])("%s matches %s: %s", (filter, topic, expected) => {
        expect(matchTopic(filter, topic)).toBe(expected)
    })
})
