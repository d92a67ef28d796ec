import { describe, expect, it } from "vitest";
import { countOccurrences, evaluateSubscriberOutput } from "../src/expectations.ts";
import type { ProcessOutput } from "../src/ManagedProcess.ts";

function subscriberOutput(stdout: string, stderr = ""): ProcessOutput {
    return {
        role: 'subscriber',
        path: "/work/build/examples/simple_subscriber",
        stdout,
        stderr,
        exit_code: null,
        signal: 'SIGTERM',
        exited: true,
        duration: 6000,
        error: null,
    };
}

const expectation = { marker: "Received frame", min_occurrences: 1 };

describe("countOccurrences", () => {
    it("should count every non-overlapping occurrence", () => {
        expect(countOccurrences("Received frame #1\nReceived frame #2\n", "Received frame")).toBe(2);
        expect(countOccurrences("aaaa", "aa")).toBe(2);
    });

    it("should return zero for an absent or empty marker", () => {
        expect(countOccurrences("Connecting...\n", "Received frame")).toBe(0);
        expect(countOccurrences("Connecting...\n", "")).toBe(0);
    });
});

describe("evaluateSubscriberOutput", () => {
    it("should succeed when the marker is in stdout", () => {
        const result = evaluateSubscriberOutput(subscriberOutput("Connecting...\nReceived frame #1 (42 bytes)\n"), expectation);

        expect(result).toEqual({ success: true, occurrences: 1 });
    });

    it("should fail when the marker is missing", () => {
        const result = evaluateSubscriberOutput(subscriberOutput("Connecting...\nTimeout, no data.\n"), expectation);

        expect(result).toEqual({
            success: false,
            occurrences: 0,
            reason: 'Subscriber stdout does not contain "Received frame"',
            brief_reason: 'marker not found'
        });
    });

    it("should ignore the marker when it only appears on stderr", () => {
        const result = evaluateSubscriberOutput(subscriberOutput("", "Received frame but failed to decode\n"), expectation);

        expect(result.success).toBe(false);
    });

    it("should match case-sensitively", () => {
        const result = evaluateSubscriberOutput(subscriberOutput("received frame #1\n"), expectation);

        expect(result.success).toBe(false);
    });

    it("should fail when there are fewer deliveries than required", () => {
        const result = evaluateSubscriberOutput(
            subscriberOutput("Received frame #1\nReceived frame #2\n"),
            { marker: "Received frame", min_occurrences: 3 }
        );

        expect(result).toEqual({
            success: false,
            occurrences: 2,
            reason: 'Expected "Received frame" at least 3 times in subscriber stdout, found 2',
            brief_reason: 'too few deliveries'
        });
    });
});
