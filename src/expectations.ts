import type { VerdictExpectation } from "./HarnessConfig.ts";
import type { ProcessOutput } from "./ManagedProcess.ts";

export type MatchResult =
    | { success: true; occurrences: number; }
    | { success: false; occurrences: number; reason: string; brief_reason: string; };

export function countOccurrences(text: string, marker: string): number {
    if (marker.length === 0) {
        return 0;
    }

    let count = 0;
    let index = text.indexOf(marker);
    while (index !== -1) {
        count++;
        index = text.indexOf(marker, index + marker.length);
    }
    return count;
}

/** The subscriber is the only witness: its stdout decides the verdict. */
export function evaluateSubscriberOutput(output: ProcessOutput, expectation: VerdictExpectation): MatchResult {
    const occurrences = countOccurrences(output.stdout, expectation.marker);

    if (occurrences >= expectation.min_occurrences) {
        return { success: true, occurrences };
    }

    if (occurrences === 0) {
        return {
            success: false,
            occurrences,
            reason: `Subscriber stdout does not contain "${expectation.marker}"`,
            brief_reason: 'marker not found'
        };
    }

    return {
        success: false,
        occurrences,
        reason: `Expected "${expectation.marker}" at least ${expectation.min_occurrences} times in subscriber stdout, found ${occurrences}`,
        brief_reason: 'too few deliveries'
    };
}
