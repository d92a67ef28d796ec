import { describe, expect, it } from "vitest";
import { abortable, formatDuration, TIMED_OUT, withTimeout } from "../src/timing.ts";

describe("withTimeout", () => {
    it("should resolve with the value when the promise wins", async () => {
        expect(await withTimeout(Promise.resolve("done"), 1000)).toBe("done");
    });

    it("should resolve TIMED_OUT when the timer wins", async () => {
        expect(await withTimeout(new Promise<string>(() => { }), 5)).toBe(TIMED_OUT);
    });

    it("should wait indefinitely without a timeout", async () => {
        const slow = new Promise<string>((resolve) => setTimeout(() => resolve("late"), 20));

        expect(await withTimeout(slow, null)).toBe("late");
    });
});

describe("abortable", () => {
    it("should reject with the abort reason", async () => {
        const controller = new AbortController();
        const pending = abortable(new Promise<string>(() => { }), controller.signal);

        controller.abort(new Error("stopped"));

        await expect(pending).rejects.toThrow("stopped");
    });

    it("should reject immediately when already aborted", async () => {
        const controller = new AbortController();
        controller.abort(new Error("stopped"));

        await expect(abortable(Promise.resolve(1), controller.signal)).rejects.toThrow("stopped");
    });

    it("should pass through the result otherwise", async () => {
        const controller = new AbortController();

        expect(await abortable(Promise.resolve(42), controller.signal)).toBe(42);
    });
});

describe("formatDuration", () => {
    it("should use seconds for whole seconds", () => {
        expect(formatDuration(5000)).toBe("5 seconds");
        expect(formatDuration(1000)).toBe("1 second");
    });

    it("should use milliseconds otherwise", () => {
        expect(formatDuration(1500)).toBe("1500ms");
        expect(formatDuration(0)).toBe("0ms");
    });
});
