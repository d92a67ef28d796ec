import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { parseArgs } from "../src/CliArgs.ts";
import { resolveConfig } from "../src/config.ts";
import { describePlan, findMissingExecutables, resolvePlan } from "../src/finders.ts";
import { captureConsole, FakeHost, PUBLISHER, SUBSCRIBER } from "./support/fakes.ts";

const config = resolveConfig({
    working_directory: "sandbox",
    broker: { executable: "/opt/bus/broker", args: ["--port", "5555"], ready_marker: "Broker starting..." },
    subscriber: { environment_variables: { SENSOR_TOPIC: "camera_frames" } },
}, parseArgs([]), "/work", "/work/harness.toml");

describe("resolvePlan", () => {
    it("should resolve executables against the build directory", () => {
        const plan = resolvePlan(config);

        expect(plan.broker).toEqual({
            role: 'broker',
            path: "/opt/bus/broker",
            args: ["--port", "5555"],
            cwd: "/work/sandbox",
            env: {},
            ready_marker: "Broker starting...",
        });
        expect(plan.subscriber.path).toBe(SUBSCRIBER);
        expect(plan.subscriber.env).toEqual({ SENSOR_TOPIC: "camera_frames" });
        expect(plan.publisher.path).toBe(PUBLISHER);
    });
});

describe("findMissingExecutables", () => {
    it("should list missing executables in launch order", async () => {
        const host = new FakeHost();
        host.install(SUBSCRIBER);

        const missing = await findMissingExecutables(resolvePlan(config), host);

        expect(missing.map((target) => target.path)).toEqual(["/opt/bus/broker", PUBLISHER]);
    });
});

describe("describePlan", () => {
    let log: MockInstance<typeof console.log>;

    beforeEach(() => {
        log = vi.spyOn(console, "log").mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should print commands, waits and the verdict", async () => {
        const host = new FakeHost();
        host.install("/opt/bus/broker");
        host.install(SUBSCRIBER);
        host.install(PUBLISHER);

        await describePlan(config, resolvePlan(config), host);

        expect(captureConsole(log)).toEqual([
            "Harness plan (/work/harness.toml)",
            "  Working directory: /work/sandbox",
            "  Broker: /opt/bus/broker --port 5555",
            '    then wait for "Broker starting..." (up to 5 seconds)',
            `  Subscriber: ${SUBSCRIBER}`,
            "    then wait 1 second",
            `  Publisher: ${PUBLISHER}`,
            "  Run for 5 seconds, grace period 2 seconds",
            '  Verdict: subscriber stdout contains "Received frame" at least 1 time(s)',
        ]);
        expect(host.events).toEqual([]);
    });
});
