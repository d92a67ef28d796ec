import { InterruptedError } from "./errors.ts";
import { evaluateSubscriberOutput } from "./expectations.ts";
import type { HarnessConfig } from "./HarnessConfig.ts";
import type { Host } from "./Host.ts";
import { findMissingExecutables, type LaunchPlan, type LaunchTarget } from "./finders.ts";
import { type LineListener, ManagedProcess, type ProcessOutput } from "./ManagedProcess.ts";
import { capitalize, describeError } from "./stringUtils.ts";
import { abortable, formatDuration } from "./timing.ts";

/**
 * Drives one smoke run: broker, subscriber and publisher are started in that
 * order, left to talk for the observation window, then stopped in reverse
 * order before the subscriber's output is judged.
 */
export class HarnessRunner {
    private readonly processes: ManagedProcess[] = [];
    private readonly abortController = new AbortController();

    constructor(private host: Host, private config: HarnessConfig, private onLine?: LineListener) { }

    async run(plan: LaunchPlan): Promise<HarnessResult> {
        const startTime = this.host.now();

        let verdict: Verdict;
        try {
            verdict = await this.execute(plan);
        } catch (e) {
            verdict = { type: 'error', error: describeError(e) };
        } finally {
            await this.cleanup();
        }

        return {
            ...verdict,
            duration: this.host.now() - startTime,
            outputs: this.processes.map((proc) => proc.snapshot()),
        };
    }

    /**
     * Aborts whatever the run is waiting on; cleanup still runs. A second
     * interrupt kills every process that is still alive without waiting out
     * the grace period.
     */
    interrupt(signal: string): void {
        if (!this.abortController.signal.aborted) {
            console.log(`\nReceived ${signal}, stopping all processes...`);
            this.abortController.abort(new InterruptedError(signal));
            return;
        }

        console.log(`\nReceived ${signal} again, killing all processes...`);
        for (const proc of this.processes) {
            proc.terminate('SIGKILL');
        }
    }

    private async execute(plan: LaunchPlan): Promise<Verdict> {
        // Check every executable before starting any of them
        const missing = await findMissingExecutables(plan, this.host);
        if (missing.length > 0) {
            const paths = missing.map((target) => `${target.role}: ${target.path}`).join(", ");
            return { type: 'error', error: `Executable not found or not executable (${paths})` };
        }

        // Start the broker
        const broker = await this.launch(plan.broker);
        const brokerProblem = await this.settle(broker, plan.broker);
        if (brokerProblem !== null) {
            return brokerProblem;
        }

        // Subscribe before anything is published
        const subscriber = await this.launch(plan.subscriber);
        const subscriberProblem = await this.settle(subscriber, plan.subscriber);
        if (subscriberProblem !== null) {
            return subscriberProblem;
        }

        // Publisher starts sending right away
        const publisher = await this.launch(plan.publisher);

        // Observation window
        console.log(`Running for ${formatDuration(this.config.run_duration_ms)}...`);
        await this.host.sleep(this.config.run_duration_ms, this.abortController.signal);

        // Stop the producer first, then the subscriber, then the broker
        const stopOrder = [publisher, subscriber, broker];
        for (const proc of stopOrder) {
            proc.terminate();
        }
        await Promise.all(stopOrder.map((proc) => proc.stop(this.config.grace_period_ms)));

        // Read everything the subscriber wrote
        const collectTimeout = this.config.collect_timeout_ms > 0 ? this.config.collect_timeout_ms : null;
        const output = await abortable(subscriber.collect(collectTimeout), this.abortController.signal);
        if (output === null) {
            return { type: 'timeout', stage: 'collecting subscriber output' };
        }

        // Judge
        const match = evaluateSubscriberOutput(output, this.config.verdict);
        if (match.success) {
            return { type: 'passed', occurrences: match.occurrences, subscriber: output };
        }
        return { type: 'failed', reason: match.reason, brief_reason: match.brief_reason, subscriber: output };
    }

    private async launch(target: LaunchTarget): Promise<ManagedProcess> {
        if (this.abortController.signal.aborted) {
            throw this.abortController.signal.reason;
        }
        console.log(`Starting ${capitalize(target.role)}: ${target.path}`);
        const proc = await ManagedProcess.launch(this.host, target, this.onLine);
        this.processes.push(proc);
        return proc;
    }

    /**
     * Gives a freshly started process time to get ready: either until its ready
     * marker appears or for the fixed startup delay. Returns a verdict when the
     * run cannot go on.
     */
    private async settle(proc: ManagedProcess, target: LaunchTarget): Promise<Verdict | null> {
        const signal = this.abortController.signal;
        const label = capitalize(target.role);

        if (target.ready_marker !== undefined) {
            const outcome = await abortable(proc.waitForOutput(target.ready_marker, this.config.ready_timeout_ms), signal);
            if (outcome === 'timeout') {
                return { type: 'timeout', stage: `${target.role} readiness` };
            }
            if (outcome === 'ready') {
                console.log(`${label} ready`);
                return null;
            }
        } else {
            await this.host.sleep(this.config.startup_delay_ms, signal);
        }

        if (proc.hasExited) {
            return { type: 'error', error: `${label} exited during startup (${describeExit(proc.snapshot())})` };
        }
        return null;
    }

    private async cleanup(): Promise<void> {
        const running = [...this.processes].reverse().filter((proc) => !proc.hasExited);
        for (const proc of running) {
            if (proc.terminationSignals.length === 0) {
                proc.terminate();
            }
        }
        await Promise.all(running.map((proc) => proc.stop(this.config.grace_period_ms)));
    }
}

export function describeExit(output: ProcessOutput): string {
    if (!output.exited) {
        return "still running";
    }
    if (output.signal !== null) {
        return `killed by ${output.signal}`;
    }
    return `exit code ${output.exit_code}`;
}

export type Verdict =
    | { type: 'passed'; occurrences: number; subscriber: ProcessOutput; }
    | { type: 'failed'; reason: string; brief_reason: string; subscriber: ProcessOutput; }
    | { type: 'timeout'; stage: string; }
    | { type: 'error'; error: string; };

export type HarnessResult = Verdict & {
    duration: number;
    /** Snapshot of every process that was started, in launch order. */
    outputs: ProcessOutput[];
};
