import type { Readable } from "node:stream";
import { LaunchError } from "./errors.ts";
import type { ProcessRole } from "./HarnessConfig.ts";
import type { ChildHandle, Host, SpawnOptions } from "./Host.ts";
import { describeError } from "./stringUtils.ts";
import { TIMED_OUT, withTimeout } from "./timing.ts";

export type StreamName = 'stdout' | 'stderr';

export type LineListener = (role: ProcessRole, stream: StreamName, line: string) => void;

export interface ExitStatus {
    exit_code: number | null;
    signal: NodeJS.Signals | null;
}

export interface ProcessOutput extends ExitStatus {
    role: ProcessRole;
    path: string;
    stdout: string;
    stderr: string;
    /** False while the process was still running when the snapshot was taken. */
    exited: boolean;
    duration: number;
    /** Last error the OS reported for the process, such as a failed kill. */
    error: string | null;
}

export type ReadinessOutcome = 'ready' | 'exited' | 'timeout';

export interface LaunchRequest extends SpawnOptions {
    role: ProcessRole;
    path: string;
    args: string[];
}

/**
 * One collaborator process. Its output is buffered from the moment it is
 * spawned; nothing reads it back until the harness asks.
 */
export class ManagedProcess {
    private output: Record<StreamName, string> = { stdout: "", stderr: "" };
    private partialLines: Record<StreamName, string> = { stdout: "", stderr: "" };
    private status: ExitStatus | null = null;
    private endedAt: number | null = null;
    private watchers: Array<() => boolean> = [];
    private signalsSent: NodeJS.Signals[] = [];
    private lastError: Error | null = null;
    private readonly closed: Promise<ExitStatus>;
    private readonly startedAt: number;

    private constructor(
        readonly role: ProcessRole,
        readonly path: string,
        private readonly child: ChildHandle,
        private readonly host: Host,
        private readonly onLine?: LineListener,
    ) {
        this.startedAt = host.now();
        this.capture(child.stdout, 'stdout');
        this.capture(child.stderr, 'stderr');
        child.on("error", (error) => {
            this.lastError = error;
        });
        this.closed = new Promise((resolve) => {
            child.once("close", (code, signal) => {
                const status: ExitStatus = { exit_code: code, signal };
                // A trailing line without a newline still counts
                this.flushPartialLines();
                this.status = status;
                this.endedAt = this.host.now();
                this.notifyWatchers();
                resolve(status);
            });
        });
    }

    /** Spawns the process and resolves once the OS has started it. */
    static async launch(host: Host, request: LaunchRequest, onLine?: LineListener): Promise<ManagedProcess> {
        let child: ChildHandle;
        try {
            child = host.spawn(request.path, request.args, { cwd: request.cwd, env: request.env });
        } catch (e) {
            throw new LaunchError(request.role, request.path, describeError(e));
        }

        // Attach capture before the child can write anything
        const proc = new ManagedProcess(request.role, request.path, child, host, onLine);
        await new Promise<void>((resolve, reject) => {
            child.once("spawn", () => resolve());
            child.once("error", (error) => reject(new LaunchError(request.role, request.path, error.message)));
        });
        return proc;
    }

    get hasExited(): boolean {
        return this.status !== null;
    }

    get terminationSignals(): readonly NodeJS.Signals[] {
        return this.signalsSent;
    }

    /** Waits until `marker` shows up on stdout, the process exits, or the timeout expires. */
    async waitForOutput(marker: string, timeoutMs: number): Promise<ReadinessOutcome> {
        const settled = new Promise<ReadinessOutcome>((resolve) => {
            const check = (): boolean => {
                if (this.output.stdout.includes(marker)) {
                    resolve('ready');
                    return true;
                }
                if (this.status !== null) {
                    resolve('exited');
                    return true;
                }
                return false;
            };
            if (!check()) {
                this.watchers.push(check);
            }
        });

        const outcome = await withTimeout(settled, timeoutMs);
        return outcome === TIMED_OUT ? 'timeout' : outcome;
    }

    /** Sends a termination request. Returns false when the process has already exited. */
    terminate(signal: NodeJS.Signals = 'SIGTERM'): boolean {
        if (this.status !== null) {
            return false;
        }
        this.signalsSent.push(signal);
        return this.child.kill(signal);
    }

    /**
     * Requests termination if nobody has yet, then escalates to SIGKILL when the
     * process outlives the grace period. Resolves to null if even SIGKILL does not
     * close it within another grace period.
     */
    async stop(gracePeriodMs: number): Promise<ExitStatus | null> {
        if (this.status !== null) {
            return this.status;
        }
        if (this.signalsSent.length === 0) {
            this.terminate();
        }

        // Grace period
        const graceful = await withTimeout(this.closed, gracePeriodMs);
        if (graceful !== TIMED_OUT) {
            return graceful;
        }

        // Escalate
        this.terminate('SIGKILL');
        const forced = await withTimeout(this.closed, gracePeriodMs);
        return forced === TIMED_OUT ? null : forced;
    }

    /** Waits for the process to exit and its streams to close, then returns everything it wrote. */
    async collect(timeoutMs: number | null): Promise<ProcessOutput | null> {
        const status = await withTimeout(this.closed, timeoutMs);
        if (status === TIMED_OUT) {
            return null;
        }
        return this.snapshot();
    }

    snapshot(): ProcessOutput {
        const endedAt = this.endedAt ?? this.host.now();
        return {
            role: this.role,
            path: this.path,
            stdout: this.output.stdout,
            stderr: this.output.stderr,
            exit_code: this.status?.exit_code ?? null,
            signal: this.status?.signal ?? null,
            exited: this.status !== null,
            duration: endedAt - this.startedAt,
            error: this.lastError?.message ?? null,
        };
    }

    private capture(stream: Readable | null, name: StreamName): void {
        if (stream === null) {
            return;
        }
        stream.setEncoding("utf8");
        stream.on("data", (chunk: string) => {
            this.output[name] += chunk;
            this.emitLines(name, chunk);
            this.notifyWatchers();
        });
    }

    private emitLines(name: StreamName, chunk: string): void {
        if (this.onLine === undefined) {
            return;
        }
        const lines = (this.partialLines[name] + chunk).split('\n');
        this.partialLines[name] = lines.pop() ?? "";
        for (const line of lines) {
            this.onLine(this.role, name, line);
        }
    }

    private flushPartialLines(): void {
        for (const name of ['stdout', 'stderr'] as const) {
            const rest = this.partialLines[name];
            this.partialLines[name] = "";
            if (rest.length > 0 && this.onLine !== undefined) {
                this.onLine(this.role, name, rest);
            }
        }
    }

    private notifyWatchers(): void {
        this.watchers = this.watchers.filter((check) => !check());
    }
}
