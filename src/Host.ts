import type { Readable } from "node:stream";

/**
 * The parts of a spawned child the harness relies on. Node's `ChildProcess`
 * satisfies it; tests substitute in-process fakes.
 */
export interface ChildHandle {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals): boolean;
    on(event: "error", listener: (error: Error) => void): unknown;
    once(event: "spawn", listener: () => void): unknown;
    once(event: "error", listener: (error: Error) => void): unknown;
    once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export interface SpawnOptions {
    cwd: string;
    env: Record<string, string>;
}

export interface HostFiles {
    /** Resolves to null when the file does not exist. */
    readText(path: string): Promise<string | null>;
    isExecutable(path: string): Promise<boolean>;
}

export type InterruptListener = (signal: NodeJS.Signals) => void;

/** Everything the harness needs from the machine it runs on. */
export interface Host {
    readonly cwd: string;
    readonly files: HostFiles;
    spawn(command: string, args: string[], options: SpawnOptions): ChildHandle;
    /** Rejects with the signal's reason when `signal` aborts first. */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
    now(): number;
    /** Returns a function that removes the listener. */
    onInterrupt(listener: InterruptListener): () => void;
}
