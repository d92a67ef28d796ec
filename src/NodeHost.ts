import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import type { Host, InterruptListener } from "./Host.ts";

const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createNodeHost(): Host {
    return {
        cwd: process.cwd(),
        files: {
            async readText(path: string): Promise<string | null> {
                try {
                    return await readFile(path, "utf8");
                } catch (e) {
                    if (isNotFound(e)) {
                        return null;
                    }
                    throw e;
                }
            },
            async isExecutable(path: string): Promise<boolean> {
                try {
                    await access(path, constants.X_OK);
                    return true;
                } catch {
                    return false;
                }
            },
        },
        spawn(command, args, options) {
            return spawn(command, args, {
                cwd: options.cwd,
                env: { ...process.env, ...options.env },
                stdio: ["ignore", "pipe", "pipe"],
            });
        },
        async sleep(ms: number, signal?: AbortSignal): Promise<void> {
            try {
                await delay(ms, undefined, { signal });
            } catch (e) {
                // node:timers rejects with a generic AbortError; surface the caller's reason
                if (signal?.aborted) {
                    throw signal.reason;
                }
                throw e;
            }
        },
        now: () => Date.now(),
        onInterrupt(listener: InterruptListener): () => void {
            for (const signal of INTERRUPT_SIGNALS) {
                process.on(signal, listener);
            }
            return () => {
                for (const signal of INTERRUPT_SIGNALS) {
                    process.off(signal, listener);
                }
            };
        },
    };
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}
