import type { ProcessRole } from "./HarnessConfig.ts";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export class LaunchError extends Error {
    constructor(public role: ProcessRole, public path: string, detail: string) {
        super(`Failed to launch ${role} (${path}): ${detail}`);
        this.name = "LaunchError";
    }
}

export class InterruptedError extends Error {
    constructor(public signal: string) {
        super(`Interrupted by ${signal}`);
        this.name = "InterruptedError";
    }
}
