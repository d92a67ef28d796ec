import { resolve } from "node:path";
import { parse } from "smol-toml";
import type { ZodError } from "zod";
import type { CliArgs } from "./CliArgs.ts";
import { ConfigError } from "./errors.ts";
import {
    type HarnessConfig,
    type HarnessFile,
    HarnessFileSchema,
    type ProcessConfig,
    type ProcessRole,
    type ProcessSection,
} from "./HarnessConfig.ts";
import type { Host } from "./Host.ts";
import { describeError } from "./stringUtils.ts";

export const DEFAULT_CONFIG_FILE = "harness.toml";

export const DEFAULTS = {
    build_dir: "./build/examples",
    startup_delay_ms: 1000,
    run_duration_ms: 5000,
    grace_period_ms: 2000,
    collect_timeout_ms: 10000,
    ready_timeout_ms: 5000,
    marker: "Received frame",
    min_occurrences: 1,
} as const;

export const DEFAULT_EXECUTABLES: Record<ProcessRole, string> = {
    broker: "broker",
    subscriber: "simple_subscriber",
    publisher: "simple_publisher",
};

/**
 * Settings are layered: built-in defaults, then `harness.toml` (or the file
 * named by `--config`), then command line flags.
 */
export async function loadConfig(cliArgs: CliArgs, host: Host): Promise<HarnessConfig> {
    const explicit = cliArgs.config !== undefined;
    const configPath = resolve(host.cwd, cliArgs.config ?? DEFAULT_CONFIG_FILE);

    const content = await host.files.readText(configPath);
    if (content === null) {
        if (explicit) {
            throw new ConfigError(`Config file not found: ${configPath}`);
        }
        return resolveConfig({}, cliArgs, host.cwd, null);
    }

    const file = parseHarnessFile(content, configPath);
    return resolveConfig(file, cliArgs, host.cwd, configPath);
}

export function parseHarnessFile(content: string, source: string): HarnessFile {
    let raw: unknown;
    try {
        raw = parse(content);
    } catch (e) {
        throw new ConfigError(`Failed to parse ${source}: ${describeError(e)}`);
    }

    const result = HarnessFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid config ${source}:\n${formatIssues(result.error)}`);
    }
    return result.data;
}

export function resolveConfig(file: HarnessFile, cliArgs: CliArgs, cwd: string, source: string | null): HarnessConfig {
    const verdict = file.verdict ?? {};

    return {
        source,
        build_dir: resolve(cwd, cliArgs.buildDir ?? file.build_dir ?? DEFAULTS.build_dir),
        working_directory: resolve(cwd, file.working_directory ?? "."),
        startup_delay_ms: cliArgs.startupDelay ?? file.startup_delay_ms ?? DEFAULTS.startup_delay_ms,
        run_duration_ms: cliArgs.runDuration ?? file.run_duration_ms ?? DEFAULTS.run_duration_ms,
        grace_period_ms: cliArgs.gracePeriod ?? file.grace_period_ms ?? DEFAULTS.grace_period_ms,
        collect_timeout_ms: cliArgs.collectTimeout ?? file.collect_timeout_ms ?? DEFAULTS.collect_timeout_ms,
        ready_timeout_ms: file.ready_timeout_ms ?? DEFAULTS.ready_timeout_ms,
        broker: processConfig('broker', file.broker),
        subscriber: processConfig('subscriber', file.subscriber),
        publisher: processConfig('publisher', file.publisher),
        verdict: {
            marker: cliArgs.marker ?? verdict.marker ?? DEFAULTS.marker,
            min_occurrences: verdict.min_occurrences ?? DEFAULTS.min_occurrences,
        },
    };
}

function processConfig(role: ProcessRole, section: ProcessSection | undefined): ProcessConfig {
    return {
        role,
        executable: section?.executable ?? DEFAULT_EXECUTABLES[role],
        args: section?.args ?? [],
        environment_variables: section?.environment_variables ?? {},
        ready_marker: section?.ready_marker,
    };
}

function formatIssues(error: ZodError): string {
    return error.issues
        .map((issue) => `  ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("\n");
}
