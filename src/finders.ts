import { resolve } from "node:path";
import { type HarnessConfig, LAUNCH_ORDER, type ProcessRole } from "./HarnessConfig.ts";
import type { Host } from "./Host.ts";
import type { LaunchRequest } from "./ManagedProcess.ts";
import { capitalize } from "./stringUtils.ts";
import { formatDuration } from "./timing.ts";

export interface LaunchTarget extends LaunchRequest {
    ready_marker?: string;
}

export type LaunchPlan = Record<ProcessRole, LaunchTarget>;

export function resolvePlan(config: HarnessConfig): LaunchPlan {
    const target = (role: ProcessRole): LaunchTarget => {
        const settings = config[role];
        return {
            role,
            path: resolve(config.build_dir, settings.executable),
            args: settings.args,
            cwd: config.working_directory,
            env: settings.environment_variables,
            ready_marker: settings.ready_marker,
        };
    };

    return {
        broker: target('broker'),
        subscriber: target('subscriber'),
        publisher: target('publisher'),
    };
}

export async function findMissingExecutables(plan: LaunchPlan, host: Host): Promise<LaunchTarget[]> {
    const missing: LaunchTarget[] = [];
    for (const role of LAUNCH_ORDER) {
        if (!(await host.files.isExecutable(plan[role].path))) {
            missing.push(plan[role]);
        }
    }
    return missing;
}

export async function describePlan(config: HarnessConfig, plan: LaunchPlan, host: Host): Promise<void> {
    const missing = new Set((await findMissingExecutables(plan, host)).map((target) => target.role));

    console.log(`Harness plan (${config.source ?? "defaults"})`);
    console.log(`  Working directory: ${config.working_directory}`);
    for (const role of LAUNCH_ORDER) {
        const target = plan[role];
        const command = [target.path, ...target.args].join(" ");
        console.log(`  ${capitalize(role)}: ${command}${missing.has(role) ? " (missing)" : ""}`);
        if (role === 'publisher') {
            continue;
        }
        if (target.ready_marker !== undefined) {
            console.log(`    then wait for "${target.ready_marker}" (up to ${formatDuration(config.ready_timeout_ms)})`);
        } else {
            console.log(`    then wait ${formatDuration(config.startup_delay_ms)}`);
        }
    }
    console.log(`  Run for ${formatDuration(config.run_duration_ms)}, grace period ${formatDuration(config.grace_period_ms)}`);
    console.log(`  Verdict: subscriber stdout contains "${config.verdict.marker}" at least ${config.verdict.min_occurrences} time(s)`);
}
