import { type CliArgs, parseArgs } from "./CliArgs.ts";
import { loadConfig } from "./config.ts";
import { describePlan, type LaunchPlan, resolvePlan } from "./finders.ts";
import type { HarnessConfig } from "./HarnessConfig.ts";
import { HarnessReporter } from "./HarnessReporter.ts";
import { HarnessRunner } from "./HarnessRunner.ts";
import type { Host } from "./Host.ts";
import type { LineListener } from "./ManagedProcess.ts";
import { describeError } from "./stringUtils.ts";

export default async function(host: Host, argv: string[]): Promise<number> {
    const cliArgs = parseArgs(argv);

    let config: HarnessConfig;
    try {
        config = await loadConfig(cliArgs, host);
    } catch (e) {
        console.error(`Configuration error: ${describeError(e)}`);
        return 1;
    }

    const plan = resolvePlan(config);

    if (cliArgs.command === 'plan') {
        await describePlan(config, plan, host);
        return 0;
    }

    return await runHarness(cliArgs, config, plan, host);
}

async function runHarness(cliArgs: CliArgs, config: HarnessConfig, plan: LaunchPlan, host: Host): Promise<number> {
    console.log("=== Starting Integration Test ===");

    const reporter = new HarnessReporter(cliArgs.verbose);
    const runner = new HarnessRunner(host, config, cliArgs.verbose ? echoLine : undefined);

    const removeInterruptListener = host.onInterrupt((signal) => runner.interrupt(signal));
    try {
        const result = await runner.run(plan);
        reporter.reportResult(result);
        return result.type === 'passed' ? 0 : 1;
    } finally {
        removeInterruptListener();
    }
}

const echoLine: LineListener = (role, stream, line) => {
    const tag = stream === 'stderr' ? `${role}:err` : role;
    console.log(`[${tag}] ${line}`);
};
