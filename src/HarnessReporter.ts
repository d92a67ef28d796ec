import { describeExit, type HarnessResult } from "./HarnessRunner.ts";
import type { ProcessOutput } from "./ManagedProcess.ts";
import { capitalize, formatStream, indent } from "./stringUtils.ts";

export class HarnessReporter {
    constructor(private verbose: boolean) { }

    reportResult(result: HarnessResult): void {
        console.log();

        switch (result.type) {
            case 'passed':
                console.log("SUCCESS: Subscriber received messages from Publisher via Broker.");
                console.log(`  ✓ ${result.occurrences} matching line(s) (${result.duration}ms)`);
                if (this.verbose) {
                    this.reportOutputs(result.outputs);
                }
                return;
            case 'failed':
                console.log("FAILURE: Subscriber did not receive expected messages.");
                console.log(`  ✗ ${result.brief_reason}`);
                console.log(indent(result.reason, 4));
                break;
            case 'timeout':
                console.log(`TIMEOUT: ${result.stage} (after ${result.duration}ms)`);
                break;
            case 'error':
                console.log(`ERROR: ${result.error}`);
                break;
        }

        if (this.verbose) {
            this.reportOutputs(result.outputs);
            return;
        }

        const subscriber = result.type === 'failed'
            ? result.subscriber
            : result.outputs.find((output) => output.role === 'subscriber');
        if (subscriber !== undefined) {
            this.reportStreams(subscriber);
        }
    }

    private reportOutputs(outputs: ProcessOutput[]): void {
        for (const output of outputs) {
            console.log();
            console.log(`${capitalize(output.role)} (${output.path}): ${describeExit(output)}, ran ${output.duration}ms`);
            if (output.error !== null) {
                console.log(`  Error: ${output.error}`);
            }
            this.reportStreams(output);
        }
    }

    private reportStreams(output: ProcessOutput): void {
        const label = capitalize(output.role);
        console.log(`${label} STDOUT:\n${formatStream(output.stdout, 4)}`);
        console.log(`${label} STDERR:\n${formatStream(output.stderr, 4)}`);
    }
}
