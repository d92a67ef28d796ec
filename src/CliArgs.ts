import { MAX_TIMER_MS } from "./timing.ts";

export interface CliArgs {
    command: 'run' | 'plan';
    verbose: boolean;
    config?: string;
    buildDir?: string;
    startupDelay?: number;
    runDuration?: number;
    gracePeriod?: number;
    collectTimeout?: number;
    marker?: string;
}

export function parseArgs(args: string[]): CliArgs {
    const cliArgs: CliArgs = {
        command: 'run',
        verbose: false
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case 'plan':
                cliArgs.command = 'plan';
                break;
            case 'run':
                cliArgs.command = 'run';
                break;
            case '-v':
            case '--verbose':
                cliArgs.verbose = true;
                break;
            case '-c':
            case '--config':
                cliArgs.config = args[++i];
                break;
            case '--build-dir':
                cliArgs.buildDir = args[++i];
                break;
            case '--startup-delay':
                cliArgs.startupDelay = parseMilliseconds(args[++i]);
                break;
            case '--run-duration':
                cliArgs.runDuration = parseMilliseconds(args[++i]);
                break;
            case '--grace-period':
                cliArgs.gracePeriod = parseMilliseconds(args[++i]);
                break;
            case '--collect-timeout':
                cliArgs.collectTimeout = parseMilliseconds(args[++i]);
                break;
            case '--marker':
                cliArgs.marker = args[++i] || undefined;
                break;
        }
    }

    return cliArgs;
}

function parseMilliseconds(raw: string | undefined): number | undefined {
    if (raw === undefined || !/^\d+$/.test(raw)) {
        return undefined;
    }
    const ms = parseInt(raw, 10);
    return ms <= MAX_TIMER_MS ? ms : undefined;
}
