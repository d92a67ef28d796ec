import { z } from "zod";
import { MAX_TIMER_MS } from "./timing.ts";

export type ProcessRole = 'broker' | 'subscriber' | 'publisher';

export const LAUNCH_ORDER: readonly ProcessRole[] = ['broker', 'subscriber', 'publisher'];

const ProcessSectionSchema = z.object({
    executable: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
    environment_variables: z.record(z.string()).optional(),
    ready_marker: z.string().min(1).optional(),
}).strict();

// No readiness wait for the publisher: the run window starts once it is launched.
const PublisherSectionSchema = ProcessSectionSchema.omit({ ready_marker: true }).strict();

const VerdictSectionSchema = z.object({
    marker: z.string().min(1).optional(),
    min_occurrences: z.number().int().positive().optional(),
}).strict();

const milliseconds = z.number().int().nonnegative().max(MAX_TIMER_MS);

export const HarnessFileSchema = z.object({
    build_dir: z.string().min(1).optional(),
    working_directory: z.string().min(1).optional(),
    startup_delay_ms: milliseconds.optional(),
    run_duration_ms: milliseconds.optional(),
    grace_period_ms: milliseconds.optional(),
    collect_timeout_ms: milliseconds.optional(),
    ready_timeout_ms: milliseconds.optional(),
    broker: ProcessSectionSchema.optional(),
    subscriber: ProcessSectionSchema.optional(),
    publisher: PublisherSectionSchema.optional(),
    verdict: VerdictSectionSchema.optional(),
}).strict();

/** Contents of a `harness.toml` file after validation. */
export type HarnessFile = z.infer<typeof HarnessFileSchema>;
export type ProcessSection = z.infer<typeof ProcessSectionSchema>;

export interface ProcessConfig {
    role: ProcessRole;
    executable: string;
    args: string[];
    environment_variables: Record<string, string>;
    ready_marker?: string;
}

export interface VerdictExpectation {
    marker: string;
    min_occurrences: number;
}

export interface HarnessConfig {
    /** Path of the file the settings came from, or null when only defaults and flags apply. */
    source: string | null;
    build_dir: string;
    working_directory: string;
    startup_delay_ms: number;
    run_duration_ms: number;
    grace_period_ms: number;
    /** 0 waits for the subscriber indefinitely. */
    collect_timeout_ms: number;
    ready_timeout_ms: number;
    broker: ProcessConfig;
    subscriber: ProcessConfig;
    publisher: ProcessConfig;
    verdict: VerdictExpectation;
}
