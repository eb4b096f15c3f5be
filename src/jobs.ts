// Job records: the unit of work accumulated in the registry

import { z } from "zod";
import { config } from "./config.ts";

// A line break would end the ninja statement and start a new one
const singleLine = z.string().refine((value) => !/[\r\n]/.test(value), "must not contain line breaks");

export const jobSchema = z.object({
  inputs: z.array(singleLine).min(1),
  outputs: z.array(singleLine).min(1),
  command: singleLine,
  description: singleLine.optional(),
  // Metadata for the downstream executor; never interpreted here
  pipeline_name: z.string().optional(),
  ci_stage: z.enum(config.ciStages).optional(),
  timeout: z.number().int().positive().optional(),
  timeout_ok: z.literal(true).optional(),
  ok_returns: z.array(z.number().int()).optional(),
});

export type Job = z.infer<typeof jobSchema>;

/** A registry entry as read back from disk, before validation. */
export type StoredJob = Record<string, unknown>;

export const REQUIRED_FIELDS = ["inputs", "outputs", "command"] as const;

export interface JobSpec {
  inputs: string[];
  outputs: string[];
  command: string;
  description?: string;
  pipelineName?: string;
  ciStage?: Job["ci_stage"];
  timeout?: number;
  timeoutOk?: boolean;
  okReturns?: number[];
}

/**
 * Build a job record with a stable key order. Optional keys are only
 * present when set, so a bare job serializes as inputs/outputs/command.
 */
export function createJob(spec: JobSpec): Job {
  const job: Job = {
    inputs: [...spec.inputs],
    outputs: [...spec.outputs],
    command: spec.command,
  };
  if (spec.description) job.description = spec.description;
  if (spec.pipelineName) job.pipeline_name = spec.pipelineName;
  if (spec.ciStage) job.ci_stage = spec.ciStage;
  if (spec.timeout !== undefined) job.timeout = spec.timeout;
  if (spec.timeoutOk) job.timeout_ok = true;
  if (spec.okReturns && spec.okReturns.length > 0) job.ok_returns = [...spec.okReturns];
  return job;
}

export function describeJob(job: Pick<Job, "command" | "description">): string {
  return job.description ?? `Running '${job.command}...'`;
}
