// Subcommand parsing and dispatch for the jobgraph CLI

import { z } from "zod";
import { runBuild } from "./build.ts";
import { config } from "./config.ts";
import { MissingFieldError, UsageError } from "./errors.ts";
import { createJob, type Job } from "./jobs.ts";
import { createRegistry, type JobRegistry } from "./store/index.ts";

export const HELP = `
jobgraph - Incrementally build up a dependency graph of jobs to execute

Usage:
  jobgraph add-job -i F... -c C -o F... [options]   Register a job
  jobgraph run-build                                Compile all jobs into ${config.outputPath}

Describing the build graph:
  -i, --inputs <F...>        Files this job depends on (required)
  -c, --command <C>          Command to run once all dependencies are satisfied (required)
  -o, --outputs <F...>       Files this job generates (required)

Job control:
  -p, --pipeline-name <P>    Pipeline this job is a member of
  -s, --ci-stage <S>         CI stage: ${config.ciStages.join(", ")}
  --timeout <N>              Max number of seconds this job should run for
  --timeout-ok               If the job times out, terminate it and return success
  --ok-returns <RC...>       Return codes that also count as success

Misc:
  --description <DESC>       String to print when this job is being run
  -v, --verbose              Verbose output
  -w, --very-verbose         Very verbose output
  -h, --help                 Show this help

Environment:
  JOBGRAPH_CACHE             Registry document (default: ${config.cachePath})
  JOBGRAPH_STORAGE           Registry backend: json, sqlite (default: json)
  JOBGRAPH_DB                SQLite registry (default: ${config.sqliteDbPath})
  JOBGRAPH_OUTPUT            Compiled build file (default: ${config.outputPath})
`;

const pathList = (flag: string) =>
  z
    .array(z.string().min(1), { required_error: `${flag} is required` })
    .min(1, `${flag} needs at least one path`);

export const addJobOptionsSchema = z.object({
  inputs: pathList("-i/--inputs"),
  outputs: pathList("-o/--outputs"),
  command: z.string({ required_error: "-c/--command is required" }).min(1, "-c/--command must not be empty"),
  pipelineName: z.string().min(1).optional(),
  ciStage: z.enum(config.ciStages).optional(),
  timeout: z.coerce.number().int().positive().optional(),
  timeoutOk: z.boolean().default(false),
  okReturns: z.array(z.coerce.number().int()).optional(),
  description: z.string().optional(),
  verbose: z.boolean().default(false),
  veryVerbose: z.boolean().default(false),
});

export type AddJobOptions = z.infer<typeof addJobOptionsSchema>;

export type ParsedCommand =
  | { command: "help" }
  | { command: "add-job"; options: AddJobOptions }
  | { command: "run-build" };

interface RawAddJobFlags {
  inputs?: string[];
  outputs?: string[];
  command?: string;
  pipelineName?: string;
  ciStage?: string;
  timeout?: string;
  timeoutOk?: boolean;
  okReturns?: string[];
  description?: string;
  verbose?: boolean;
  veryVerbose?: boolean;
}

const INTEGER = /^-?\d+$/;

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined) throw new UsageError(`${flag} expects a value`);
  return value;
}

/** Values following args[i] up to the next flag. */
function takeValues(args: string[], i: number, allowNegativeNumbers = false): string[] {
  const values: string[] = [];
  for (let j = i + 1; j < args.length; j++) {
    const arg = args[j];
    if (arg.startsWith("-") && !(allowNegativeNumbers && INTEGER.test(arg))) break;
    values.push(arg);
  }
  return values;
}

function parseAddJobFlags(args: string[]): AddJobOptions {
  const raw: RawAddJobFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-i" || arg === "--inputs") {
      raw.inputs = takeValues(args, i);
      i += raw.inputs.length;
    } else if (arg === "-o" || arg === "--outputs") {
      raw.outputs = takeValues(args, i);
      i += raw.outputs.length;
    } else if (arg === "-c" || arg === "--command") {
      raw.command = takeValue(args, i++, arg);
    } else if (arg === "-p" || arg === "--pipeline-name") {
      raw.pipelineName = takeValue(args, i++, arg);
    } else if (arg === "-s" || arg === "--ci-stage") {
      raw.ciStage = takeValue(args, i++, arg);
    } else if (arg === "--timeout") {
      raw.timeout = takeValue(args, i++, arg);
    } else if (arg === "--timeout-ok") {
      raw.timeoutOk = true;
    } else if (arg === "--ok-returns") {
      raw.okReturns = takeValues(args, i, true);
      i += raw.okReturns.length;
    } else if (arg === "--description") {
      raw.description = takeValue(args, i++, arg);
    } else if (arg === "-v" || arg === "--verbose") {
      raw.verbose = true;
    } else if (arg === "-w" || arg === "--very-verbose") {
      raw.veryVerbose = true;
    } else {
      throw new UsageError(`Unknown argument for add-job: ${arg}`);
    }
  }

  const result = addJobOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join("\n"));
  }
  return result.data;
}

export function parseArgs(args: string[]): ParsedCommand {
  const [command, ...rest] = args;

  if (command === undefined || command === "-h" || command === "--help" || rest.includes("-h") || rest.includes("--help")) {
    return { command: "help" };
  }

  switch (command) {
    case "add-job":
      return { command: "add-job", options: parseAddJobFlags(rest) };
    case "run-build":
      if (rest.length > 0) throw new UsageError(`run-build takes no arguments, got: ${rest.join(" ")}`);
      return { command: "run-build" };
    default:
      throw new UsageError(`Unknown subcommand: ${command}`);
  }
}

export function addJob(registry: JobRegistry, options: AddJobOptions): Job {
  const job = createJob(options);
  registry.append(job);

  if (options.verbose || options.veryVerbose) {
    console.error(`Registered job '${job.command}' in ${registry.location}`);
  }
  if (options.veryVerbose) {
    console.error(JSON.stringify(job, null, 2));
  }
  return job;
}

export interface CliContext {
  registry?: JobRegistry;
  outputPath?: string;
}

/** Run one CLI invocation and return its exit code. */
export function runCli(args: string[], context: CliContext = {}): number {
  try {
    const parsed = parseArgs(args);

    switch (parsed.command) {
      case "help":
        console.log(HELP);
        return 0;

      case "add-job":
        addJob(context.registry ?? createRegistry(), parsed.options);
        return 0;

      case "run-build": {
        const summary = runBuild(context.registry ?? createRegistry(), context.outputPath);
        console.log(`Wrote ${summary.builds} build edge(s) and ${summary.rules} rule(s) to ${summary.outputPath}`);
        return 0;
      }
    }
  } catch (err) {
    if (err instanceof MissingFieldError) {
      console.error(JSON.stringify(err.record));
    }
    console.error("Error:", err instanceof Error ? err.message : String(err));
    return 1;
  }
}
