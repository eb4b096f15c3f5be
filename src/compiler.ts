// Compiles registry entries into ninja rule and build declarations

import {
  DuplicateOutputError,
  DuplicateRuleNameError,
  InvalidJobError,
  MissingFieldError,
} from "./errors.ts";
import { REQUIRED_FIELDS, describeJob, jobSchema, type Job, type StoredJob } from "./jobs.ts";
import { ruleNameFor } from "./rule-name.ts";

export interface Rule {
  name: string;
  description: string;
  command: string;
}

export interface BuildEdge {
  inputs: string[];
  outputs: string[];
  rule: string;
}

export interface CompiledGraph {
  rules: Rule[];
  builds: BuildEdge[];
}

/** Validate one stored entry, reporting absent fields before type errors. */
export function validateJob(entry: StoredJob, index: number): Job {
  const missing = REQUIRED_FIELDS.filter((field) => !(field in entry));
  if (missing.length > 0) {
    throw new MissingFieldError(entry, missing, index);
  }

  const result = jobSchema.safeParse(entry);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidJobError(entry, index, issues);
  }
  return result.data;
}

/**
 * Derive one rule and one build edge per job, in registry order.
 *
 * Ninja rejects a second `rule` with an existing name, so jobs whose
 * commands map to the same name share a single declaration when command
 * and description agree, and fail with DuplicateRuleNameError otherwise.
 * All-or-nothing: the first invalid entry aborts the whole compile.
 */
export function compile(entries: readonly StoredJob[]): CompiledGraph {
  const rules: Rule[] = [];
  const builds: BuildEdge[] = [];
  const rulesByName = new Map<string, Rule>();
  const producedOutputs = new Set<string>();

  entries.forEach((entry, index) => {
    const job = validateJob(entry, index);
    const name = ruleNameFor(job.command);
    const rule: Rule = { name, description: describeJob(job), command: job.command };

    const existing = rulesByName.get(name);
    if (!existing) {
      rulesByName.set(name, rule);
      rules.push(rule);
    } else if (existing.command !== rule.command || existing.description !== rule.description) {
      throw new DuplicateRuleNameError(name, existing, rule);
    }

    const ownOutputs = new Set<string>();
    for (const output of job.outputs) {
      if (ownOutputs.has(output)) throw new DuplicateOutputError(output, index, true);
      if (producedOutputs.has(output)) throw new DuplicateOutputError(output, index);
      ownOutputs.add(output);
    }
    for (const output of ownOutputs) producedOutputs.add(output);

    builds.push({ inputs: [...job.inputs], outputs: [...job.outputs], rule: name });
  });

  return { rules, builds };
}
