#!/usr/bin/env -S node --import tsx

// jobgraph CLI - Incrementally declare jobs, then compile them into a ninja file

import { runCli } from "./commands.ts";

process.exitCode = runCli(process.argv.slice(2));
