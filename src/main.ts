#!/usr/bin/env node
/**
 * converge: CLI entry point.
 */

import { Command } from "commander";
import { registerConvergeCli } from "./cli.js";
import { formatErrorMessage } from "./errors.js";
import { createBuiltinRegistry } from "./providers/builtin.js";
import { VERSION } from "./version.js";

function createProgram(): Command {
  const program = new Command("converge")
    .description("Declarative infrastructure reconciliation: plan, apply and verify desired state")
    .version(VERSION)
    .option("-c, --config <path>", "Config file (default: ./converge.config.json)");

  registerConvergeCli({
    program,
    registry: createBuiltinRegistry(),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(formatErrorMessage(err));
    process.exitCode = 1;
  });
