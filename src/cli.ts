/**
 * converge: CLI Commands
 *
 * Commands: plan, apply, destroy, state show|history, lock status|force-release, verify
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { InvalidArgumentError, type Command } from "commander";
import { loadConfig, type ConvergeConfig } from "./config.js";
import { ValidationError } from "./errors.js";
import { formatRunReport } from "./executor/report.js";
import { loadDocument } from "./graph/document.js";
import { configureLogging } from "./logging/index.js";
import { parsePlan, renderPlan, serializePlan } from "./plan/render.js";
import { summarizePlan } from "./plan/scheduler.js";
import type { ProviderRegistry } from "./providers/registry.js";
import { createReconciler, type ApplyResult, type Reconciler } from "./reconciler.js";
import type { LockToken, ScalarValue, VerifyFinding, VerifyReport } from "./types.js";

/** Exit code of a run that left changes unapplied, or of a verification that found drift. */
export const EXIT_INCOMPLETE = 2;

export type CliContext = {
  program: Command;
  registry: ProviderRegistry;
  /** Line printer; console.log by default. */
  out?: (line: string) => void;
  setExitCode?: (code: number) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

type ScopeOpts = { scope?: string; json?: boolean };

type Session = { config: ConvergeConfig; reconciler: Reconciler; scope: string };

export function registerConvergeCli(ctx: CliContext): void {
  const { program } = ctx;
  const print = ctx.out ?? ((line: string) => console.log(line));
  const setExitCode = ctx.setExitCode ?? (() => {});
  const cwd = ctx.cwd ?? process.cwd();

  /** Load config, open the state store, run `fn`, close the store. */
  const withSession = async <T>(
    opts: ScopeOpts,
    adjust: (config: ConvergeConfig) => void,
    fn: (session: Session) => Promise<T>,
  ): Promise<T> => {
    const configPath: unknown = program.opts().config;
    const config = loadConfig({
      path: typeof configPath === "string" ? configPath : undefined,
      env: ctx.env,
      cwd,
    });
    adjust(config);
    configureLogging(config.logging);

    const reconciler = createReconciler(config, ctx.registry);
    await reconciler.store.initialize();
    try {
      return await fn({ config, reconciler, scope: opts.scope ?? config.defaultScope });
    } finally {
      await reconciler.store.close();
    }
  };

  const readDocument = (file: string) => loadDocument(path.resolve(cwd, file));

  const printRun = (result: ApplyResult, json: boolean | undefined) => {
    if (json) {
      print(JSON.stringify({ summary: summarizePlan(result.plan), report: result.report }, null, 2));
    } else {
      print(renderPlan(result.plan));
      print("");
      print(formatRunReport(result.report));
    }
    if (result.report.status !== "applied") setExitCode(EXIT_INCOMPLETE);
  };

  /** Aborts the run on Ctrl-C; committed work stays. */
  const interruptible = async <T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> => {
    const controller = new AbortController();
    const onInterrupt = () => controller.abort(new Error("Interrupted"));
    process.once("SIGINT", onInterrupt);
    try {
      return await fn(controller.signal);
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  };

  // ── plan ────────────────────────────────────────────────────
  program
    .command("plan")
    .description("Show the changes needed to reach the desired state")
    .argument("<document>", "Desired-state JSON document")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("-o, --out <file>", "Save the plan for a later apply")
    .option("--json", "Output as JSON")
    .action(async (document: string, opts: ScopeOpts & { out?: string }) => {
      const desired = readDocument(document);
      await withSession(opts, () => {}, async ({ reconciler, scope }) => {
        const { plan } = await reconciler.plan(desired, scope);

        if (opts.out) {
          fs.writeFileSync(path.resolve(cwd, opts.out), `${serializePlan(plan)}\n`);
        }
        if (opts.json) {
          print(JSON.stringify({ summary: summarizePlan(plan), plan }, null, 2));
          return;
        }
        print(renderPlan(plan));
        if (opts.out) print(`\nSaved plan to ${opts.out}`);
      });
    });

  // ── apply ───────────────────────────────────────────────────
  program
    .command("apply")
    .description("Apply the desired state, or a saved plan computed from it")
    .argument("<document>", "Desired-state JSON document")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("-p, --plan <file>", "Saved plan to apply; rejected if stale")
    .option("--concurrency <n>", "Parallel operations per wave", parsePositiveInt)
    .option("--wait <ms>", "Wait up to <ms> for a held lock", parseNonNegativeInt)
    .option("--json", "Output as JSON")
    .action(async (document: string, opts: ScopeOpts & { plan?: string; concurrency?: number; wait?: number }) => {
      const desired = readDocument(document);
      const savedPlan = opts.plan ? parsePlan(fs.readFileSync(path.resolve(cwd, opts.plan), "utf-8")) : undefined;

      const result = await withSession(
        opts,
        (config) => applyRunOverrides(config, opts),
        ({ reconciler, scope }) =>
          interruptible((signal) => reconciler.apply(desired, scope, { savedPlan, signal })),
      );
      printRun(result, opts.json);
    });

  // ── destroy ─────────────────────────────────────────────────
  program
    .command("destroy")
    .description("Destroy every resource recorded for a scope")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("--concurrency <n>", "Parallel operations per wave", parsePositiveInt)
    .option("--wait <ms>", "Wait up to <ms> for a held lock", parseNonNegativeInt)
    .option("--json", "Output as JSON")
    .action(async (opts: ScopeOpts & { concurrency?: number; wait?: number }) => {
      const result = await withSession(
        opts,
        (config) => applyRunOverrides(config, opts),
        ({ reconciler, scope }) => interruptible((signal) => reconciler.destroyAll(scope, { signal })),
      );
      printRun(result, opts.json);
    });

  // ── state ───────────────────────────────────────────────────
  const state = program.command("state").description("Inspect recorded state snapshots");

  state
    .command("show")
    .description("Show the resources of the latest (or a given) snapshot")
    .argument("[version]", "Snapshot version", parsePositiveInt)
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("--json", "Output as JSON")
    .action(async (version: number | undefined, opts: ScopeOpts) => {
      await withSession(opts, () => {}, async ({ reconciler, scope }) => {
        const snapshot =
          version === undefined
            ? await reconciler.store.readSnapshot(scope)
            : await reconciler.store.readSnapshotVersion(scope, version);

        if (!snapshot) {
          if (version !== undefined) throw new ValidationError(`Scope "${scope}" has no snapshot version ${version}`);
          if (opts.json) print("null");
          else print(`No state recorded for scope "${scope}".`);
          return;
        }
        if (opts.json) {
          print(JSON.stringify(snapshot, null, 2));
          return;
        }

        const addresses = Object.keys(snapshot.resources).sort();
        print(
          `Scope "${scope}" at version ${snapshot.version} (${snapshot.complete ? "complete" : "partial"}), ${addresses.length} resources`,
        );
        for (const address of addresses) {
          print(`  ${address}  id=${snapshot.resources[address].externalId}`);
        }
      });
    });

  state
    .command("history")
    .description("List snapshot versions, newest first")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("--json", "Output as JSON")
    .action(async (opts: ScopeOpts) => {
      await withSession(opts, () => {}, async ({ reconciler, scope }) => {
        const versions = await reconciler.store.listVersions(scope);
        if (opts.json) {
          print(JSON.stringify(versions, null, 2));
          return;
        }
        if (versions.length === 0) {
          print(`No state recorded for scope "${scope}".`);
          return;
        }
        print(`Snapshots of scope "${scope}" (${versions.length}):`);
        for (const v of versions) {
          const run = v.runId ? `  run ${v.runId}` : "";
          print(`  v${v.version}  ${v.createdAt}  ${v.complete ? "complete" : "partial "}  ${v.resourceCount} resources${run}`);
        }
      });
    });

  // ── lock ────────────────────────────────────────────────────
  const lock = program.command("lock").description("Inspect or break scope locks");

  lock
    .command("status")
    .description("Show who holds the scope lock")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("--json", "Output as JSON")
    .action(async (opts: ScopeOpts) => {
      await withSession(opts, () => {}, async ({ reconciler, scope }) => {
        const current = await reconciler.store.getLock(scope);
        if (opts.json) {
          print(JSON.stringify(current ? { ...current, expired: reconciler.store.isExpired(current) } : null, null, 2));
          return;
        }
        if (!current) {
          print(`Scope "${scope}" is not locked.`);
          return;
        }
        print(describeLock(current, reconciler.store.isExpired(current)));
      });
    });

  lock
    .command("force-release")
    .description("Remove the scope lock regardless of its holder")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .action(async (opts: ScopeOpts) => {
      await withSession(opts, () => {}, async ({ reconciler, scope }) => {
        const removed = await reconciler.store.forceReleaseLock(scope);
        print(
          removed
            ? `Released lock ${removed.id} held by ${removed.holder} on scope "${scope}".`
            : `Scope "${scope}" is not locked.`,
        );
      });
    });

  // ── verify ──────────────────────────────────────────────────
  program
    .command("verify")
    .description("Read recorded resources back and report drift (read-only)")
    .option("-s, --scope <scope>", "Target scope (default from config)")
    .option("--json", "Output as JSON")
    .action(async (opts: ScopeOpts) => {
      const report = await withSession(opts, () => {}, ({ reconciler, scope }) => reconciler.verify(scope));
      print(opts.json ? JSON.stringify(report, null, 2) : formatVerifyReport(report));
      if (report.findings.some(isDrift)) setExitCode(EXIT_INCOMPLETE);
    });
}

// =============================================================================
// Helpers
// =============================================================================

function applyRunOverrides(config: ConvergeConfig, opts: { concurrency?: number; wait?: number }): void {
  if (opts.concurrency !== undefined) config.executor.concurrency = opts.concurrency;
  if (opts.wait !== undefined) config.state.lockTimeoutMs = opts.wait;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function describeLock(lock: LockToken, expired: boolean): string {
  const lines = [
    `Scope "${lock.scope}" is locked by ${lock.holder} for ${lock.operation} since ${lock.acquiredAt}`,
    `  Lock: ${lock.id} (fence ${lock.fence})`,
    `  Lease expires: ${lock.leaseExpiresAt}${expired ? " (expired; the next run will reclaim it)" : ""}`,
  ];
  return lines.join("\n");
}

function isDrift(finding: VerifyFinding): boolean {
  return finding.status !== "in-sync" && finding.status !== "unsupported";
}

function formatScalar(value: ScalarValue | undefined): string {
  return value === undefined ? "(absent)" : JSON.stringify(value);
}

export function formatVerifyReport(report: VerifyReport): string {
  const lines = [`Verified ${report.findings.length} resources of scope "${report.scope}" at version ${report.version}`];
  for (const finding of report.findings) {
    lines.push(`  [${finding.status}] ${finding.address}${finding.error ? `: ${finding.error}` : ""}`);
    for (const d of finding.differences ?? []) {
      lines.push(`      ${d.attribute}: recorded ${formatScalar(d.recorded)}, actual ${formatScalar(d.actual)}`);
    }
  }
  const drifted = report.findings.filter(isDrift).length;
  lines.push(drifted === 0 ? "No drift detected." : `${drifted} resources drifted.`);
  return lines.join("\n");
}
