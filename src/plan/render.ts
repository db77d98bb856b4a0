/**
 * Plan Rendering & Saved Plans
 *
 * Human-readable plan output for review, and the JSON artifact that carries a
 * reviewed plan to a later `apply`.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import { formatAttributeValue } from "../graph/document.js";
import type { AttributeChange, ExecutionPlan, PlanEntry, ScalarValue } from "../types.js";
import { deepFreeze } from "../utils.js";
import { entryKey, summarizePlan } from "./scheduler.js";

export const SAVED_PLAN_FORMAT_VERSION = 1;

const KNOWN_AFTER_APPLY = "(known after apply)";

// =============================================================================
// Rendering
// =============================================================================

/** Render a plan for review, one block per wave. */
export function renderPlan(plan: ExecutionPlan): string {
  const lines = [`Plan ${plan.id} for scope "${plan.scope}" (base version ${plan.baseVersion})`];

  if (plan.waves.length === 0) {
    lines.push("", "No changes. Infrastructure matches the desired state.");
    return lines.join("\n");
  }

  for (const wave of plan.waves) {
    lines.push("", `Wave ${wave.index}:`);
    for (const entry of wave.entries) {
      lines.push(...renderEntry(entry));
    }
  }

  const s = summarizePlan(plan);
  lines.push(
    "",
    `Plan: ${s.creates} to create, ${s.updates} to update, ${s.destroys} to destroy, ${s.replaces} to replace.`,
  );
  return lines.join("\n");
}

function renderEntry(entry: PlanEntry): string[] {
  const op = entry.operation;
  switch (op.kind) {
    case "create": {
      const header = op.replace ? `  -/+ ${op.address} (replace: create)` : `  + ${op.address}`;
      const attrs = Object.keys(op.after)
        .sort()
        .map((name) => `      ${name} = ${formatAttributeValue(op.after[name])}`);
      return [header, ...attrs];
    }
    case "update":
      return [`  ~ ${op.address}`, ...op.changes.map(renderChange)];
    case "destroy":
      if (op.replace) {
        return [`  -/+ ${op.address} (replace: destroy)`, ...(op.changes ?? []).map(renderChange)];
      }
      return [`  - ${op.address}`];
  }
}

function renderChange(change: AttributeChange): string {
  const after = change.unknown ? KNOWN_AFTER_APPLY : formatScalar(change.after);
  const forces = change.replaceTrigger ? " # forces replacement" : "";
  return `      ${change.attribute}: ${formatScalar(change.before)} → ${after}${forces}`;
}

function formatScalar(value: ScalarValue | undefined): string {
  if (value === undefined) return "null";
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

// =============================================================================
// Saved Plans
// =============================================================================

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const attributeValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("string"), value: z.string() }),
  z.object({ kind: z.literal("number"), value: z.number() }),
  z.object({ kind: z.literal("bool"), value: z.boolean() }),
  z.object({ kind: z.literal("ref"), target: z.string(), attribute: z.string() }),
]);

const attributeChangeSchema = z
  .object({
    attribute: z.string(),
    before: scalarSchema.optional(),
    after: scalarSchema.optional(),
    unknown: z.boolean(),
    replaceTrigger: z.boolean(),
  })
  .transform(
    (c): AttributeChange => ({
      attribute: c.attribute,
      before: c.before,
      after: c.after,
      unknown: c.unknown,
      replaceTrigger: c.replaceTrigger,
    }),
  );

const operationSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("create"),
    address: z.string(),
    type: z.string(),
    before: z.null(),
    after: z.record(z.string(), attributeValueSchema),
    replace: z.boolean(),
  }),
  z.object({
    kind: z.literal("update"),
    address: z.string(),
    type: z.string(),
    before: z.record(z.string(), scalarSchema),
    after: z.record(z.string(), attributeValueSchema),
    changes: z.array(attributeChangeSchema),
  }),
  z.object({
    kind: z.literal("destroy"),
    address: z.string(),
    type: z.string(),
    before: z.record(z.string(), scalarSchema),
    after: z.null(),
    replace: z.boolean(),
    changes: z.array(attributeChangeSchema).optional(),
  }),
]);

const planEntrySchema = z
  .object({
    key: z.string(),
    address: z.string(),
    phase: z.enum(["destroy", "apply"]),
    operation: operationSchema,
  })
  .superRefine((entry, ctx) => {
    if (entry.key !== entryKey(entry.address, entry.phase)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `key must be "${entryKey(entry.address, entry.phase)}"` });
    }
    if (entry.operation.address !== entry.address) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "operation address does not match entry address" });
    }
    if ((entry.operation.kind === "destroy") !== (entry.phase === "destroy")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `a ${entry.operation.kind} cannot run in the ${entry.phase} phase` });
    }
  });

const executionPlanSchema = z.object({
  id: z.string().min(1),
  scope: z.string().min(1),
  baseVersion: z.number().int().nonnegative(),
  createdAt: z.string(),
  waves: z
    .array(z.object({ index: z.number().int().nonnegative(), entries: z.array(planEntrySchema).min(1) }))
    .superRefine((waves, ctx) => {
      waves.forEach((wave, i) => {
        if (wave.index !== i) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "index"], message: `expected ${i}` });
        }
      });
    }),
});

const savedPlanSchema = z.object({
  formatVersion: z.literal(SAVED_PLAN_FORMAT_VERSION),
  plan: executionPlanSchema,
});

/** Serialize a plan as the saved JSON artifact. */
export function serializePlan(plan: ExecutionPlan): string {
  return JSON.stringify({ formatVersion: SAVED_PLAN_FORMAT_VERSION, plan }, null, 2);
}

/**
 * Parse and validate a saved plan artifact.
 *
 * @throws ValidationError when the text is not a well-formed saved plan
 */
export function parsePlan(text: string): ExecutionPlan {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Saved plan is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = savedPlanSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      "Invalid saved plan",
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`),
    );
  }
  const plan: ExecutionPlan = result.data.plan;
  return deepFreeze(plan);
}
