/**
 * Plan Rendering & Saved Plans: Unit Tests
 */

import { describe, it, expect } from "vitest";
import { createFakeRegistry, makeRecord, makeSnapshot } from "../../test/fake-provider.js";
import { diff } from "../diff/diff.js";
import { ValidationError } from "../errors.js";
import { buildGraph } from "../graph/builder.js";
import type { StateSnapshot } from "../types.js";
import { parsePlan, renderPlan, serializePlan } from "./render.js";
import { schedule } from "./scheduler.js";

const registry = createFakeRegistry();

const network = { type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } };
const web = { type: "instance", name: "web", attributes: { network_id: "${network.main.id}", size: "small" } };

const applied = makeSnapshot([
  makeRecord("network.main", { attributes: { cidr: "10.0.0.0/16" } }),
  makeRecord("instance.web", { attributes: { network_id: "main-id", size: "small" }, dependencies: ["network.main"] }),
]);

function planFor(resources: unknown[], snapshot: StateSnapshot | null) {
  const graph = buildGraph({ resources }, registry);
  return schedule(diff(graph, snapshot, registry, "prod"), graph, snapshot, {
    id: "plan-1",
    now: () => new Date("2024-01-01T00:00:00.000Z"),
  });
}

describe("renderPlan", () => {
  it("lists creates per wave with their declared attributes", () => {
    expect(renderPlan(planFor([network, web], null))).toBe(
      [
        'Plan plan-1 for scope "prod" (base version 0)',
        "",
        "Wave 0:",
        "  + network.main",
        '      cidr = "10.0.0.0/16"',
        "",
        "Wave 1:",
        "  + instance.web",
        "      network_id = ${network.main.id}",
        '      size = "small"',
        "",
        "Plan: 2 to create, 0 to update, 0 to destroy, 0 to replace.",
      ].join("\n"),
    );
  });

  it("shows attribute changes of updates", () => {
    const text = renderPlan(
      planFor([network, { ...web, attributes: { network_id: "${network.main.id}", size: "large" } }], applied),
    );
    expect(text.split("\n").slice(2, 5)).toEqual(["Wave 0:", "  ~ instance.web", '      size: "small" → "large"']);
  });

  it("marks replacements and unknown values", () => {
    const text = renderPlan(planFor([{ ...network, attributes: { cidr: "10.1.0.0/16" } }, web], applied));
    const lines = text.split("\n");

    expect(lines).toContain("  -/+ network.main (replace: destroy)");
    expect(lines).toContain('      cidr: "10.0.0.0/16" → "10.1.0.0/16" # forces replacement');
    expect(lines).toContain('      network_id: "main-id" → (known after apply) # forces replacement');
    expect(lines).toContain("  -/+ instance.web (replace: create)");
    expect(lines[lines.length - 1]).toBe("Plan: 0 to create, 0 to update, 0 to destroy, 2 to replace.");
  });

  it("shows plain destroys", () => {
    const lines = renderPlan(planFor([network], applied)).split("\n");
    expect(lines.slice(2, 4)).toEqual(["Wave 0:", "  - instance.web"]);
  });

  it("says so when there is nothing to do", () => {
    expect(renderPlan(planFor([network, web], applied))).toBe(
      ['Plan plan-1 for scope "prod" (base version 1)', "", "No changes. Infrastructure matches the desired state."].join(
        "\n",
      ),
    );
  });
});

describe("saved plans", () => {
  it("parses what it serializes", () => {
    const plan = planFor([{ ...network, attributes: { cidr: "10.1.0.0/16" } }, web], applied);
    const parsed = parsePlan(serializePlan(plan));

    expect(parsed).toEqual(plan);
    expect(Object.isFrozen(parsed.waves[0])).toBe(true);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parsePlan("{")).toThrow(ValidationError);
  });

  it("rejects an unknown format version", () => {
    const saved = JSON.parse(serializePlan(planFor([network], null)));
    saved.formatVersion = 2;
    expect(() => parsePlan(JSON.stringify(saved))).toThrow("Invalid saved plan");
  });

  it("rejects an entry whose key does not match its address", () => {
    const saved = JSON.parse(serializePlan(planFor([network], null)));
    saved.plan.waves[0].entries[0].key = "network.other#apply";

    let caught: unknown;
    try {
      parsePlan(JSON.stringify(saved));
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof ValidationError ? caught.issues : []).toEqual([
      'plan.waves.0.entries.0: key must be "network.main#apply"',
    ]);
  });
});
