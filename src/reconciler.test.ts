/**
 * Reconciler: Unit Tests
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { createFakeRegistry, FakeCloud, networkSchema } from "../test/fake-provider.js";
import { getDefaultConfig } from "./config.js";
import { LockHeldError, StalePlanError, ValidationError } from "./errors.js";
import { parsePlan, serializePlan } from "./plan/render.js";
import { summarizePlan } from "./plan/scheduler.js";
import { createBuiltinRegistry } from "./providers/builtin.js";
import { ProviderRegistry } from "./providers/registry.js";
import { createReconciler, Reconciler } from "./reconciler.js";
import { InMemoryStateStorage } from "./state/storage.js";
import { StateStore } from "./state/store.js";

const desired = {
  resources: [
    { type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } },
    { type: "instance", name: "web", attributes: { network_id: "${network.main.id}", size: "small" } },
  ],
};

let cloud: FakeCloud;
let store: StateStore;
let reconciler: Reconciler;

beforeEach(() => {
  cloud = new FakeCloud();
  store = new StateStore(new InMemoryStateStorage(), { heartbeat: false });
  reconciler = new Reconciler({
    registry: createFakeRegistry(cloud),
    store,
    retry: { minDelayMs: 1, maxDelayMs: 5 },
  });
});

// =============================================================================
// plan / apply
// =============================================================================

describe("Reconciler.plan", () => {
  it("plans against the latest snapshot without taking the lock", async () => {
    const { plan, changeSet, snapshot } = await reconciler.plan(desired, "prod");

    expect(snapshot).toBeNull();
    expect(changeSet.baseVersion).toBe(0);
    expect(plan.scope).toBe("prod");
    expect(summarizePlan(plan)).toEqual({ creates: 2, updates: 0, destroys: 0, replaces: 0, waves: 2 });
    expect(await store.getLock("prod")).toBeNull();
    expect(cloud.calls).toEqual([]);
  });
});

describe("Reconciler.apply", () => {
  it("applies the document and converges", async () => {
    const { report } = await reconciler.apply(desired, "prod");

    expect(report.status).toBe("applied");
    expect(report.finalVersion).toBe(3);
    expect(cloud.calls).toEqual(["create:network.main", "create:instance.web"]);

    const snapshot = await store.readSnapshot("prod");
    expect(snapshot?.complete).toBe(true);
    expect(snapshot?.resources["instance.web"].attributes).toEqual({ network_id: "network-1", size: "small" });

    const again = await reconciler.plan(desired, "prod");
    expect(again.plan.waves).toEqual([]);
    expect(await store.getLock("prod")).toBeNull();
  });

  it("fails fast while another holder has the scope", async () => {
    await store.acquireLock("prod", { holder: "ci-runner" });

    await expect(reconciler.apply(desired, "prod")).rejects.toBeInstanceOf(LockHeldError);
    expect(cloud.calls).toEqual([]);
  });

  it("releases the lock when the document is invalid", async () => {
    const invalid = { resources: [{ type: "bucket", name: "logs" }] };

    await expect(reconciler.apply(invalid, "prod")).rejects.toBeInstanceOf(ValidationError);
    expect(await store.getLock("prod")).toBeNull();
  });

  it("resumes after a partial failure with the remaining changes only", async () => {
    cloud.failNext("instance.web", new Error("quota exceeded"));

    const first = await reconciler.apply(desired, "prod");
    expect(first.report.status).toBe("partially-applied");

    const second = await reconciler.apply(desired, "prod");
    expect(second.report.status).toBe("applied");
    expect(second.report.operations.map((op) => op.key)).toEqual(["instance.web#apply"]);
    expect(cloud.calls).toEqual(["create:network.main", "create:instance.web", "create:instance.web"]);
  });

  it("reports a cancelled run and releases the lock", async () => {
    const controller = new AbortController();
    controller.abort();

    const { report } = await reconciler.apply(desired, "prod", { signal: controller.signal });

    expect(report.status).toBe("cancelled");
    expect(report.operations.every((op) => op.status === "skipped")).toBe(true);
    expect(await store.getLock("prod")).toBeNull();
  });
});

// =============================================================================
// Saved plans
// =============================================================================

describe("saved plans", () => {
  it("applies a saved plan that still matches", async () => {
    const { plan } = await reconciler.plan(desired, "prod");
    const saved = parsePlan(serializePlan(plan));

    const result = await reconciler.apply(desired, "prod", { savedPlan: saved });

    expect(result.plan.id).toBe(plan.id);
    expect(result.report.planId).toBe(plan.id);
    expect(result.report.status).toBe("applied");
  });

  it("rejects a saved plan once the state has moved on", async () => {
    const { plan } = await reconciler.plan(desired, "prod");
    await reconciler.apply(desired, "prod");

    await expect(reconciler.apply(desired, "prod", { savedPlan: plan })).rejects.toThrow(
      `Saved plan ${plan.id} was computed against version 0; scope "prod" is at version 3`,
    );
    expect(await store.getLock("prod")).toBeNull();
  });

  it("rejects a saved plan for another scope", async () => {
    const { plan } = await reconciler.plan(desired, "staging");
    await expect(reconciler.apply(desired, "prod", { savedPlan: plan })).rejects.toBeInstanceOf(StalePlanError);
  });

  it("rejects a saved plan when the document changed", async () => {
    const { plan } = await reconciler.plan(desired, "prod");
    const changed = {
      resources: [
        desired.resources[0],
        { type: "instance", name: "web", attributes: { network_id: "${network.main.id}", size: "large" } },
      ],
    };

    await expect(reconciler.apply(changed, "prod", { savedPlan: plan })).rejects.toThrow(
      `Saved plan ${plan.id} no longer matches the desired state; plan again`,
    );
    expect(cloud.calls).toEqual([]);
  });
});

// =============================================================================
// destroyAll / verify
// =============================================================================

describe("Reconciler.destroyAll", () => {
  it("destroys dependents before their dependencies", async () => {
    await reconciler.apply(desired, "prod");

    const { report } = await reconciler.destroyAll("prod");

    expect(report.status).toBe("applied");
    expect(cloud.calls.slice(2)).toEqual(["destroy:instance.web", "destroy:network.main"]);
    expect(cloud.resources.size).toBe(0);
    expect((await store.readSnapshot("prod"))?.resources).toEqual({});
  });
});

describe("Reconciler.verify", () => {
  it("reports every recorded resource in sync after apply", async () => {
    await reconciler.apply(desired, "prod");

    const report = await reconciler.verify("prod");

    expect(report.version).toBe(3);
    expect(report.findings).toEqual([
      { address: "instance.web", status: "in-sync" },
      { address: "network.main", status: "in-sync" },
    ]);
  });

  it("reports missing, diverged and unreadable resources without writing state", async () => {
    await reconciler.apply(desired, "prod");
    cloud.resources.delete("network-1");
    cloud.resources.set("instance-2", {
      type: "instance",
      attributes: { network_id: "network-1", size: "large", ip: "10.0.0.2" },
    });

    const report = await reconciler.verify("prod");

    expect(report.findings).toEqual([
      {
        address: "instance.web",
        status: "diverged",
        differences: [{ attribute: "size", recorded: "small", actual: "large" }],
      },
      { address: "network.main", status: "missing" },
    ]);

    cloud.failNext("network.main", new Error("access denied"));
    const unreadable = await reconciler.verify("prod");
    expect(unreadable.findings[1]).toEqual({ address: "network.main", status: "unreadable", error: "access denied" });
    expect((await store.listVersions("prod")).length).toBe(3);
  });

  it("marks resources whose handler cannot read as unsupported", async () => {
    const writeOnly = new Reconciler({
      registry: new ProviderRegistry([
        {
          type: "network",
          schema: networkSchema,
          create: async (attributes) => ({ externalId: "net-1", attributes }),
          update: async (externalId, attributes) => ({ externalId, attributes }),
          destroy: async () => {},
        },
      ]),
      store,
    });
    await writeOnly.apply({ resources: [desired.resources[0]] }, "prod");

    const report = await writeOnly.verify("prod");

    expect(report.findings).toEqual([{ address: "network.main", status: "unsupported" }]);
  });

  it("returns no findings for an empty scope", async () => {
    const report = await reconciler.verify("empty");
    expect(report).toMatchObject({ scope: "empty", version: 0, findings: [] });
  });
});

// =============================================================================
// Built-in provider round trip
// =============================================================================

describe("built-in provider round trip", () => {
  it("writes a file whose content references a generated id", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "converge-reconcile-"));
    const file = path.join(dir, "out", "suffix.txt");
    const config = getDefaultConfig();
    config.state.backend = "memory";
    const builtin = createReconciler(config, createBuiltinRegistry());
    await builtin.store.initialize();

    const document = {
      resources: [
        { type: "random_id", name: "suffix", attributes: { byte_length: 4 } },
        { type: "local_file", name: "out", attributes: { path: file, content: "${random_id.suffix.hex}" } },
      ],
    };

    try {
      const { report } = await builtin.apply(document, "dev");
      expect(report.status).toBe("applied");

      const snapshot = await builtin.store.readSnapshot("dev");
      const hex = snapshot?.resources["random_id.suffix"].outputs.hex;
      expect(hex).toMatch(/^[0-9a-f]{8}$/);
      expect(await fs.readFile(file, "utf-8")).toBe(hex);

      expect((await builtin.plan(document, "dev")).plan.waves).toEqual([]);
      expect((await builtin.verify("dev")).findings.map((f) => f.status)).toEqual(["in-sync", "in-sync"]);

      await builtin.destroyAll("dev");
      await expect(fs.access(file)).rejects.toThrow();
    } finally {
      await builtin.store.close();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("converges when a dependent references a computed output of an updated file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "converge-reconcile-"));
    const config = getDefaultConfig();
    config.state.backend = "memory";
    const builtin = createReconciler(config, createBuiltinRegistry());
    await builtin.store.initialize();

    const documentFor = (content: string) => ({
      resources: [
        { type: "local_file", name: "a", attributes: { path: path.join(dir, "a.txt"), content } },
        { type: "null_resource", name: "b", attributes: { triggers: "${local_file.a.content_sha256}" } },
      ],
    });

    try {
      await builtin.apply(documentFor("v1"), "dev");

      const second = await builtin.apply(documentFor("v2"), "dev");
      expect(second.report.operations.map((op) => op.key)).toEqual([
        "local_file.a#apply",
        "null_resource.b#destroy",
        "null_resource.b#apply",
      ]);

      const snapshot = await builtin.store.readSnapshot("dev");
      expect(snapshot?.resources["null_resource.b"].attributes.triggers).toBe(
        snapshot?.resources["local_file.a"].outputs.content_sha256,
      );
      expect((await builtin.plan(documentFor("v2"), "dev")).changeSet.operations.map((op) => op.kind)).toEqual([
        "noop",
        "noop",
      ]);
    } finally {
      await builtin.store.close();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
