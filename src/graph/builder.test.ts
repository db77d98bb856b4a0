/**
 * Resource Graph Builder: Unit Tests
 */

import { describe, it, expect } from "vitest";
import { createFakeRegistry } from "../../test/fake-provider.js";
import { CycleDetectedError, UnresolvedReferenceError, ValidationError } from "../errors.js";
import { buildGraph } from "./builder.js";
import { formatAttributeValue, parseDocument, toAttributeValue } from "./document.js";

const registry = createFakeRegistry();

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("buildGraph", () => {
  it("infers dependencies from references", () => {
    const graph = buildGraph(
      {
        resources: [
          { type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } },
          { type: "instance", name: "web", attributes: { network_id: "${network.main.id}", size: "small" } },
        ],
      },
      registry,
    );

    expect(graph.size).toBe(2);
    expect(graph.dependenciesOf("instance.web")).toEqual(["network.main"]);
    expect(graph.dependentsOf("network.main")).toEqual(["instance.web"]);
    expect(graph.getNode("instance.web")?.attributes.network_id).toEqual({
      kind: "ref",
      target: "network.main",
      attribute: "id",
    });
  });

  it("adds explicit dependsOn edges", () => {
    const graph = buildGraph(
      {
        resources: [
          { type: "network", name: "a", attributes: { cidr: "10.0.0.0/16" } },
          { type: "network", name: "b", attributes: { cidr: "10.1.0.0/16" }, dependsOn: ["network.a"] },
        ],
      },
      registry,
    );

    expect(graph.getNode("network.b")?.dependencies).toEqual(["network.a"]);
    expect(graph.topologicalOrder()).toEqual(["network.a", "network.b"]);
  });

  it("accepts references to computed attributes", () => {
    const graph = buildGraph(
      {
        resources: [
          { type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } },
          { type: "network", name: "peer", attributes: { cidr: "10.1.0.0/16", label: "${network.main.arn}" } },
        ],
      },
      registry,
    );
    expect(graph.dependenciesOf("network.peer")).toEqual(["network.main"]);
  });

  it("parses JSON text", () => {
    const graph = buildGraph(
      JSON.stringify({ resources: [{ type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } }] }),
      registry,
    );
    expect(graph.addresses()).toEqual(["network.main"]);
  });

  it("detects a cycle and names its members", () => {
    const err = catchError(() =>
      buildGraph(
        {
          resources: [
            { type: "network", name: "a", attributes: { cidr: "x", label: "${network.b.id}" } },
            { type: "network", name: "b", attributes: { cidr: "y", label: "${network.a.id}" } },
          ],
        },
        registry,
      ),
    );

    expect(err).toBeInstanceOf(CycleDetectedError);
    const cycle = err instanceof CycleDetectedError ? err.cycle : [];
    expect(cycle).toEqual(["network.a", "network.b", "network.a"]);
  });

  it("detects a self-dependency", () => {
    const err = catchError(() =>
      buildGraph(
        { resources: [{ type: "network", name: "a", attributes: { cidr: "x" }, dependsOn: ["network.a"] }] },
        registry,
      ),
    );
    expect(err instanceof CycleDetectedError ? err.cycle : null).toEqual(["network.a", "network.a"]);
  });

  it("rejects a reference to a missing resource", () => {
    const err = catchError(() =>
      buildGraph(
        {
          resources: [{ type: "instance", name: "web", attributes: { network_id: "${network.gone.id}", size: "s" } }],
        },
        registry,
      ),
    );

    expect(err).toBeInstanceOf(UnresolvedReferenceError);
    expect(err instanceof UnresolvedReferenceError ? [err.from, err.target, err.attribute] : []).toEqual([
      "instance.web",
      "network.gone",
      "id",
    ]);
  });

  it("rejects a reference to an attribute the target does not have", () => {
    expect(() =>
      buildGraph(
        {
          resources: [
            { type: "network", name: "main", attributes: { cidr: "10.0.0.0/16" } },
            { type: "instance", name: "web", attributes: { network_id: "${network.main.vpc}", size: "s" } },
          ],
        },
        registry,
      ),
    ).toThrow(UnresolvedReferenceError);
  });

  it("rejects a dependsOn entry for a missing resource", () => {
    expect(() =>
      buildGraph(
        { resources: [{ type: "network", name: "a", attributes: { cidr: "x" }, dependsOn: ["network.nope"] }] },
        registry,
      ),
    ).toThrow('Resource "network.a" references "network.nope", which does not exist');
  });

  it("collects every schema issue", () => {
    const err = catchError(() =>
      buildGraph(
        {
          resources: [
            { type: "network", name: "a", attributes: { label: "x" } },
            { type: "network", name: "a", attributes: { cidr: "y" } },
            { type: "instance", name: "web", attributes: { size: 2, ip: "1.2.3.4", colour: "red" } },
            { type: "bucket", name: "logs" },
          ],
        },
        registry,
      ),
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError ? err.issues : []).toEqual([
      'network.a: missing required attribute "cidr"',
      "network.a: declared more than once",
      'instance.web: attribute "size" must be string, got number',
      'instance.web: attribute "ip" is computed and cannot be set',
      'instance.web: unknown attribute "colour" for type "instance"',
      'bucket.logs: unknown resource type "bucket"',
    ]);
  });

  it("reports document shape errors with their path", () => {
    const err = catchError(() => buildGraph({ resources: [{ type: "Network", name: "a" }] }, registry));
    expect(err instanceof ValidationError ? err.issues : []).toEqual([
      "resources.0.type: must be lowercase letters, digits and underscores",
    ]);
  });

  it("rejects malformed JSON", () => {
    expect(() => buildGraph("{not json", registry)).toThrow(ValidationError);
  });
});

describe("document helpers", () => {
  it("only treats whole-string references as references", () => {
    expect(toAttributeValue("${network.main.id}")).toEqual({ kind: "ref", target: "network.main", attribute: "id" });
    expect(toAttributeValue("prefix-${network.main.id}")).toEqual({ kind: "string", value: "prefix-${network.main.id}" });
    expect(toAttributeValue(3)).toEqual({ kind: "number", value: 3 });
    expect(toAttributeValue(false)).toEqual({ kind: "bool", value: false });
  });

  it("formats attribute values for display", () => {
    expect(formatAttributeValue({ kind: "ref", target: "network.main", attribute: "id" })).toBe("${network.main.id}");
    expect(formatAttributeValue({ kind: "string", value: "a" })).toBe('"a"');
    expect(formatAttributeValue({ kind: "number", value: 2 })).toBe("2");
  });

  it("fills defaults", () => {
    expect(parseDocument({ resources: [{ type: "network", name: "a" }] })).toEqual({
      version: 1,
      resources: [{ type: "network", name: "a", attributes: {}, dependsOn: [] }],
    });
  });
});
