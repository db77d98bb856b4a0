import { describe, expect, it } from "vitest";
import { createFakeRegistry, FakeCloud, fakeHandler, instanceSchema, networkSchema } from "../../test/fake-provider.js";
import { ValidationError } from "../errors.js";
import { ProviderRegistry } from "./registry.js";

describe("ProviderRegistry", () => {
  it("looks up handlers and schemas by type", () => {
    const registry = createFakeRegistry();

    expect(registry.listTypes()).toEqual(["instance", "network"]);
    expect(registry.has("network")).toBe(true);
    expect(registry.getSchema("instance")).toBe(instanceSchema);
    expect(registry.get("bucket")).toBeUndefined();
  });

  it("rejects an unknown type on require", () => {
    expect(() => new ProviderRegistry().require("bucket")).toThrow('No handler registered for resource type "bucket"');
  });

  it("rejects duplicate registrations", () => {
    const cloud = new FakeCloud();
    const registry = new ProviderRegistry([fakeHandler(networkSchema, cloud)]);
    expect(() => registry.register(fakeHandler(networkSchema, cloud))).toThrow(ValidationError);
  });

  it("rejects a handler whose schema names another type", () => {
    const handler = { ...fakeHandler(networkSchema, new FakeCloud()), type: "subnet" };
    expect(() => new ProviderRegistry([handler])).toThrow(
      'Handler for "subnet" declares a schema for "network"',
    );
  });
});
