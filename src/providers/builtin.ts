/**
 * Built-in Provider
 *
 * Resource types that need no cloud account:
 * - `random_id`: random bytes, hex-encoded
 * - `null_resource`: holds no infrastructure; re-created when its triggers change
 * - `local_file`: a file on the local disk
 */

import { createHash, randomBytes, randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FatalProviderError, TransientProviderError } from "../errors.js";
import type { HandlerContext, HandlerResult, ResolvedAttributes, ResourceHandler, ResourceTypeSchema } from "../types.js";
import { ProviderRegistry } from "./registry.js";

// =============================================================================
// Schemas
// =============================================================================

export const randomIdSchema: ResourceTypeSchema = {
  type: "random_id",
  schemaVersion: 1,
  attributes: {
    byte_length: { type: "number", required: true, replaceOnChange: true, description: "Number of random bytes" },
    prefix: { type: "string", replaceOnChange: true, description: "Prepended to the hex output" },
    hex: { type: "string", computed: true },
  },
};

export const nullResourceSchema: ResourceTypeSchema = {
  type: "null_resource",
  schemaVersion: 1,
  attributes: {
    triggers: { type: "string", replaceOnChange: true, description: "Any change re-creates the resource" },
  },
};

export const localFileSchema: ResourceTypeSchema = {
  type: "local_file",
  schemaVersion: 1,
  attributes: {
    path: { type: "string", required: true, replaceOnChange: true },
    content: { type: "string", required: true },
    content_sha256: { type: "string", computed: true },
  },
};

// =============================================================================
// random_id
// =============================================================================

export const randomIdHandler: ResourceHandler = {
  type: "random_id",
  schema: randomIdSchema,

  async create(attributes) {
    const byteLength = attributes.byte_length;
    if (typeof byteLength !== "number" || !Number.isInteger(byteLength) || byteLength < 1 || byteLength > 64) {
      throw new FatalProviderError(`byte_length must be an integer between 1 and 64, got ${String(byteLength)}`);
    }
    const prefix = typeof attributes.prefix === "string" ? attributes.prefix : "";
    const hex = `${prefix}${randomBytes(byteLength).toString("hex")}`;
    return { externalId: hex, attributes: { ...attributes, hex } };
  },

  async read(externalId, _ctx) {
    return { hex: externalId };
  },

  async update(externalId, attributes) {
    // Only replace-triggering inputs exist; nothing to change in place
    return { externalId, attributes: { ...attributes, hex: externalId } };
  },

  async destroy() {},
};

// =============================================================================
// null_resource
// =============================================================================

export const nullResourceHandler: ResourceHandler = {
  type: "null_resource",
  schema: nullResourceSchema,

  async create(attributes) {
    return { externalId: randomUUID(), attributes: { ...attributes } };
  },

  async update(externalId, attributes) {
    return { externalId, attributes: { ...attributes } };
  },

  async destroy() {},
};

// =============================================================================
// local_file
// =============================================================================

const TRANSIENT_FS_CODES = new Set(["EBUSY", "EAGAIN", "EMFILE", "ENFILE"]);

export const localFileHandler: ResourceHandler = {
  type: "local_file",
  schema: localFileSchema,

  async create(attributes, ctx) {
    return writeLocalFile(attributes, ctx);
  },

  async read(externalId) {
    try {
      const content = await fs.readFile(externalId, "utf-8");
      return { content, content_sha256: sha256(content) };
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw classifyFsError(err, `read ${externalId}`);
    }
  },

  async update(_externalId, attributes, _prior, ctx) {
    return writeLocalFile(attributes, ctx);
  },

  async destroy(externalId, _prior, ctx) {
    try {
      await fs.unlink(externalId);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw classifyFsError(err, `delete ${externalId}`);
      ctx.logger.debug("File already gone", { path: externalId });
    }
  },

  isRetryable(error) {
    return TRANSIENT_FS_CODES.has(errorCode(error) ?? "");
  },
};

async function writeLocalFile(attributes: ResolvedAttributes, ctx: HandlerContext): Promise<HandlerResult> {
  const { path: filePath, content } = attributes;
  if (typeof filePath !== "string" || typeof content !== "string") {
    throw new FatalProviderError("local_file needs string path and content");
  }
  const target = path.resolve(filePath);
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, { encoding: "utf-8", signal: ctx.signal });
  } catch (err) {
    throw classifyFsError(err, `write ${target}`);
  }
  ctx.logger.debug("File written", { path: target, bytes: Buffer.byteLength(content) });
  return { externalId: target, attributes: { ...attributes, content_sha256: sha256(content) } };
}

function sha256(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}

function classifyFsError(error: unknown, action: string): Error {
  const code = errorCode(error);
  const message = `Could not ${action}: ${error instanceof Error ? error.message : String(error)}`;
  if (code && TRANSIENT_FS_CODES.has(code)) return new TransientProviderError(message, { cause: error });
  return new FatalProviderError(message, { cause: error });
}

// =============================================================================
// Registry
// =============================================================================

export function builtinHandlers(): ResourceHandler[] {
  return [randomIdHandler, nullResourceHandler, localFileHandler];
}

/** Registry holding the built-in resource types. */
export function createBuiltinRegistry(): ProviderRegistry {
  return new ProviderRegistry(builtinHandlers());
}
