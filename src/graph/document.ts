/**
 * Desired-State Document
 *
 * Parses and validates the JSON document that declares resources, and
 * recognizes `${type.name.attribute}` references inside attribute values.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { AttributeValue, ScalarValue } from "../types.js";

// =============================================================================
// Schemas
// =============================================================================

const TYPE_PATTERN = /^[a-z][a-z0-9_]*$/;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const ATTRIBUTE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const REFERENCE_REGEX = /^\$\{([a-z][a-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_-]*)\.([A-Za-z_][A-Za-z0-9_]*)\}$/;

const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const resourceDeclarationSchema = z.object({
  type: z.string().regex(TYPE_PATTERN, "must be lowercase letters, digits and underscores"),
  name: z.string().regex(NAME_PATTERN, "must start with a letter or underscore"),
  attributes: z
    .record(z.string().regex(ATTRIBUTE_PATTERN, "invalid attribute name"), scalarSchema)
    .default({}),
  dependsOn: z.array(z.string()).default([]),
});

export const desiredStateDocumentSchema = z.object({
  version: z.literal(1).default(1),
  resources: z.array(resourceDeclarationSchema),
});

export type ResourceDeclaration = z.infer<typeof resourceDeclarationSchema>;
export type DesiredStateDocument = z.infer<typeof desiredStateDocumentSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a desired-state document given as JSON text or an already-parsed value.
 */
export function parseDocument(input: unknown): DesiredStateDocument {
  let raw = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw new ValidationError(`Desired-state document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const result = desiredStateDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ValidationError("Invalid desired-state document", issues);
  }
  return result.data;
}

/** Read and validate a desired-state document from disk. */
export function loadDocument(filePath: string): DesiredStateDocument {
  return parseDocument(fs.readFileSync(filePath, "utf-8"));
}

// =============================================================================
// References
// =============================================================================

export function formatAddress(type: string, name: string): string {
  return `${type}.${name}`;
}

/** Check whether a string is a whole-value `${type.name.attribute}` reference. */
export function isReference(value: string): boolean {
  return REFERENCE_REGEX.test(value);
}

/** Turn a declared scalar into its tagged attribute value. */
export function toAttributeValue(value: ScalarValue): AttributeValue {
  if (typeof value === "string") {
    const match = REFERENCE_REGEX.exec(value);
    if (match) {
      return { kind: "ref", target: formatAddress(match[1], match[2]), attribute: match[3] };
    }
    return { kind: "string", value };
  }
  if (typeof value === "number") return { kind: "number", value };
  return { kind: "bool", value };
}

/** Inverse of `toAttributeValue`, used when rendering plans. */
export function formatAttributeValue(value: AttributeValue): string {
  switch (value.kind) {
    case "ref":
      return `\${${value.target}.${value.attribute}}`;
    case "string":
      return JSON.stringify(value.value);
    case "number":
    case "bool":
      return String(value.value);
  }
}
