/**
 * Diff Module Index
 */

export { type Resolution, DEFAULT_SCOPE, diff, hasChanges, resolveValue } from "./diff.js";
