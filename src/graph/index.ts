/**
 * Resource Graph Module
 */

export { ResourceGraph } from "./graph.js";
export { buildGraph, validateAttributes, ID_ATTRIBUTE } from "./builder.js";
export {
  parseDocument,
  loadDocument,
  formatAddress,
  isReference,
  toAttributeValue,
  formatAttributeValue,
  desiredStateDocumentSchema,
  resourceDeclarationSchema,
  type DesiredStateDocument,
  type ResourceDeclaration,
} from "./document.js";
