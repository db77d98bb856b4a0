/**
 * Providers Module Index
 */

export { ProviderRegistry } from "./registry.js";
export {
  builtinHandlers,
  createBuiltinRegistry,
  localFileHandler,
  localFileSchema,
  nullResourceHandler,
  nullResourceSchema,
  randomIdHandler,
  randomIdSchema,
} from "./builtin.js";
