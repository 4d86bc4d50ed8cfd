export * from "./modules/character";
export { InventoryCapacityModel } from "./modules/inventory/capacity";
export type { CapacityStats } from "./modules/inventory/capacity";
export { createItemCatalog, EMPTY_ITEM_CATALOG } from "./modules/inventory/definitions";
export type { InventoryState, ItemCatalog, ItemDefinition, ItemName } from "./modules/inventory/definitions";
export { loadContentPacks, ContentLoadError, DEFAULT_CONTENT_PACKS_DIR } from "./modules/content/loader";
export type { LoadedContentPacks } from "./modules/content/loader";
export { loadEnvConfig, EnvConfigError } from "./configuration/env";
export type { EnvConfig } from "./configuration/env";
export { Ok, Err, OkResult, ErrResult } from "./utils/result";
export type { Result } from "./utils/result";
