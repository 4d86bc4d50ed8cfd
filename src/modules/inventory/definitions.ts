import type { ItemCategory } from "@/modules/character/config";

export type ItemName = string;

export type ItemDefinition = {
    id: string;
    name: ItemName;
    category: ItemCategory;
    description?: string;
    /** Extra carrying slots per unit held (containers only). */
    bonusSlots?: number;
};

/** Resolves item definitions by display name. */
export interface ItemCatalog {
    get(name: ItemName): ItemDefinition | null;
    list(): readonly ItemDefinition[];
}

export type InventoryState = {
    /** Item name -> quantity (always >= 1). */
    items: Record<ItemName, number>;
    baseSlots: number;
    bonusSlots: number;
};

/**
 * Build a catalog keyed by item name.
 * @throws Error on duplicate names.
 */
export function createItemCatalog(definitions: readonly ItemDefinition[]): ItemCatalog {
    const byName = new Map<ItemName, ItemDefinition>();
    for (const definition of definitions) {
        if (byName.has(definition.name)) {
            throw new Error(`Duplicate item name '${definition.name}'`);
        }
        byName.set(definition.name, definition);
    }
    const all = Object.freeze([...byName.values()]);
    return {
        get: (name) => byName.get(name) ?? null,
        list: () => all,
    };
}

export const EMPTY_ITEM_CATALOG: ItemCatalog = createItemCatalog([]);
