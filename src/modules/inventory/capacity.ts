/**
 * Inventory Capacity.
 *
 * Purpose: Single source of truth for carrying-slot accounting.
 * Context: Consulted on every add/remove; containers grow capacity as a side effect.
 * Dependencies: Item catalog and slot-cost configuration.
 * Invariants:
 * - usedSlots <= baseSlots + bonusSlots is checked when adding, not lazily.
 * - Container quantity and bonusSlots always change together.
 * - Entries reaching zero quantity are deleted.
 */

import { INVENTORY_CONFIG } from "@/modules/character/config";
import {
  EMPTY_ITEM_CATALOG,
  type InventoryState,
  type ItemCatalog,
  type ItemDefinition,
  type ItemName,
} from "./definitions";

export type CapacityStats = {
  readonly usedSlots: number;
  readonly baseSlots: number;
  readonly bonusSlots: number;
  readonly totalSlots: number;
  readonly availableSlots: number;
  readonly slotsExceeded: boolean;
};

const isPositiveQuantity = (quantity: number): boolean =>
  Number.isInteger(quantity) && quantity > 0;

const containerBonus = (definition: ItemDefinition | null): number =>
  definition?.category === "container" ? definition.bonusSlots ?? 0 : 0;

export class InventoryCapacityModel {
  constructor(
    private readonly state: InventoryState,
    private readonly catalog: ItemCatalog = EMPTY_ITEM_CATALOG,
  ) {}

  /** Empty inventory with the given base capacity. */
  static create(baseSlots: number, catalog?: ItemCatalog): InventoryCapacityModel {
    return new InventoryCapacityModel({ items: {}, baseSlots, bonusSlots: 0 }, catalog);
  }

  /** Slots one unit of the item occupies. Unknown items cost the default. */
  slotCost(name: ItemName): number {
    const definition = this.catalog.get(name);
    if (!definition) return INVENTORY_CONFIG.defaultSlotCost;
    return INVENTORY_CONFIG.slotCost[definition.category];
  }

  get usedSlots(): number {
    let used = 0;
    for (const [name, quantity] of Object.entries(this.state.items)) {
      used += this.slotCost(name) * quantity;
    }
    return used;
  }

  get totalSlots(): number {
    return this.state.baseSlots + this.state.bonusSlots;
  }

  get availableSlots(): number {
    return this.totalSlots - this.usedSlots;
  }

  quantityOf(name: ItemName): number {
    return this.state.items[name] ?? 0;
  }

  canAdd(name: ItemName, quantity = 1): boolean {
    if (!isPositiveQuantity(quantity)) return false;
    return this.slotCost(name) * quantity <= this.availableSlots;
  }

  /** Add items; returns false (and changes nothing) when they do not fit. */
  add(name: ItemName, quantity = 1): boolean {
    if (!this.canAdd(name, quantity)) return false;

    this.state.items[name] = this.quantityOf(name) + quantity;
    this.state.bonusSlots += containerBonus(this.catalog.get(name)) * quantity;
    return true;
  }

  /**
   * Remove items; returns false when fewer are held.
   * Dropping a container can leave the inventory over capacity (see `stats()`).
   */
  remove(name: ItemName, quantity = 1): boolean {
    if (!isPositiveQuantity(quantity)) return false;

    const held = this.quantityOf(name);
    if (quantity > held) return false;

    const lostBonus = containerBonus(this.catalog.get(name)) * quantity;
    const remaining = held - quantity;
    if (remaining === 0) {
      delete this.state.items[name];
    } else {
      this.state.items[name] = remaining;
    }
    this.state.bonusSlots -= lostBonus;
    return true;
  }

  /** Follow a vigor change; may leave the inventory over capacity. */
  setBaseSlots(baseSlots: number): void {
    this.state.baseSlots = Math.max(0, Math.floor(baseSlots));
  }

  stats(): CapacityStats {
    const usedSlots = this.usedSlots;
    const totalSlots = this.totalSlots;
    return {
      usedSlots,
      baseSlots: this.state.baseSlots,
      bonusSlots: this.state.bonusSlots,
      totalSlots,
      availableSlots: totalSlots - usedSlots,
      slotsExceeded: usedSlots > totalSlots,
    };
  }

  /** Copy of the underlying state for persistence. */
  snapshot(): InventoryState {
    return {
      items: { ...this.state.items },
      baseSlots: this.state.baseSlots,
      bonusSlots: this.state.bonusSlots,
    };
  }
}
