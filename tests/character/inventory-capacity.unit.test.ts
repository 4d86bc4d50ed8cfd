/**
 * Inventory Capacity Unit Tests.
 *
 * Purpose: Slot costs by category, container bonuses, and all-or-nothing add/remove.
 */
import { describe, it, expect } from "vitest";
import { InventoryCapacityModel } from "@/modules/inventory/capacity";
import { createItemCatalog } from "@/modules/inventory/definitions";

const catalog = createItemCatalog([
  { id: "winchester_rifle", name: "Winchester Rifle", category: "heavy_firearm" },
  { id: "colt_revolver", name: "Colt Revolver", category: "sidearm" },
  { id: "leather_duster", name: "Leather Duster", category: "armor" },
  { id: "backpack", name: "Backpack", category: "container", bonusSlots: 6 },
  { id: "canteen", name: "Canteen", category: "gear" },
]);

function packedInventory(): InventoryCapacityModel {
  const inventory = InventoryCapacityModel.create(5, catalog);
  inventory.add("Canteen", 5);
  return inventory;
}

describe("InventoryCapacityModel", () => {
  it("should cost slots by category", () => {
    const inventory = InventoryCapacityModel.create(10, catalog);

    expect(inventory.slotCost("Winchester Rifle")).toBe(3);
    expect(inventory.slotCost("Colt Revolver")).toBe(2);
    expect(inventory.slotCost("Leather Duster")).toBe(2);
    expect(inventory.slotCost("Backpack")).toBe(0);
    expect(inventory.slotCost("Canteen")).toBe(1);
    expect(inventory.slotCost("Mystery Box")).toBe(1);
  });

  it("should refuse additions that do not fit and change nothing", () => {
    const inventory = InventoryCapacityModel.create(10, catalog);

    expect(inventory.add("Winchester Rifle", 3)).toBe(true);
    expect(inventory.usedSlots).toBe(9);
    expect(inventory.canAdd("Colt Revolver")).toBe(false);
    expect(inventory.add("Colt Revolver")).toBe(false);
    expect(inventory.quantityOf("Colt Revolver")).toBe(0);
    expect(inventory.usedSlots).toBe(9);
    expect(inventory.add("Canteen")).toBe(true);
    expect(inventory.availableSlots).toBe(0);
  });

  it("should reject non-positive or fractional quantities", () => {
    const inventory = InventoryCapacityModel.create(10, catalog);

    expect(inventory.add("Canteen", 0)).toBe(false);
    expect(inventory.add("Canteen", 1.5)).toBe(false);
    inventory.add("Canteen", 2);
    expect(inventory.remove("Canteen", -1)).toBe(false);
    expect(inventory.remove("Canteen", 3)).toBe(false);
    expect(inventory.quantityOf("Canteen")).toBe(2);
  });

  it("should add a container to a full inventory and grow capacity", () => {
    const inventory = packedInventory();
    expect(inventory.availableSlots).toBe(0);

    expect(inventory.add("Backpack")).toBe(true);
    expect(inventory.stats()).toEqual({
      usedSlots: 5,
      baseSlots: 5,
      bonusSlots: 6,
      totalSlots: 11,
      availableSlots: 6,
      slotsExceeded: false,
    });
  });

  it("should reverse the bonus when an unused container is removed", () => {
    const inventory = packedInventory();
    inventory.add("Backpack");

    expect(inventory.remove("Backpack")).toBe(true);
    expect(inventory.snapshot()).toEqual({ items: { Canteen: 5 }, baseSlots: 5, bonusSlots: 0 });
  });

  it("should remove a container whose space is in use and report the overload", () => {
    const inventory = packedInventory();
    inventory.add("Backpack");
    inventory.add("Canteen", 3);

    expect(inventory.remove("Backpack")).toBe(true);
    expect(inventory.snapshot()).toEqual({ items: { Canteen: 8 }, baseSlots: 5, bonusSlots: 0 });
    expect(inventory.stats()).toMatchObject({
      usedSlots: 8,
      totalSlots: 5,
      availableSlots: -3,
      slotsExceeded: true,
    });
    expect(inventory.canAdd("Canteen")).toBe(false);
  });

  it("should scale container bonuses with quantity", () => {
    const inventory = InventoryCapacityModel.create(4, catalog);
    inventory.add("Backpack", 2);

    expect(inventory.totalSlots).toBe(16);
    expect(inventory.remove("Backpack")).toBe(true);
    expect(inventory.totalSlots).toBe(10);
  });

  it("should delete entries that reach zero", () => {
    const inventory = InventoryCapacityModel.create(10, catalog);
    inventory.add("Colt Revolver");
    inventory.remove("Colt Revolver");

    expect(inventory.snapshot().items).toEqual({});
  });

  it("should report overload when base slots shrink", () => {
    const inventory = InventoryCapacityModel.create(10, catalog);
    inventory.add("Winchester Rifle", 3);
    inventory.setBaseSlots(8);

    expect(inventory.stats()).toMatchObject({ usedSlots: 9, totalSlots: 8, availableSlots: -1, slotsExceeded: true });
    expect(inventory.canAdd("Backpack")).toBe(false);
  });
});
