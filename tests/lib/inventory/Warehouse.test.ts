import { Warehouse } from "@/lib/inventory/Warehouse";
import { MockWarehouseRepository } from "@/lib/repositories/MockWarehouseRepository";

describe("Warehouse", () => {
  let repository: MockWarehouseRepository;
  let warehouse: Warehouse;

  beforeEach(() => {
    repository = new MockWarehouseRepository();
    warehouse = new Warehouse("store", repository);
  });

  it("creates a product on the first add and persists it", async () => {
    const result = await warehouse.addStock("Apples", 50, 0.8, 1.5);

    expect(result).toEqual({
      product: { name: "Apples", quantity: 50, purchasePrice: 0.8, salePrice: 1.5 },
      change: "CREATED",
    });
    await expect(repository.loadProducts("store")).resolves.toEqual([
      { name: "Apples", quantity: 50, purchasePrice: 0.8, salePrice: 1.5 },
    ]);
  });

  it("sums quantities and keeps the latest prices on repeated adds", async () => {
    await warehouse.addStock("Apples", 50, 0.8, 1.5);
    const result = await warehouse.addStock("Apples", 20, 0.9, 1.75);

    expect(result.change).toBe("REPRICED");
    await expect(warehouse.find("Apples")).resolves.toEqual({
      name: "Apples",
      quantity: 70,
      purchasePrice: 0.9,
      salePrice: 1.75,
    });
    await expect(warehouse.listProducts()).resolves.toHaveLength(1);
  });

  it("reports a plain restock when prices do not change", async () => {
    await warehouse.addStock("Apples", 50, 0.8, 1.5);
    const result = await warehouse.addStock("Apples", 5, 0.8, 1.5);

    expect(result).toEqual({
      product: { name: "Apples", quantity: 55, purchasePrice: 0.8, salePrice: 1.5 },
      change: "RESTOCKED",
    });
  });

  it("treats names as case-sensitive", async () => {
    await warehouse.addStock("Apples", 1, 0.8, 1.5);
    await warehouse.addStock("apples", 2, 0.8, 1.5);

    const names = (await warehouse.listProducts()).map((product) => product.name);
    expect(names).toEqual(["Apples", "apples"]);
  });

  it("keeps insertion order", async () => {
    await warehouse.addStock("Pears", 1, 1, 2);
    await warehouse.addStock("Apples", 1, 1, 2);
    await warehouse.addStock("Pears", 1, 1, 2);

    const names = (await warehouse.listProducts()).map((product) => product.name);
    expect(names).toEqual(["Pears", "Apples"]);
  });

  it.each([
    ["a zero quantity", 0, 0.8, 1.5, "quantity"],
    ["a fractional quantity", 1.5, 0.8, 1.5, "quantity"],
    ["a negative purchase price", 3, -0.1, 1.5, "purchasePrice"],
    ["a negative sale price", 3, 0.8, -1, "salePrice"],
    ["a non-finite price", 3, Number.POSITIVE_INFINITY, 1, "purchasePrice"],
  ])("rejects %s without touching storage", async (_label, quantity, purchasePrice, salePrice, field) => {
    const save = jest.spyOn(repository, "saveProducts");

    const error = await warehouse.addStock("Apples", quantity, purchasePrice, salePrice).catch((e: unknown) => e);

    expect(error).toMatchObject({ code: "VALIDATION_ERROR" });
    expect(error).toHaveProperty(["details", "fields", field]);
    expect(save).not.toHaveBeenCalled();
  });

  it("deducts stock and returns the unit prices", async () => {
    await warehouse.addStock("Apples", 50, 0.8, 1.5);

    await expect(warehouse.deductStock("Apples", 10)).resolves.toEqual({
      purchasePrice: 0.8,
      salePrice: 1.5,
      remainingQuantity: 40,
    });
    await expect(warehouse.find("Apples")).resolves.toMatchObject({ quantity: 40 });
  });

  it("keeps a product sold down to zero as a known entry", async () => {
    await warehouse.addStock("Apples", 5, 0.8, 1.5);
    await warehouse.deductStock("Apples", 5);

    await expect(warehouse.find("Apples")).resolves.toMatchObject({ name: "Apples", quantity: 0 });
  });

  it("refuses to deduct more than the stock on hand", async () => {
    await warehouse.addStock("Apples", 40, 0.8, 1.5);
    const save = jest.spyOn(repository, "saveProducts");

    await expect(warehouse.deductStock("Apples", 1000)).rejects.toMatchObject({
      code: "INSUFFICIENT_STOCK",
      details: { productName: "Apples", available: 40, requested: 1000 },
    });
    await expect(warehouse.find("Apples")).resolves.toMatchObject({ quantity: 40 });
    expect(save).not.toHaveBeenCalled();
  });

  it("fails with NOT_FOUND for an unknown product", async () => {
    await expect(warehouse.deductStock("Oranges", 5)).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Producto 'Oranges' no encontrado",
    });
    await expect(warehouse.find("Oranges")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects a non-positive deduction", async () => {
    await warehouse.addStock("Apples", 5, 0.8, 1.5);
    await expect(warehouse.deductStock("Apples", 0)).rejects.toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("starts every operation from the stored state", async () => {
    await warehouse.addStock("Apples", 5, 0.8, 1.5);
    await repository.saveProducts("store", [{ name: "Apples", quantity: 12, purchasePrice: 0.8, salePrice: 1.5 }]);

    await warehouse.addStock("Apples", 3, 0.8, 1.5);

    await expect(warehouse.find("Apples")).resolves.toMatchObject({ quantity: 15 });
  });

  it("does not leak its records to callers", async () => {
    await warehouse.addStock("Apples", 5, 0.8, 1.5);
    const found = await warehouse.find("Apples");
    found.quantity = 999;

    await expect(warehouse.find("Apples")).resolves.toMatchObject({ quantity: 5 });
  });

  it("exists only once something has been stored", async () => {
    await expect(warehouse.exists()).resolves.toBe(false);
    await warehouse.addStock("Apples", 1, 0.8, 1.5);
    await expect(warehouse.exists()).resolves.toBe(true);
  });
});
