import { z } from "zod";
import { fromZodError, insufficientStockError, notFoundError, validationError } from "../errors";
import type { IWarehouseRepository } from "../repositories/IWarehouseRepository";
import { nonNegativeNumberSchema, positiveIntSchema, requiredString } from "../schemas/common";
import type { AddStockResult, DeductStockResult, Product, StockChange } from "../types/inventory";

const addStockSchema = z.object({
  name: requiredString("El nombre del producto"),
  quantity: positiveIntSchema,
  purchasePrice: nonNegativeNumberSchema,
  salePrice: nonNegativeNumberSchema,
});

const deductStockSchema = z.object({
  name: requiredString("El nombre del producto"),
  quantity: positiveIntSchema,
});

/**
 * Stock of one named location. Every call starts from the stored state and
 * every mutation is written back before it returns.
 */
export class Warehouse {
  constructor(
    readonly name: string,
    private readonly repository: IWarehouseRepository
  ) {}

  exists(): Promise<boolean> {
    return this.repository.warehouseExists(this.name);
  }

  listProducts(): Promise<Product[]> {
    return this.repository.loadProducts(this.name);
  }

  async find(productName: string): Promise<Product> {
    const products = await this.repository.loadProducts(this.name);
    const product = products.find((item) => item.name === productName);
    if (!product) {
      throw notFoundError(`Producto '${productName}'`);
    }
    return { ...product };
  }

  /**
   * Adds stock for `productName`. An existing entry keeps accumulating quantity and
   * takes the prices of this call; an unknown name becomes a new entry.
   */
  async addStock(
    productName: string,
    quantity: number,
    purchasePrice: number,
    salePrice: number
  ): Promise<AddStockResult> {
    const parsed = addStockSchema.safeParse({ name: productName, quantity, purchasePrice, salePrice });
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const input = parsed.data;

    const products = await this.repository.loadProducts(this.name);
    const existing = products.find((item) => item.name === input.name);

    let change: StockChange;
    let product: Product;
    if (existing) {
      const total = existing.quantity + input.quantity;
      if (!Number.isSafeInteger(total)) {
        throw validationError("La cantidad total excede el máximo permitido", {
          quantity: ["La cantidad total excede el máximo permitido"],
        });
      }
      const repriced = existing.purchasePrice !== input.purchasePrice || existing.salePrice !== input.salePrice;
      existing.quantity = total;
      existing.purchasePrice = input.purchasePrice;
      existing.salePrice = input.salePrice;
      change = repriced ? "REPRICED" : "RESTOCKED";
      product = existing;
    } else {
      product = {
        name: input.name,
        quantity: input.quantity,
        purchasePrice: input.purchasePrice,
        salePrice: input.salePrice,
      };
      products.push(product);
      change = "CREATED";
    }

    await this.repository.saveProducts(this.name, products);
    return { product: { ...product }, change };
  }

  /**
   * Removes `quantity` units of `productName` and returns the unit prices in effect,
   * so the caller can price the sale without a second lookup.
   */
  async deductStock(productName: string, quantity: number): Promise<DeductStockResult> {
    const parsed = deductStockSchema.safeParse({ name: productName, quantity });
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const input = parsed.data;

    const products = await this.repository.loadProducts(this.name);
    const product = products.find((item) => item.name === input.name);
    if (!product) {
      throw notFoundError(`Producto '${input.name}'`);
    }
    if (input.quantity > product.quantity) {
      throw insufficientStockError(product.name, product.quantity, input.quantity);
    }

    product.quantity -= input.quantity;
    await this.repository.saveProducts(this.name, products);

    return {
      purchasePrice: product.purchasePrice,
      salePrice: product.salePrice,
      remainingQuantity: product.quantity,
    };
  }
}
