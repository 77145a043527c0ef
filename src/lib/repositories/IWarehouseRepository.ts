import type { Product } from "../types/inventory";

export interface IWarehouseRepository {
  /** Names of every stored warehouse, sorted. */
  listWarehouses(): Promise<string[]>;
  warehouseExists(name: string): Promise<boolean>;
  /** Products of `name` in stored order; an unknown warehouse has none. */
  loadProducts(name: string): Promise<Product[]>;
  saveProducts(name: string, products: readonly Product[]): Promise<void>;
}
