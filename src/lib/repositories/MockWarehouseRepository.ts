import type { Product } from "../types/inventory";
import type { IWarehouseRepository } from "./IWarehouseRepository";

const cloneProduct = (product: Product): Product => ({ ...product }) satisfies Product;

/** In-memory warehouses, used when MOCK_DATA is on and by the service tests. */
export class MockWarehouseRepository implements IWarehouseRepository {
  private readonly warehouses = new Map<string, Product[]>();

  constructor(seed: Record<string, Product[]> = {}) {
    for (const [name, products] of Object.entries(seed)) {
      this.warehouses.set(name, products.map(cloneProduct));
    }
  }

  async listWarehouses(): Promise<string[]> {
    return [...this.warehouses.keys()].sort((a, b) => a.localeCompare(b));
  }

  async warehouseExists(name: string): Promise<boolean> {
    return this.warehouses.has(name);
  }

  async loadProducts(name: string): Promise<Product[]> {
    return (this.warehouses.get(name) ?? []).map(cloneProduct);
  }

  async saveProducts(name: string, products: readonly Product[]): Promise<void> {
    this.warehouses.set(name, products.map(cloneProduct));
  }
}
