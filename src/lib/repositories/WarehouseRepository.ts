import { readdir } from "fs/promises";
import path from "path";
import type { StorageConfig } from "../env";
import { isErrnoException, storageError } from "../errors";
import { PRODUCT_TABLE } from "../storage/tables";
import { TabularStore } from "../storage/TabularStore";
import type { Product } from "../types/inventory";
import type { IWarehouseRepository } from "./IWarehouseRepository";

/** One delimited file per warehouse, `<dataDir>/<name>.<extension>`. */
export class WarehouseRepository implements IWarehouseRepository {
  constructor(
    private readonly storage: StorageConfig,
    private readonly store: TabularStore = new TabularStore({ delimiter: storage.delimiter })
  ) {}

  filePath(name: string): string {
    return path.join(this.storage.dataDir, `${name}.${this.storage.extension}`);
  }

  async listWarehouses(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.storage.dataDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw storageError(this.storage.dataDir, error);
    }

    const suffix = `.${this.storage.extension}`;
    const salesFile = `${this.storage.salesFileName}${suffix}`.toLowerCase();
    return entries
      .filter((entry) => entry.toLowerCase().endsWith(suffix) && entry.toLowerCase() !== salesFile)
      .map((entry) => entry.slice(0, -suffix.length))
      .filter((name) => name.length > 0)
      .sort((a, b) => a.localeCompare(b));
  }

  warehouseExists(name: string): Promise<boolean> {
    return this.store.exists(this.filePath(name));
  }

  loadProducts(name: string): Promise<Product[]> {
    return this.store.load(this.filePath(name), PRODUCT_TABLE);
  }

  saveProducts(name: string, products: readonly Product[]): Promise<void> {
    return this.store.save(this.filePath(name), PRODUCT_TABLE, products);
  }
}
