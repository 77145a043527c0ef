import path from "path";
import type { StorageConfig } from "../env";
import { SALE_TABLE } from "../storage/tables";
import { TabularStore } from "../storage/TabularStore";
import type { SaleRecord } from "../types/inventory";
import type { ISaleRepository } from "./ISaleRepository";

export class SaleRepository implements ISaleRepository {
  readonly filePath: string;

  constructor(
    storage: StorageConfig,
    private readonly store: TabularStore = new TabularStore({ delimiter: storage.delimiter })
  ) {
    this.filePath = path.join(storage.dataDir, `${storage.salesFileName}.${storage.extension}`);
  }

  loadSales(): Promise<SaleRecord[]> {
    return this.store.load(this.filePath, SALE_TABLE);
  }

  saveSales(sales: readonly SaleRecord[]): Promise<void> {
    return this.store.save(this.filePath, SALE_TABLE, sales);
  }
}
