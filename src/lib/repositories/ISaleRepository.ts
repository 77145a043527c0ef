import type { SaleRecord } from "../types/inventory";

export interface ISaleRepository {
  loadSales(): Promise<SaleRecord[]>;
  saveSales(sales: readonly SaleRecord[]): Promise<void>;
}
