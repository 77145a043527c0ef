import type { SaleRecord } from "../types/inventory";
import type { ISaleRepository } from "./ISaleRepository";

const cloneSale = (sale: SaleRecord): SaleRecord => ({ ...sale, timestamp: new Date(sale.timestamp.getTime()) });

export class MockSaleRepository implements ISaleRepository {
  private sales: SaleRecord[];

  constructor(seed: SaleRecord[] = []) {
    this.sales = seed.map(cloneSale);
  }

  async loadSales(): Promise<SaleRecord[]> {
    return this.sales.map(cloneSale);
  }

  async saveSales(sales: readonly SaleRecord[]): Promise<void> {
    this.sales = sales.map(cloneSale);
  }
}
