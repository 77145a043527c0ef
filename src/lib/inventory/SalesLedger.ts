import Decimal from "decimal.js";
import type { ISaleRepository } from "../repositories/ISaleRepository";
import type { SaleRecord } from "../types/inventory";
import { truncateToSeconds } from "../utils/date";

const copySale = (sale: SaleRecord): SaleRecord => ({ ...sale, timestamp: new Date(sale.timestamp.getTime()) });

const sumOf = (sales: readonly SaleRecord[], amount: (sale: SaleRecord) => Decimal.Value): number =>
  sales.reduce((total, sale) => total.plus(amount(sale)), new Decimal(0)).toNumber();

/**
 * Append-only list of completed sales. Loaded on first use and kept in memory;
 * each append rewrites the stored ledger.
 */
export class SalesLedger {
  private loading: Promise<SaleRecord[]> | null = null;

  constructor(private readonly repository: ISaleRepository) {}

  // Concurrent readers share one load; a failed load is retried on the next call.
  private entries(): Promise<SaleRecord[]> {
    if (!this.loading) {
      this.loading = this.repository.loadSales().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  /**
   * Appends a sale. Stock is not checked here.
   * If the write fails the sale stays in memory; `flush` retries the write.
   */
  async recordSale(
    productName: string,
    quantitySold: number,
    purchasePrice: number,
    salePrice: number,
    timestamp: Date
  ): Promise<SaleRecord> {
    const sales = await this.entries();
    const record: SaleRecord = Object.freeze({
      productName,
      quantitySold,
      profit: new Decimal(salePrice).minus(purchasePrice).times(quantitySold).toNumber(),
      timestamp: truncateToSeconds(timestamp),
      purchasePrice,
      salePrice,
    });
    sales.push(record);
    await this.repository.saveSales(sales);
    return copySale(record);
  }

  async flush(): Promise<void> {
    await this.repository.saveSales(await this.entries());
  }

  async listSales(): Promise<SaleRecord[]> {
    return (await this.entries()).map(copySale);
  }

  /** Revenue: quantity sold times sale price. Sales stored without prices only count towards net profit. */
  async grossProfit(): Promise<number> {
    return sumOf(await this.entries(), (sale) => new Decimal(sale.salePrice ?? 0).times(sale.quantitySold));
  }

  async netProfit(): Promise<number> {
    return sumOf(await this.entries(), (sale) => sale.profit);
  }

  async costOfGoodsSold(): Promise<number> {
    return sumOf(await this.entries(), (sale) => new Decimal(sale.purchasePrice ?? 0).times(sale.quantitySold));
  }

  async count(): Promise<number> {
    return (await this.entries()).length;
  }
}
