export interface Product {
  name: string;
  quantity: number;
  purchasePrice: number;
  salePrice: number;
}

export interface SaleRecord {
  productName: string;
  quantitySold: number;
  profit: number;
  timestamp: Date;
  /** Unit prices in effect when the sale was made; null for sales stored without them. */
  purchasePrice: number | null;
  salePrice: number | null;
}

/** What happened to the catalogue entry on an add. */
export type StockChange = "CREATED" | "RESTOCKED" | "REPRICED";

export interface AddStockResult {
  product: Product;
  change: StockChange;
}

export interface DeductStockResult {
  purchasePrice: number;
  salePrice: number;
  remainingQuantity: number;
}

export interface AddProductInput {
  warehouseName: string;
  name: string;
  quantity: number;
  purchasePrice: number;
  salePrice: number;
}

export interface SellProductInput {
  warehouseName: string;
  name: string;
  quantity: number;
}

export interface SaleReceipt {
  warehouseName: string;
  sale: SaleRecord;
  remainingQuantity: number;
}

export interface ProfitReport {
  gross: number;
  net: number;
  costOfGoodsSold: number;
  salesCount: number;
}
