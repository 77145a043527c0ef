import { z } from "zod";
import type { Product, SaleRecord } from "../types/inventory";
import { formatTimestamp, parseTimestamp } from "../utils/date";

/**
 * Shape of one delimited file: its header and how a row of text maps to a record.
 * `rowSchema` receives the row keyed by column name.
 */
export interface TableDefinition<T> {
  name: string;
  columns: readonly string[];
  /** Columns a file may lack, as files written before they existed do. A missing one reads as "". */
  optionalColumns?: readonly string[];
  rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  toRow(record: T): string[];
}

// ---------------------
// Field Codecs
// ---------------------

const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

const textField = z.string().trim().min(1, "valor vacío");

const integerField = z
  .string()
  .trim()
  .regex(/^\d+$/, "se esperaba un entero no negativo")
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), { message: "entero fuera de rango" });

const decimalField = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, "se esperaba un decimal con punto como separador")
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), { message: "decimal fuera de rango" });

const nonNegativeDecimalField = decimalField.refine((value) => value >= 0, {
  message: "el valor no puede ser negativo",
});

const optionalPriceField = z.string().transform((value, ctx) => {
  if (value.trim().length === 0) {
    return null;
  }
  const parsed = nonNegativeDecimalField.safeParse(value);
  if (!parsed.success) {
    parsed.error.issues.forEach((issue) => ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message }));
    return z.NEVER;
  }
  return parsed.data;
});

const timestampField = z.string().transform((value, ctx) => {
  try {
    return parseTimestamp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : "fecha inválida",
    });
    return z.NEVER;
  }
});

/** Shortest text that reads back as the same number, always with a dot. */
export function formatDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Valor numérico inválido: ${value}`);
  }
  return String(Object.is(value, -0) ? 0 : value);
}

// ---------------------
// Tables
// ---------------------

export const PRODUCT_COLUMNS = ["name", "quantity", "purchase_price", "sale_price"] as const;

export const PRODUCT_TABLE: TableDefinition<Product> = {
  name: "productos",
  columns: PRODUCT_COLUMNS,
  rowSchema: z
    .object({
      name: textField,
      quantity: integerField,
      purchase_price: nonNegativeDecimalField,
      sale_price: nonNegativeDecimalField,
    })
    .transform(
      (row): Product => ({
        name: row.name,
        quantity: row.quantity,
        purchasePrice: row.purchase_price,
        salePrice: row.sale_price,
      })
    ),
  toRow: (product) => [
    product.name,
    String(product.quantity),
    formatDecimal(product.purchasePrice),
    formatDecimal(product.salePrice),
  ],
};

export const SALE_COLUMNS = [
  "name",
  "quantity_sold",
  "profit",
  "timestamp",
  "purchase_price",
  "sale_price",
] as const;

export const SALE_TABLE: TableDefinition<SaleRecord> = {
  name: "ventas",
  columns: SALE_COLUMNS,
  optionalColumns: ["purchase_price", "sale_price"],
  rowSchema: z
    .object({
      name: textField,
      quantity_sold: integerField.refine((value) => value > 0, {
        message: "la cantidad vendida debe ser mayor a 0",
      }),
      profit: decimalField,
      timestamp: timestampField,
      purchase_price: optionalPriceField,
      sale_price: optionalPriceField,
    })
    .transform(
      (row): SaleRecord => ({
        productName: row.name,
        quantitySold: row.quantity_sold,
        profit: row.profit,
        timestamp: row.timestamp,
        purchasePrice: row.purchase_price,
        salePrice: row.sale_price,
      })
    ),
  toRow: (sale) => [
    sale.productName,
    String(sale.quantitySold),
    formatDecimal(sale.profit),
    formatTimestamp(sale.timestamp),
    sale.purchasePrice === null ? "" : formatDecimal(sale.purchasePrice),
    sale.salePrice === null ? "" : formatDecimal(sale.salePrice),
  ],
};
