import type { z } from "zod";
import { formatCurrency } from "../../config/currency";
import type { InventoryContext } from "../context";
import { fromZodError, getErrorMessage, isAppError, logError, type OperationFailure, type OperationResult } from "../errors";
import { addArgumentsSchema, sellArgumentsSchema } from "../schemas/inventory";
import type { AddProductResult } from "../services/InventoryService";
import { formatDecimal } from "../storage/tables";
import { formatTimestamp } from "../utils/date";

export interface CommandOutput {
  write(line: string): void;
  error(line: string): void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_STORAGE_ERROR = 2;

export const USAGE = [
  "Uso: stock-ledger <comando> [argumentos]",
  "",
  "  add <almacén> <producto> <cantidad> <precio-compra> <precio-venta>",
  "  sell <almacén> <producto> <cantidad>",
  "  profits",
  "  warehouses",
  "  products <almacén>",
  "  sales",
  "  help",
];

type Handler = (args: string[], context: InventoryContext, output: CommandOutput) => Promise<number>;

function positional<T extends z.ZodTypeAny>(
  schema: T,
  keys: readonly string[],
  args: string[]
): z.SafeParseReturnType<z.input<T>, z.output<T>> | null {
  if (args.length !== keys.length) {
    return null;
  }
  const record: Record<string, string> = {};
  keys.forEach((key, index) => {
    record[key] = args[index];
  });
  return schema.safeParse(record);
}

function reportFailure<T>(result: OperationResult<T>, output: CommandOutput): result is OperationFailure {
  if (!result.success) {
    output.error(`[ERROR] ${result.error.message}`);
    return true;
  }
  return false;
}

function describeAdd(result: AddProductResult, symbol: string): string {
  const { product, change, warehouseName } = result;
  switch (change) {
    case "CREATED":
      return `Nuevo producto agregado en '${warehouseName}': '${product.name}' x ${product.quantity}`;
    case "REPRICED":
      return (
        `Precios actualizados para '${product.name}' en '${warehouseName}': ` +
        `compra ${formatCurrency(product.purchasePrice, symbol)}, venta ${formatCurrency(product.salePrice, symbol)}. ` +
        `Existencias: ${product.quantity}`
      );
    case "RESTOCKED":
      return `Cantidad actualizada para '${product.name}' en '${warehouseName}'. Existencias: ${product.quantity}`;
  }
}

const handlers: Record<string, Handler> = {
  async add(args, context, output) {
    const parsed = positional(addArgumentsSchema, ["warehouseName", "name", "quantity", "purchasePrice", "salePrice"], args);
    if (!parsed) {
      output.error("[ERROR] add requiere <almacén> <producto> <cantidad> <precio-compra> <precio-venta>");
      return EXIT_FAILURE;
    }
    if (!parsed.success) {
      output.error(`[ERROR] ${fromZodError(parsed.error).message}`);
      return EXIT_FAILURE;
    }
    const result = await context.inventory.addProduct(parsed.data);
    if (reportFailure(result, output)) {
      return EXIT_FAILURE;
    }
    output.write(describeAdd(result.data, context.config.currency.symbol));
    return EXIT_OK;
  },

  async sell(args, context, output) {
    const parsed = positional(sellArgumentsSchema, ["warehouseName", "name", "quantity"], args);
    if (!parsed) {
      output.error("[ERROR] sell requiere <almacén> <producto> <cantidad>");
      return EXIT_FAILURE;
    }
    if (!parsed.success) {
      output.error(`[ERROR] ${fromZodError(parsed.error).message}`);
      return EXIT_FAILURE;
    }
    const result = await context.inventory.sellProduct(parsed.data);
    if (reportFailure(result, output)) {
      return EXIT_FAILURE;
    }
    const { sale, remainingQuantity, warehouseName } = result.data;
    output.write(
      `Venta registrada: '${sale.productName}' x ${sale.quantitySold}, ` +
        `ganancia ${formatCurrency(sale.profit, context.config.currency.symbol)}. ` +
        `Existencias restantes en '${warehouseName}': ${remainingQuantity}`
    );
    return EXIT_OK;
  },

  async profits(_args, context, output) {
    const report = await context.inventory.profitReport();
    const symbol = context.config.currency.symbol;
    output.write(`Ventas registradas: ${report.salesCount}`);
    output.write(`Ganancia bruta: ${formatCurrency(report.gross, symbol)}`);
    output.write(`Costo de lo vendido: ${formatCurrency(report.costOfGoodsSold, symbol)}`);
    output.write(`Ganancia neta: ${formatCurrency(report.net, symbol)}`);
    return EXIT_OK;
  },

  async warehouses(_args, context, output) {
    const names = await context.inventory.listWarehouses();
    if (names.length === 0) {
      output.write("No hay almacenes registrados");
      return EXIT_OK;
    }
    names.forEach((name, index) => output.write(`${index + 1}. ${name}`));
    return EXIT_OK;
  },

  async products(args, context, output) {
    if (args.length !== 1) {
      output.error("[ERROR] products requiere <almacén>");
      return EXIT_FAILURE;
    }
    const result = await context.inventory.listProducts(args[0]);
    if (reportFailure(result, output)) {
      return EXIT_FAILURE;
    }
    if (result.data.length === 0) {
      output.write("El almacén no tiene productos");
      return EXIT_OK;
    }
    const symbol = context.config.currency.symbol;
    for (const product of result.data) {
      output.write(
        `${product.name}\t${product.quantity}\t${formatCurrency(product.purchasePrice, symbol)}\t${formatCurrency(product.salePrice, symbol)}`
      );
    }
    return EXIT_OK;
  },

  async sales(_args, context, output) {
    const sales = await context.inventory.listSales();
    if (sales.length === 0) {
      output.write("No hay ventas registradas");
      return EXIT_OK;
    }
    for (const sale of sales) {
      output.write(
        `${formatTimestamp(sale.timestamp)}\t${sale.productName}\t${sale.quantitySold}\t${formatDecimal(sale.profit)}`
      );
    }
    return EXIT_OK;
  },

  async help(_args, _context, output) {
    USAGE.forEach((line) => output.write(line));
    return EXIT_OK;
  },
};

/**
 * Runs one command and returns the process exit code.
 * Storage and data-file failures are reported, never thrown.
 */
export async function runCommand(argv: string[], context: InventoryContext, output: CommandOutput): Promise<number> {
  const [command = "help", ...args] = argv;
  const handler = Object.prototype.hasOwnProperty.call(handlers, command) ? handlers[command] : undefined;
  if (!handler) {
    output.error(`[ERROR] Comando desconocido: ${command}`);
    USAGE.forEach((line) => output.error(line));
    return EXIT_STORAGE_ERROR;
  }

  try {
    return await handler(args, context, output);
  } catch (error) {
    logError(context.logger, error, { operation: command });
    output.error(`[ERROR] ${getErrorMessage(error)}`);
    if (isAppError(error) && (error.code === "STORAGE_ERROR" || error.code === "MALFORMED_DATA")) {
      return EXIT_STORAGE_ERROR;
    }
    return EXIT_FAILURE;
  }
}
