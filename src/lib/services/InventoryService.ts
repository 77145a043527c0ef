import type { StorageConfig } from "../env";
import {
  fail,
  fromZodError,
  isAppError,
  isBusinessError,
  notFoundError,
  ok,
  type OperationResult,
} from "../errors";
import type { InventoryEvent, InventoryEventEmitter, InventoryOperation } from "../events/inventory-emitter";
import { SalesLedger } from "../inventory/SalesLedger";
import { Warehouse } from "../inventory/Warehouse";
import type { IWarehouseRepository } from "../repositories/IWarehouseRepository";
import { buildInventorySchemas, type InventorySchemas } from "../schemas/inventory";
import type {
  AddProductInput,
  AddStockResult,
  Product,
  ProfitReport,
  SaleReceipt,
  SaleRecord,
  SellProductInput,
} from "../types/inventory";

type EventSubject = Pick<InventoryEvent, "warehouse" | "product">;

export type AddProductResult = AddStockResult & { warehouseName: string };

/**
 * Entry point for callers: stocking and selling products and reading the books.
 * Expected business failures come back as `{ success: false }`; storage failures are thrown.
 */
export class InventoryService {
  private readonly schemas: InventorySchemas;
  private readonly warehouses = new Map<string, Warehouse>();

  constructor(
    storage: Pick<StorageConfig, "extension" | "salesFileName" | "delimiter">,
    private readonly warehouseRepository: IWarehouseRepository,
    private readonly ledger: SalesLedger,
    private readonly events: InventoryEventEmitter,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.schemas = buildInventorySchemas(storage);
  }

  private warehouse(name: string): Warehouse {
    let warehouse = this.warehouses.get(name);
    if (!warehouse) {
      warehouse = new Warehouse(name, this.warehouseRepository);
      this.warehouses.set(name, warehouse);
    }
    return warehouse;
  }

  private async existingWarehouse(name: string): Promise<Warehouse> {
    const warehouse = this.warehouse(name);
    if (!(await warehouse.exists())) {
      throw notFoundError(`Almacén '${name}'`);
    }
    return warehouse;
  }

  /**
   * Runs `fn`, reports the outcome on the event emitter and turns business errors
   * into a failed result. Anything else is rethrown after being reported.
   */
  private async execute<T>(
    operation: InventoryOperation,
    target: EventSubject,
    fn: () => Promise<T>,
    payload?: (data: T) => Record<string, unknown>
  ): Promise<OperationResult<T>> {
    try {
      const data = await fn();
      this.events.notify({ operation, outcome: "success", ...target, ...(payload && { payload: payload(data) }) });
      return ok(data);
    } catch (error) {
      this.events.notify({
        operation,
        outcome: "failure",
        ...target,
        errorCode: isAppError(error) ? error.code : "INTERNAL_ERROR",
      });
      if (isBusinessError(error)) {
        return fail(error);
      }
      throw error;
    }
  }

  async addProduct(input: AddProductInput): Promise<OperationResult<AddProductResult>> {
    const parsed = this.schemas.addProduct.safeParse(input);
    if (!parsed.success) {
      const error = fromZodError(parsed.error);
      this.events.notify({ operation: "add_product", outcome: "failure", errorCode: error.code, product: input.name });
      return fail(error);
    }
    const { warehouseName, name, quantity, purchasePrice, salePrice } = parsed.data;

    return this.execute(
      "add_product",
      { warehouse: warehouseName, product: name },
      async () => {
        const result = await this.warehouse(warehouseName).addStock(name, quantity, purchasePrice, salePrice);
        return { ...result, warehouseName };
      },
      (data) => ({ change: data.change, quantity: data.product.quantity })
    );
  }

  /**
   * Deducts the stock first and records the sale second. A crash between the two
   * writes leaves the stock reduced with no sale on the ledger.
   */
  async sellProduct(input: SellProductInput): Promise<OperationResult<SaleReceipt>> {
    const parsed = this.schemas.sellProduct.safeParse(input);
    if (!parsed.success) {
      const error = fromZodError(parsed.error);
      this.events.notify({ operation: "sell_product", outcome: "failure", errorCode: error.code, product: input.name });
      return fail(error);
    }
    const { warehouseName, name, quantity } = parsed.data;

    return this.execute(
      "sell_product",
      { warehouse: warehouseName, product: name },
      async () => {
        const warehouse = await this.existingWarehouse(warehouseName);
        const deducted = await warehouse.deductStock(name, quantity);
        const sale = await this.ledger.recordSale(
          name,
          quantity,
          deducted.purchasePrice,
          deducted.salePrice,
          this.clock()
        );
        return { warehouseName, sale, remainingQuantity: deducted.remainingQuantity };
      },
      (data) => ({ quantity: data.sale.quantitySold, profit: data.sale.profit, remaining: data.remainingQuantity })
    );
  }

  async profitReport(): Promise<ProfitReport> {
    const result = await this.execute("profit_report", {}, async () => {
      const [gross, net, costOfGoodsSold, salesCount] = await Promise.all([
        this.ledger.grossProfit(),
        this.ledger.netProfit(),
        this.ledger.costOfGoodsSold(),
        this.ledger.count(),
      ]);
      return { gross, net, costOfGoodsSold, salesCount } satisfies ProfitReport;
    });
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  async findProduct(warehouseName: string, name: string): Promise<OperationResult<Product>> {
    const parsed = this.schemas.productLookup.safeParse({ warehouseName, name });
    if (!parsed.success) {
      return fail(fromZodError(parsed.error));
    }
    const lookup = parsed.data;
    return this.execute("find_product", { warehouse: lookup.warehouseName, product: lookup.name }, async () => {
      const warehouse = await this.existingWarehouse(lookup.warehouseName);
      return warehouse.find(lookup.name);
    });
  }

  async listProducts(warehouseName: string): Promise<OperationResult<Product[]>> {
    const parsed = this.schemas.warehouseName.safeParse(warehouseName);
    if (!parsed.success) {
      return fail(fromZodError(parsed.error));
    }
    const name = parsed.data;
    return this.execute("list_products", { warehouse: name }, async () => {
      const warehouse = await this.existingWarehouse(name);
      return warehouse.listProducts();
    });
  }

  async listWarehouses(): Promise<string[]> {
    const result = await this.execute("list_warehouses", {}, () => this.warehouseRepository.listWarehouses());
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  async listSales(): Promise<SaleRecord[]> {
    const result = await this.execute("list_sales", {}, () => this.ledger.listSales());
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }
}
