import type { AppConfig } from "../env";
import type { ISaleRepository } from "./ISaleRepository";
import type { IWarehouseRepository } from "./IWarehouseRepository";
import { MockSaleRepository } from "./MockSaleRepository";
import { MockWarehouseRepository } from "./MockWarehouseRepository";
import { SaleRepository } from "./SaleRepository";
import { WarehouseRepository } from "./WarehouseRepository";

export class RepositoryFactory {
  static getWarehouseRepository(config: AppConfig): IWarehouseRepository {
    if (config.useMockData) {
      return new MockWarehouseRepository();
    }
    return new WarehouseRepository(config.storage);
  }

  static getSaleRepository(config: AppConfig): ISaleRepository {
    if (config.useMockData) {
      return new MockSaleRepository();
    }
    return new SaleRepository(config.storage);
  }
}
