import type { AppConfig } from "./env";
import { logError } from "./errors";
import { InventoryEventEmitter } from "./events/inventory-emitter";
import { SalesLedger } from "./inventory/SalesLedger";
import { createLogger, type Logger } from "./logging/logger";
import type { ISaleRepository } from "./repositories/ISaleRepository";
import type { IWarehouseRepository } from "./repositories/IWarehouseRepository";
import { RepositoryFactory } from "./repositories/RepositoryFactory";
import { InventoryService } from "./services/InventoryService";

export interface InventoryContext {
  config: AppConfig;
  logger: Logger;
  events: InventoryEventEmitter;
  inventory: InventoryService;
}

export interface InventoryContextOverrides {
  logger?: Logger;
  warehouseRepository?: IWarehouseRepository;
  saleRepository?: ISaleRepository;
  clock?: () => Date;
}

/**
 * Wires the inventory service for one process from an already validated config.
 * Every inventory event is written to the log.
 */
export function createInventoryContext(
  config: AppConfig,
  overrides: InventoryContextOverrides = {}
): InventoryContext {
  const logger = overrides.logger ?? createLogger(config.logLevel, { dir: config.logDir });
  const events = new InventoryEventEmitter((error, event) => {
    logError(logger, error, { operation: event.operation, listener: true });
  });

  events.subscribe((event) => {
    const { operation, outcome, ...details } = event;
    if (outcome === "success") {
      logger.info(`${operation} completed`, details);
    } else {
      logger.warn(`${operation} failed`, details);
    }
  });

  const warehouseRepository = overrides.warehouseRepository ?? RepositoryFactory.getWarehouseRepository(config);
  const saleRepository = overrides.saleRepository ?? RepositoryFactory.getSaleRepository(config);
  const inventory = new InventoryService(
    config.storage,
    warehouseRepository,
    new SalesLedger(saleRepository),
    events,
    overrides.clock
  );

  return { config, logger, events, inventory };
}
