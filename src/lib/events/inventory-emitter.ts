import { EventEmitter } from "events";
import type { ErrorCode } from "../errors";

export type InventoryOperation =
  | "add_product"
  | "sell_product"
  | "profit_report"
  | "find_product"
  | "list_products"
  | "list_warehouses"
  | "list_sales";

export interface InventoryEvent {
  operation: InventoryOperation;
  outcome: "success" | "failure";
  warehouse?: string;
  product?: string;
  errorCode?: ErrorCode;
  payload?: Record<string, unknown>;
}

export type InventoryEventListener = (event: InventoryEvent) => void;

/** Invoked when a listener throws; the event itself is already delivered to the others. */
export type ListenerErrorHandler = (error: unknown, event: InventoryEvent) => void;

const EVENT_NAME = "inventory";

export class InventoryEventEmitter extends EventEmitter {
  constructor(private readonly onListenerError: ListenerErrorHandler) {
    super();
    this.setMaxListeners(100);
  }

  subscribe(listener: InventoryEventListener): () => void {
    const guarded = (event: InventoryEvent) => {
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    };
    this.on(EVENT_NAME, guarded);
    return () => {
      this.off(EVENT_NAME, guarded);
    };
  }

  notify(event: InventoryEvent): void {
    this.emit(EVENT_NAME, event);
  }
}
