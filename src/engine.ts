import { OrderingConfig } from "./config.js";
import { Clock, OrderingDatabase } from "./database.js";
import { UnknownOrderError } from "./errors.js";
import { InvoiceReconciler } from "./invoiceReconciler.js";
import { OrderManager } from "./orderManager.js";
import { ProductStore } from "./productStore.js";
import { loadDefaultPrograms, ProgramRegistry } from "./programRegistry.js";
import { allocateOrderCost } from "./reports.js";
import { ProgramDefinition } from "./schemas.js";
import { AuditEntry, OrderCostAllocation } from "./types.js";

export * from "./errors.js";
export * from "./types.js";
export type { ParsedInvoiceInput, ProgramDefinition, NewOrder } from "./schemas.js";
export type { LineInput, LinePatch, TransitionPayload } from "./orderManager.js";
export type { CatalogSighting, ProductSearch } from "./productStore.js";
export { loadConfig } from "./config.js";
export type { OrderingConfig } from "./config.js";

export type EngineOptions = {
  dbPath?: string;
  priceTolerance?: number;
  searchLimit?: number;
  seedPrograms?: boolean;
  programSeed?: ProgramDefinition[];
  now?: Clock;
};

const DEFAULTS = {
  dbPath: "./ordering.db",
  priceTolerance: 0.01,
  searchLimit: 50,
  seedPrograms: true,
};

/** One database connection with the catalog, program, invoice and order components wired over it. */
export class OrderingEngine {
  readonly database: OrderingDatabase;
  readonly products: ProductStore;
  readonly programs: ProgramRegistry;
  readonly invoices: InvoiceReconciler;
  readonly orders: OrderManager;

  constructor(options: EngineOptions = {}) {
    this.database = new OrderingDatabase(options.dbPath ?? DEFAULTS.dbPath, options.now);
    this.products = new ProductStore(this.database, { searchLimit: options.searchLimit ?? DEFAULTS.searchLimit });
    this.programs = new ProgramRegistry(this.database);
    this.invoices = new InvoiceReconciler(this.database, this.products, {
      priceTolerance: options.priceTolerance ?? DEFAULTS.priceTolerance,
    });
    this.orders = new OrderManager(this.database, this.products, this.programs);

    if (options.seedPrograms ?? DEFAULTS.seedPrograms) {
      this.programs.seed(options.programSeed ?? loadDefaultPrograms());
    }
  }

  static fromConfig(config: OrderingConfig, now?: Clock): OrderingEngine {
    return new OrderingEngine({
      dbPath: config.dbPath,
      priceTolerance: config.priceTolerance,
      searchLimit: config.searchLimit,
      seedPrograms: config.seedPrograms,
      now,
    });
  }

  allocateCost(orderId: number): OrderCostAllocation {
    const order = this.orders.getOrder(orderId);
    if (!order) throw new UnknownOrderError(orderId);
    return allocateOrderCost(order);
  }

  auditTrail(filter?: Parameters<OrderingDatabase["listAudit"]>[0]): AuditEntry[] {
    return this.database.listAudit(filter);
  }

  close() {
    this.database.close();
  }
}
