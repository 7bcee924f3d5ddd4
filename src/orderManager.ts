import { OrderingDatabase, roundMoney } from "./database.js";
import {
  EmptyAllocationError,
  IncompleteSubmissionError,
  InvalidPayloadError,
  InvalidQuantityError,
  InvalidTransitionError,
  OrderLockedError,
  UnknownOrderError,
  UnknownOrderLineError,
  UnknownProductError,
} from "./errors.js";
import { ProductStore } from "./productStore.js";
import { ProgramRegistry } from "./programRegistry.js";
import {
  CodeSetSchema,
  decodeJsonColumn,
  NewOrder,
  NewOrderSchema,
  OrderStatusSchema,
  parseOrThrow,
  TransitionPayload,
  TransitionPayloadSchema,
} from "./schemas.js";
import { Order, OrderLine, OrderLineDetail, OrderStatus, OrderWithLines, Product } from "./types.js";

type OrderRow = {
  id: number;
  name: string;
  created_date: string;
  delivery_date: string | null;
  status: string;
  total_estimate: number;
  notes: string | null;
  created_by: string | null;
  submitted_date: string | null;
  confirmation_number: string | null;
  actual_total: number | null;
};

type OrderItemRow = {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  programs: string;
  is_gsrp: number;
  notes: string | null;
};

type OrderItemDetailRow = OrderItemRow & {
  item_code: string;
  description: string;
  brand: string | null;
  pack_size: string | null;
  category_name: string | null;
  unit_price: number;
};

export type LineInput = {
  itemCode: string;
  quantity: number;
  programCodes: string[];
  notes?: string;
};

export type LinePatch = Partial<Omit<LineInput, "itemCode">>;

export type { TransitionPayload };

export type OrderListFilter = {
  status?: OrderStatus;
  limit?: number;
};

const NEXT_STATUS: Record<OrderStatus, OrderStatus | undefined> = {
  draft: "ready",
  ready: "submitted",
  submitted: "completed",
  completed: undefined,
};

const EDITABLE: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["draft", "ready"]);

function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    name: row.name,
    createdDate: row.created_date,
    deliveryDate: row.delivery_date ?? undefined,
    status: parseOrThrow(OrderStatusSchema, row.status, "orders.status"),
    totalEstimate: row.total_estimate,
    actualTotal: row.actual_total ?? undefined,
    notes: row.notes ?? undefined,
    createdBy: row.created_by ?? undefined,
    submittedDate: row.submitted_date ?? undefined,
    confirmationNumber: row.confirmation_number ?? undefined,
  };
}

function toLine(row: OrderItemRow): OrderLine {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    quantity: row.quantity,
    programs: decodeJsonColumn(CodeSetSchema, row.programs, "order_items.programs"),
    isGsrp: row.is_gsrp === 1,
    notes: row.notes ?? undefined,
  };
}

function toLineDetail(row: OrderItemDetailRow): OrderLineDetail {
  return {
    ...toLine(row),
    itemCode: row.item_code,
    description: row.description,
    brand: row.brand ?? "",
    packSize: row.pack_size ?? "",
    categoryName: row.category_name ?? "",
    unitPrice: row.unit_price,
  };
}

function assertMoney(subject: string, value: number) {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidPayloadError(subject, [`expected a non-negative amount, got ${value}`]);
  }
}

export class OrderManager {
  constructor(
    private readonly database: OrderingDatabase,
    private readonly products: ProductStore,
    private readonly programs: ProgramRegistry
  ) {}

  private get db() {
    return this.database.db;
  }

  private findRow(orderId: number): OrderRow | undefined {
    return this.db.prepare<[number], OrderRow>("SELECT * FROM orders WHERE id=?").get(orderId);
  }

  private requireOrder(orderId: number): Order {
    const row = this.findRow(orderId);
    if (!row) throw new UnknownOrderError(orderId);
    return toOrder(row);
  }

  private requireEditable(orderId: number): Order {
    const order = this.requireOrder(orderId);
    if (!EDITABLE.has(order.status)) throw new OrderLockedError(order.id, order.status);
    return order;
  }

  private lineRows(orderId: number): OrderItemDetailRow[] {
    return this.db
      .prepare<[number], OrderItemDetailRow>(
        `SELECT oi.*, p.item_code, p.description, p.brand, p.pack_size, p.category_name, p.unit_price
         FROM order_items oi
         JOIN products p ON oi.product_id = p.id
         WHERE oi.order_id = ? ORDER BY oi.id`
      )
      .all(orderId);
  }

  private requireLine(orderId: number, lineId: number): OrderItemRow {
    const row = this.db
      .prepare<[number, number], OrderItemRow>("SELECT * FROM order_items WHERE id=? AND order_id=?")
      .get(lineId, orderId);
    if (!row) throw new UnknownOrderLineError(orderId, lineId);
    return row;
  }

  private activeProduct(itemCode: string): Product {
    const product = this.products.find(itemCode);
    if (!product) throw new UnknownProductError(itemCode);
    if (!product.isActive) throw new UnknownProductError(product.itemCode, "is inactive");
    return product;
  }

  /** Validates quantity, product and allocation; returns the product and the de-duplicated program codes. */
  private validateLine(orderId: number, itemCode: string, quantity: number, programCodes: string[]) {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new InvalidQuantityError(quantity, { orderId, itemCode });
    }
    const product = this.activeProduct(itemCode);
    const codes = [...new Set(programCodes.map((c) => c.trim()).filter(Boolean))];
    if (codes.length === 0) throw new EmptyAllocationError(orderId, product.itemCode);
    const programs = codes.map((code) => this.programs.requireActive(code));
    return { product, codes, isGsrp: programs.some((p) => p.category === "gsrp") };
  }

  /** Content changed: a ready order goes back to draft and the stored estimate follows the lines. */
  private afterEdit(order: Order) {
    if (order.status === "ready") {
      this.db.prepare("UPDATE orders SET status='draft' WHERE id=?").run(order.id);
      this.database.addAudit("order.reverted", "order", order.id, "ready -> draft after line edit");
    }
    this.persistEstimate(order.id);
  }

  createOrder(input: NewOrder): Order {
    const order = parseOrThrow(NewOrderSchema, input, "order");
    const info = this.db
      .prepare(
        `INSERT INTO orders(name, created_date, delivery_date, status, total_estimate, notes, created_by)
         VALUES(?, ?, ?, 'draft', 0, ?, ?)`
      )
      .run(order.name, this.database.today(), order.deliveryDate ?? null, order.notes ?? null, order.createdBy ?? null);
    const id = Number(info.lastInsertRowid);
    this.database.addAudit("order.created", "order", id, order.name);
    return this.requireOrder(id);
  }

  getOrder(orderId: number): OrderWithLines | undefined {
    const row = this.findRow(orderId);
    if (!row) return undefined;
    return { ...toOrder(row), lines: this.lineRows(orderId).map(toLineDetail) };
  }

  listOrders(filter: OrderListFilter = {}): Order[] {
    const values: unknown[] = [];
    let where = "";
    if (filter.status) {
      where = "WHERE status = ?";
      values.push(filter.status);
    }
    values.push(filter.limit ?? 20);
    return this.db
      .prepare<unknown[], OrderRow>(`SELECT * FROM orders ${where} ORDER BY created_date DESC, id DESC LIMIT ?`)
      .all(...values)
      .map(toOrder);
  }

  addLine(orderId: number, input: LineInput): OrderLine {
    return this.database.transaction(() => {
      const order = this.requireEditable(orderId);
      const { product, codes, isGsrp } = this.validateLine(order.id, input.itemCode, input.quantity, input.programCodes);
      const info = this.db
        .prepare("INSERT INTO order_items(order_id, product_id, quantity, programs, is_gsrp, notes) VALUES(?, ?, ?, ?, ?, ?)")
        .run(order.id, product.id, input.quantity, JSON.stringify(codes), isGsrp ? 1 : 0, input.notes ?? null);
      const lineId = Number(info.lastInsertRowid);
      this.afterEdit(order);
      this.database.addAudit("order.line_added", "order", order.id, `${product.itemCode} x${input.quantity} for ${codes.join(",")}`);
      return toLine(this.requireLine(order.id, lineId));
    });
  }

  updateLine(orderId: number, lineId: number, patch: LinePatch): OrderLine {
    return this.database.transaction(() => {
      const order = this.requireEditable(orderId);
      const current = toLine(this.requireLine(order.id, lineId));
      const product = this.products.findById(current.productId);
      if (!product) throw new UnknownProductError(String(current.productId));
      const quantity = patch.quantity ?? current.quantity;
      const { codes, isGsrp } = this.validateLine(order.id, product.itemCode, quantity, patch.programCodes ?? current.programs);
      const notes = patch.notes !== undefined ? patch.notes : current.notes;
      this.db
        .prepare("UPDATE order_items SET quantity=?, programs=?, is_gsrp=?, notes=? WHERE id=?")
        .run(quantity, JSON.stringify(codes), isGsrp ? 1 : 0, notes ?? null, lineId);
      this.afterEdit(order);
      this.database.addAudit("order.line_updated", "order", order.id, `line ${lineId}: ${product.itemCode} x${quantity} for ${codes.join(",")}`);
      return toLine(this.requireLine(order.id, lineId));
    });
  }

  removeLine(orderId: number, lineId: number) {
    this.database.transaction(() => {
      const order = this.requireEditable(orderId);
      this.requireLine(order.id, lineId);
      this.db.prepare("DELETE FROM order_items WHERE id=?").run(lineId);
      this.afterEdit(order);
      this.database.addAudit("order.line_removed", "order", order.id, `line ${lineId}`);
    });
  }

  /** Σ quantity × current unit price, in cents precision. Reads only. */
  recomputeEstimate(orderId: number): number {
    const order = this.requireOrder(orderId);
    const total = this.lineRows(order.id).reduce((sum, row) => sum + row.quantity * row.unit_price, 0);
    return roundMoney(total);
  }

  persistEstimate(orderId: number): number {
    const estimate = this.recomputeEstimate(orderId);
    this.db.prepare("UPDATE orders SET total_estimate=? WHERE id=?").run(estimate, orderId);
    return estimate;
  }

  /** Moves an order one step along draft → ready → submitted → completed. */
  transition(orderId: number, status: OrderStatus, input: TransitionPayload = {}): Order {
    const payload = parseOrThrow(TransitionPayloadSchema, input, "transition payload");
    return this.database.transaction(() => {
      const order = this.requireOrder(orderId);
      if (NEXT_STATUS[order.status] !== status) {
        throw new InvalidTransitionError(order.id, order.status, status);
      }

      switch (status) {
        case "ready":
          this.assertReady(order);
          this.db.prepare("UPDATE orders SET status='ready' WHERE id=?").run(order.id);
          this.persistEstimate(order.id);
          break;
        case "submitted":
          this.submit(order, payload);
          break;
        case "completed": {
          const actual = payload.actualTotal ?? order.actualTotal;
          if (actual === undefined) throw new IncompleteSubmissionError(order.id, "actualTotal");
          assertMoney("actual total", actual);
          this.db.prepare("UPDATE orders SET status='completed', actual_total=? WHERE id=?").run(roundMoney(actual), order.id);
          break;
        }
      }

      this.database.addAudit("order.transition", "order", order.id, `${order.status} -> ${status}`);
      return this.requireOrder(order.id);
    });
  }

  private assertReady(order: Order) {
    const lines = this.lineRows(order.id).map(toLineDetail);
    if (lines.length === 0) {
      throw new InvalidTransitionError(order.id, order.status, "ready", "order has no lines");
    }
    for (const line of lines) {
      this.activeProduct(line.itemCode);
      if (line.programs.length === 0) throw new EmptyAllocationError(order.id, line.itemCode);
      line.programs.forEach((code) => this.programs.requireActive(code));
    }
  }

  private submit(order: Order, payload: TransitionPayload) {
    const confirmation = payload.confirmationNumber?.trim();
    if (!confirmation) throw new IncompleteSubmissionError(order.id, "confirmationNumber");
    if (payload.actualTotal !== undefined) assertMoney("actual total", payload.actualTotal);
    const estimate = this.recomputeEstimate(order.id);
    this.db
      .prepare(
        `UPDATE orders SET status='submitted', submitted_date=?, confirmation_number=?, total_estimate=?, actual_total=?
         WHERE id=?`
      )
      .run(
        payload.submittedDate ?? this.database.today(),
        confirmation,
        estimate,
        payload.actualTotal !== undefined ? roundMoney(payload.actualTotal) : null,
        order.id
      );
    for (const line of this.lineRows(order.id).map(toLineDetail)) {
      this.products.addPreferredPrograms(line.itemCode, line.programs);
    }
  }

  /** Sets the vendor's final amount once the order has been submitted. */
  recordActualTotal(orderId: number, total: number): Order {
    const order = this.requireOrder(orderId);
    if (order.status === "completed") throw new OrderLockedError(order.id, order.status);
    if (order.status !== "submitted") throw new IncompleteSubmissionError(order.id, "a submission");
    assertMoney("actual total", total);
    this.db.prepare("UPDATE orders SET actual_total=? WHERE id=?").run(roundMoney(total), order.id);
    this.database.addAudit("order.actual_total", "order", order.id, roundMoney(total).toFixed(2));
    return this.requireOrder(order.id);
  }

  duplicateOrder(orderId: number, name?: string): OrderWithLines {
    return this.database.transaction(() => {
      const original = this.requireOrder(orderId);
      const copy = this.createOrder({
        name: name?.trim() || `Copy of ${original.name}`,
        notes: original.notes,
        createdBy: original.createdBy,
      });
      this.db
        .prepare(
          `INSERT INTO order_items(order_id, product_id, quantity, programs, is_gsrp, notes)
           SELECT ?, product_id, quantity, programs, is_gsrp, notes FROM order_items WHERE order_id=? ORDER BY id`
        )
        .run(copy.id, original.id);
      this.persistEstimate(copy.id);
      this.database.addAudit("order.duplicated", "order", copy.id, `copied from order ${original.id}`);
      const result = this.getOrder(copy.id);
      if (!result) throw new UnknownOrderError(copy.id);
      return result;
    });
  }

  deleteOrder(orderId: number) {
    const order = this.requireOrder(orderId);
    this.database.transaction(() => {
      this.db.prepare("DELETE FROM orders WHERE id=?").run(order.id);
      this.database.addAudit("order.deleted", "order", order.id, order.name);
    });
  }
}
