import test from "node:test";
import assert from "node:assert/strict";

import {
  EmptyAllocationError,
  IncompleteSubmissionError,
  InvalidPayloadError,
  InvalidQuantityError,
  InvalidTransitionError,
  OrderLockedError,
  ProductInUseError,
  UnknownOrderError,
  UnknownOrderLineError,
  UnknownProductError,
  UnknownProgramError,
} from "../errors.js";
import { invoicePayload, makeEngine, TODAY } from "./helpers.js";

function engineWithCatalog() {
  const engine = makeEngine();
  engine.invoices.recordInvoice(
    invoicePayload("INV-1", "2025-01-14", [
      { itemCode: "582271", quantity: 113, unitPrice: 46.57, description: "APPLE GRANNY SMITH", category: "PR" },
      { itemCode: "104455", quantity: 2, unitPrice: 23.99, description: "CRACKER GRAHAM HONEY" },
    ])
  );
  return engine;
}

function lineCount(engine: ReturnType<typeof makeEngine>, orderId: number): number {
  return engine.database.db
    .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM order_items WHERE order_id=?")
    .get(orderId)?.n ?? -1;
}

// ── createOrder / addLine ────────────────────────────────────────────

test("createOrder: starts as an empty draft", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Week of Feb 24", deliveryDate: "2025-02-25", createdBy: "sam" });

  assert.equal(order.status, "draft");
  assert.equal(order.createdDate, TODAY);
  assert.equal(order.deliveryDate, "2025-02-25");
  assert.equal(order.totalEstimate, 0);
  assert.equal(order.submittedDate, undefined);
  assert.equal(order.actualTotal, undefined);
  engine.close();
});

test("addLine: stores the allocation and refreshes the estimate", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  const line = engine.orders.addLine(order.id, {
    itemCode: "582271",
    quantity: 3,
    programCodes: ["kinawa", "cornell", "kinawa"],
    notes: "cut up",
  });

  assert.deepEqual(line.programs, ["kinawa", "cornell"]);
  assert.equal(line.isGsrp, false);
  assert.equal(line.notes, "cut up");

  engine.orders.addLine(order.id, { itemCode: "104455", quantity: 2, programCodes: ["gsrp1"] });
  const stored = engine.orders.getOrder(order.id);
  assert.equal(stored?.totalEstimate, 187.69);
  assert.equal(stored?.lines.length, 2);
  assert.equal(stored?.lines[1]?.isGsrp, true);
  assert.equal(stored?.lines[0]?.description, "APPLE GRANNY SMITH");
  engine.close();
});

test("addLine: empty allocation is rejected and nothing is stored", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });

  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "582271", quantity: 1, programCodes: [] }),
    EmptyAllocationError
  );
  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "582271", quantity: 1, programCodes: ["  "] }),
    EmptyAllocationError
  );
  assert.equal(lineCount(engine, order.id), 0);
  engine.close();
});

test("addLine: unknown or inactive program", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.programs.deactivate("hiawatha");

  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "582271", quantity: 1, programCodes: ["kinawa", "nope"] }),
    UnknownProgramError
  );
  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "582271", quantity: 1, programCodes: ["hiawatha"] }),
    UnknownProgramError
  );
  assert.equal(lineCount(engine, order.id), 0);
  engine.close();
});

test("addLine: unknown or inactive product", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.products.deactivate("104455");

  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "000000", quantity: 1, programCodes: ["kinawa"] }),
    UnknownProductError
  );
  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "104455", quantity: 1, programCodes: ["kinawa"] }),
    UnknownProductError
  );
  engine.close();
});

test("addLine: quantity must be a positive integer", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });

  for (const quantity of [0, -2, 1.5]) {
    assert.throws(
      () => engine.orders.addLine(order.id, { itemCode: "582271", quantity, programCodes: ["kinawa"] }),
      InvalidQuantityError
    );
  }
  engine.close();
});

test("addLine: unknown order", () => {
  const engine = engineWithCatalog();
  assert.throws(
    () => engine.orders.addLine(999, { itemCode: "582271", quantity: 1, programCodes: ["kinawa"] }),
    UnknownOrderError
  );
  engine.close();
});

// ── lifecycle ────────────────────────────────────────────────────────

test("transition: draft → ready → submitted → completed", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });

  assert.equal(engine.orders.transition(order.id, "ready").status, "ready");

  const submitted = engine.orders.transition(order.id, "submitted", { confirmationNumber: " GFS-123 " });
  assert.equal(submitted.status, "submitted");
  assert.equal(submitted.confirmationNumber, "GFS-123");
  assert.equal(submitted.submittedDate, TODAY);
  assert.equal(submitted.totalEstimate, 93.14);

  const completed = engine.orders.transition(order.id, "completed", { actualTotal: 95.1 });
  assert.equal(completed.status, "completed");
  assert.equal(completed.actualTotal, 95.1);

  const events = engine.auditTrail({ entity: "order", entityId: order.id, event: "order.transition" });
  assert.deepEqual(
    events.map((e) => e.details),
    ["draft -> ready", "ready -> submitted", "submitted -> completed"]
  );
  engine.close();
});

test("transition: skipping or going back is refused", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });

  assert.throws(() => engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1" }), InvalidTransitionError);
  assert.throws(() => engine.orders.transition(order.id, "completed", { actualTotal: 1 }), InvalidTransitionError);
  assert.throws(() => engine.orders.transition(order.id, "draft"), InvalidTransitionError);

  engine.orders.transition(order.id, "ready");
  engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1" });
  assert.throws(() => engine.orders.transition(order.id, "draft"), InvalidTransitionError);
  assert.throws(() => engine.orders.transition(order.id, "ready"), InvalidTransitionError);
  assert.equal(engine.orders.getOrder(order.id)?.status, "submitted");
  engine.close();
});

test("transition: ready needs at least one line", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Empty" });
  assert.throws(
    () => engine.orders.transition(order.id, "ready"),
    (err: unknown) => err instanceof InvalidTransitionError && err.context.reason === "order has no lines"
  );
  engine.close();
});

test("transition: ready re-checks programs deactivated after the line was added", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["bennett"] });
  engine.programs.deactivate("bennett");

  assert.throws(() => engine.orders.transition(order.id, "ready"), UnknownProgramError);
  assert.equal(engine.orders.getOrder(order.id)?.status, "draft");
  engine.close();
});

test("transition: submitted needs a confirmation number", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  engine.orders.transition(order.id, "ready");

  assert.throws(() => engine.orders.transition(order.id, "submitted"), IncompleteSubmissionError);
  assert.throws(() => engine.orders.transition(order.id, "submitted", { confirmationNumber: "  " }), IncompleteSubmissionError);
  const order2 = engine.orders.getOrder(order.id);
  assert.equal(order2?.status, "ready");
  assert.equal(order2?.submittedDate, undefined);
  engine.close();
});

test("transition: submitted date must be YYYY-MM-DD", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  engine.orders.transition(order.id, "ready");

  assert.throws(
    () => engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1", submittedDate: "02/20/2025" }),
    InvalidPayloadError
  );
  assert.equal(engine.orders.getOrder(order.id)?.status, "ready");
  engine.close();
});

test("transition: completed needs an actual total, recordActualTotal supplies it", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });

  assert.throws(() => engine.orders.recordActualTotal(order.id, 90), IncompleteSubmissionError);

  engine.orders.transition(order.id, "ready");
  engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1", submittedDate: "2025-02-20" });
  assert.throws(() => engine.orders.transition(order.id, "completed"), IncompleteSubmissionError);

  assert.equal(engine.orders.recordActualTotal(order.id, 91.456).actualTotal, 91.46);
  const completed = engine.orders.transition(order.id, "completed");
  assert.equal(completed.actualTotal, 91.46);
  assert.equal(completed.submittedDate, "2025-02-20");
  assert.throws(() => engine.orders.recordActualTotal(order.id, 1), OrderLockedError);
  engine.close();
});

test("submission folds line programs into the products' preferred programs", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa", "infants"] });
  engine.orders.transition(order.id, "ready");
  engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1" });

  assert.deepEqual(engine.products.find("582271")?.preferredPrograms, ["kinawa", "infants"]);
  engine.close();
});

// ── edits and locking ────────────────────────────────────────────────

test("addLine on a ready order reverts it to draft", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  engine.orders.transition(order.id, "ready");

  engine.orders.addLine(order.id, { itemCode: "104455", quantity: 1, programCodes: ["cornell"] });
  assert.equal(engine.orders.getOrder(order.id)?.status, "draft");
  engine.close();
});

test("removeLine on a ready order reverts it to draft", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  const extra = engine.orders.addLine(order.id, { itemCode: "104455", quantity: 1, programCodes: ["kinawa"] });
  engine.orders.transition(order.id, "ready");

  engine.orders.removeLine(order.id, extra.id);
  const stored = engine.orders.getOrder(order.id);
  assert.equal(stored?.status, "draft");
  assert.equal(stored?.lines.length, 1);
  assert.equal(stored?.totalEstimate, 93.14);
  engine.close();
});

test("submitted orders are locked", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  const line = engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  engine.orders.transition(order.id, "ready");
  engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1" });

  assert.throws(
    () => engine.orders.addLine(order.id, { itemCode: "104455", quantity: 1, programCodes: ["kinawa"] }),
    OrderLockedError
  );
  assert.throws(() => engine.orders.removeLine(order.id, line.id), OrderLockedError);
  assert.throws(() => engine.orders.updateLine(order.id, line.id, { quantity: 5 }), OrderLockedError);
  assert.equal(lineCount(engine, order.id), 1);
  engine.close();
});

test("updateLine: changes quantity and programs, keeps what is not patched", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  const line = engine.orders.addLine(order.id, { itemCode: "104455", quantity: 1, programCodes: ["kinawa"], notes: "n" });

  const updated = engine.orders.updateLine(order.id, line.id, { programCodes: ["gsrp2", "toddler1"] });
  assert.deepEqual(updated.programs, ["gsrp2", "toddler1"]);
  assert.equal(updated.isGsrp, true);
  assert.equal(updated.quantity, 1);
  assert.equal(updated.notes, "n");

  assert.throws(() => engine.orders.updateLine(order.id, line.id, { programCodes: [] }), EmptyAllocationError);
  assert.equal(engine.orders.updateLine(order.id, line.id, { quantity: 4 }).quantity, 4);
  assert.equal(engine.orders.getOrder(order.id)?.totalEstimate, 95.96);
  engine.close();
});

test("removeLine: line must belong to the order", () => {
  const engine = engineWithCatalog();
  const a = engine.orders.createOrder({ name: "A" });
  const b = engine.orders.createOrder({ name: "B" });
  const line = engine.orders.addLine(a.id, { itemCode: "582271", quantity: 1, programCodes: ["kinawa"] });

  assert.throws(() => engine.orders.removeLine(b.id, line.id), UnknownOrderLineError);
  assert.equal(lineCount(engine, a.id), 1);
  engine.close();
});

// ── estimates ────────────────────────────────────────────────────────

test("recomputeEstimate follows current prices without touching the stored estimate", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa"] });
  assert.equal(engine.orders.getOrder(order.id)?.totalEstimate, 93.14);

  engine.invoices.recordInvoice(invoicePayload("INV-2", "2025-02-10", [{ itemCode: "582271", quantity: 1, unitPrice: 48 }]));

  assert.equal(engine.orders.recomputeEstimate(order.id), 96);
  assert.equal(engine.orders.getOrder(order.id)?.totalEstimate, 93.14);
  engine.close();
});

// ── delete / duplicate ───────────────────────────────────────────────

test("deleting a product on an order line is refused until the line is gone", () => {
  const engine = makeEngine();
  engine.products.upsertFromInvoiceLine({ itemCode: "777777", unitPrice: 5, observedDate: "2025-01-01" });
  const order = engine.orders.createOrder({ name: "Snacks" });
  const line = engine.orders.addLine(order.id, { itemCode: "777777", quantity: 1, programCodes: ["kinawa"] });

  assert.throws(
    () => engine.products.delete("777777"),
    (err: unknown) => err instanceof ProductInUseError && err.context.orderLines === 1
  );
  assert.notEqual(engine.products.find("777777"), undefined);

  engine.orders.removeLine(order.id, line.id);
  engine.products.delete("777777");
  assert.equal(engine.products.find("777777"), undefined);
  engine.close();
});

test("deleteOrder cascades to its lines", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Snacks" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 1, programCodes: ["kinawa"] });

  engine.orders.deleteOrder(order.id);
  assert.equal(engine.orders.getOrder(order.id), undefined);
  assert.equal(lineCount(engine, order.id), 0);
  engine.close();
});

test("duplicateOrder copies lines into a new draft", () => {
  const engine = engineWithCatalog();
  const order = engine.orders.createOrder({ name: "Weekly", notes: "tuesday" });
  engine.orders.addLine(order.id, { itemCode: "582271", quantity: 2, programCodes: ["kinawa", "cornell"] });
  engine.orders.transition(order.id, "ready");
  engine.orders.transition(order.id, "submitted", { confirmationNumber: "C1" });

  const copy = engine.orders.duplicateOrder(order.id);
  assert.notEqual(copy.id, order.id);
  assert.equal(copy.name, "Copy of Weekly");
  assert.equal(copy.status, "draft");
  assert.equal(copy.notes, "tuesday");
  assert.equal(copy.totalEstimate, 93.14);
  assert.deepEqual(copy.lines.map((l) => [l.itemCode, l.quantity, l.programs]), [["582271", 2, ["kinawa", "cornell"]]]);
  engine.close();
});

test("listOrders filters by status, newest first", () => {
  const engine = engineWithCatalog();
  const a = engine.orders.createOrder({ name: "A" });
  const b = engine.orders.createOrder({ name: "B" });
  engine.orders.addLine(b.id, { itemCode: "582271", quantity: 1, programCodes: ["kinawa"] });
  engine.orders.transition(b.id, "ready");

  assert.deepEqual(engine.orders.listOrders().map((o) => o.id), [b.id, a.id]);
  assert.deepEqual(engine.orders.listOrders({ status: "ready" }).map((o) => o.name), ["B"]);
  engine.close();
});
