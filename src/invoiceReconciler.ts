import Database from "better-sqlite3";
import { OrderingDatabase, roundMoney } from "./database.js";
import { DuplicateInvoiceError, UnknownInvoiceError } from "./errors.js";
import { assertValidSighting, ProductStore } from "./productStore.js";
import { ParsedInvoice, ParsedInvoiceLine, ParsedInvoiceSchema, parseOrThrow } from "./schemas.js";
import {
  AuditEntry,
  ExtendedPriceMismatch,
  InvoiceLine,
  InvoiceRecord,
  InvoiceWithLines,
  ReconciliationResult,
} from "./types.js";

type InvoiceRow = {
  id: number;
  invoice_number: string;
  invoice_date: string | null;
  delivery_date: string | null;
  location: string | null;
  total_amount: number | null;
  item_count: number;
  invoice_pdf_path: string | null;
  parsed_data: string;
  processed_date: string;
};

type InvoiceLineRow = {
  id: number;
  invoice_id: number;
  product_id: number;
  item_code: string;
  quantity: number;
  unit_price: number;
  extended_price: number;
  price_mismatch: number;
};

export type InvoiceReconcilerOptions = {
  priceTolerance?: number;
};

export type InvoiceListFilter = {
  from?: string;
  to?: string;
  limit?: number;
};

// Float noise on cent arithmetic must not trip the tolerance.
const EPSILON = 1e-9;

function toInvoice(row: InvoiceRow): InvoiceRecord {
  return {
    id: row.id,
    invoiceNumber: row.invoice_number,
    invoiceDate: row.invoice_date ?? undefined,
    deliveryDate: row.delivery_date ?? undefined,
    location: row.location ?? undefined,
    totalAmount: row.total_amount ?? undefined,
    itemCount: row.item_count,
    documentPath: row.invoice_pdf_path ?? undefined,
    parsedData: JSON.parse(row.parsed_data),
    processedDate: row.processed_date,
  };
}

function toInvoiceLine(row: InvoiceLineRow): InvoiceLine {
  return {
    id: row.id,
    invoiceId: row.invoice_id,
    productId: row.product_id,
    itemCode: row.item_code,
    quantity: row.quantity,
    unitPrice: row.unit_price,
    extendedPrice: row.extended_price,
    priceMismatch: row.price_mismatch === 1,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export class InvoiceReconciler {
  private readonly tolerance: number;

  constructor(
    private readonly database: OrderingDatabase,
    private readonly products: ProductStore,
    options: InvoiceReconcilerOptions = {}
  ) {
    this.tolerance = options.priceTolerance ?? 0.01;
  }

  private get db() {
    return this.database.db;
  }

  /**
   * Records a parsed invoice and merges its lines into the catalog in one transaction.
   *
   * An item code repeated within the invoice counts as a single sighting: the first
   * line feeds the catalog, every line is still stored.
   */
  recordInvoice(payload: unknown): ReconciliationResult {
    const invoice = parseOrThrow(ParsedInvoiceSchema, payload, "invoice payload");
    try {
      return this.database.transaction(() => this.apply(invoice));
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateInvoiceError(invoice.invoiceNumber);
      throw err;
    }
  }

  private apply(invoice: ParsedInvoice): ReconciliationResult {
    const number = invoice.invoiceNumber;
    if (this.findRow(number)) throw new DuplicateInvoiceError(number);

    const auditTrail: AuditEntry[] = [];
    const warnings: ExtendedPriceMismatch[] = [];
    const createdProducts: string[] = [];
    const updatedProducts: string[] = [];
    const productIds = new Map<string, number>();
    const processedDate = this.database.today();
    const observedDate = invoice.invoiceDate ?? invoice.deliveryDate ?? processedDate;

    const info = this.db
      .prepare(
        `INSERT INTO invoice_history(invoice_number, invoice_date, delivery_date, location, total_amount,
          item_count, invoice_pdf_path, parsed_data, processed_date)
         VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        number,
        invoice.invoiceDate ?? null,
        invoice.deliveryDate ?? null,
        invoice.location ?? null,
        invoice.totalAmount ?? null,
        invoice.lines.length,
        invoice.documentPath ?? null,
        JSON.stringify(invoice),
        processedDate
      );
    const invoiceId = Number(info.lastInsertRowid);
    const insertLine = this.db.prepare(
      `INSERT INTO invoice_items(invoice_id, product_id, quantity, unit_price, extended_price, price_mismatch)
       VALUES(?, ?, ?, ?, ?, ?)`
    );

    invoice.lines.forEach((line, index) => {
      const itemCode = assertValidSighting(line.itemCode, line.unitPrice);
      let productId = productIds.get(itemCode);
      if (productId === undefined) {
        const result = this.products.upsertFromInvoiceLine({
          itemCode,
          description: line.description,
          brand: line.brand,
          packSize: line.packSize,
          categoryCode: line.category,
          categoryName: line.categoryName,
          unitPrice: line.unitPrice,
          observedDate,
        });
        productId = result.product.id;
        productIds.set(itemCode, productId);
        (result.created ? createdProducts : updatedProducts).push(itemCode);
      }

      const mismatch = this.checkExtendedPrice(number, index, itemCode, line);
      if (mismatch) {
        warnings.push(mismatch);
        auditTrail.push(
          this.database.addAudit(
            "invoice.line_mismatch",
            "invoice",
            number,
            `line ${index + 1} (${itemCode}): ${line.quantity} x ${line.unitPrice} = ${mismatch.expected}, invoice says ${line.extendedPrice}`
          )
        );
      }
      insertLine.run(invoiceId, productId, line.quantity, line.unitPrice, line.extendedPrice, mismatch ? 1 : 0);
    });

    auditTrail.push(
      this.database.addAudit(
        "invoice.recorded",
        "invoice",
        number,
        `${invoice.lines.length} lines, ${createdProducts.length} new products, ${updatedProducts.length} updated, ${warnings.length} mismatches`
      )
    );

    return {
      invoice: this.requireInvoice(number),
      lines: this.linesFor(invoiceId),
      warnings,
      createdProducts,
      updatedProducts,
      auditTrail,
    };
  }

  private checkExtendedPrice(
    invoiceNumber: string,
    lineIndex: number,
    itemCode: string,
    line: ParsedInvoiceLine
  ): ExtendedPriceMismatch | undefined {
    const expected = roundMoney(line.quantity * line.unitPrice);
    if (Math.abs(expected - line.extendedPrice) <= this.tolerance + EPSILON) return undefined;
    return {
      kind: "ExtendedPriceMismatch",
      invoiceNumber,
      lineIndex,
      itemCode,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      extendedPrice: line.extendedPrice,
      expected,
    };
  }

  private findRow(invoiceNumber: string): InvoiceRow | undefined {
    return this.db
      .prepare<[string], InvoiceRow>("SELECT * FROM invoice_history WHERE invoice_number=?")
      .get(invoiceNumber.trim());
  }

  private requireInvoice(invoiceNumber: string): InvoiceRecord {
    const row = this.findRow(invoiceNumber);
    if (!row) throw new UnknownInvoiceError(invoiceNumber);
    return toInvoice(row);
  }

  private linesFor(invoiceId: number): InvoiceLine[] {
    return this.db
      .prepare<[number], InvoiceLineRow>(
        `SELECT ii.*, p.item_code FROM invoice_items ii
         JOIN products p ON p.id = ii.product_id
         WHERE ii.invoice_id=? ORDER BY ii.id`
      )
      .all(invoiceId)
      .map(toInvoiceLine);
  }

  getInvoice(invoiceNumber: string): InvoiceWithLines | undefined {
    const row = this.findRow(invoiceNumber);
    if (!row) return undefined;
    return { ...toInvoice(row), lines: this.linesFor(row.id) };
  }

  listInvoices(filter: InvoiceListFilter = {}): InvoiceRecord[] {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (filter.from) {
      clauses.push("invoice_date >= ?");
      values.push(filter.from);
    }
    if (filter.to) {
      clauses.push("invoice_date <= ?");
      values.push(filter.to);
    }
    values.push(filter.limit ?? 50);
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    return this.db
      .prepare<unknown[], InvoiceRow>(`SELECT * FROM invoice_history ${where} ORDER BY invoice_date DESC, id DESC LIMIT ?`)
      .all(...values)
      .map(toInvoice);
  }

  /**
   * Administrative removal of a stored invoice and its lines. Catalog history and
   * order counts already applied from it stay as they are.
   */
  deleteInvoice(invoiceNumber: string) {
    const row = this.findRow(invoiceNumber);
    if (!row) throw new UnknownInvoiceError(invoiceNumber);
    this.database.transaction(() => {
      this.db.prepare("DELETE FROM invoice_history WHERE id=?").run(row.id);
      this.database.addAudit("invoice.deleted", "invoice", row.invoice_number, `${row.item_count} lines removed`);
    });
  }

  /** Records an invoice again after `deleteInvoice`; refused while the stored record exists. */
  reprocess(payload: unknown): ReconciliationResult {
    const invoice = parseOrThrow(ParsedInvoiceSchema, payload, "invoice payload");
    return this.database.transaction(() => {
      if (this.findRow(invoice.invoiceNumber)) throw new DuplicateInvoiceError(invoice.invoiceNumber);
      const result = this.recordInvoice(invoice);
      result.auditTrail.push(
        this.database.addAudit("invoice.reprocessed", "invoice", invoice.invoiceNumber, "recorded again after deletion")
      );
      return result;
    });
  }
}
