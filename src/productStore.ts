import { OrderingDatabase, roundMoney } from "./database.js";
import { InvalidKeyError, InvalidPriceError, ProductInUseError, UnknownProductError } from "./errors.js";
import { CodeSetSchema, decodeJsonColumn, PriceHistorySchema } from "./schemas.js";
import { CategorySummary, PricePoint, Product } from "./types.js";

/** Vendor category codes as they appear on invoices. */
export const CATEGORY_NAMES: Readonly<Record<string, string>> = {
  PR: "Produce",
  GR: "Grocery",
  FR: "Frozen",
  DY: "Dairy",
  BV: "Beverage",
  CN: "Canned",
  PA: "Paper",
  CH: "Chemical/Cleaning",
  EQ: "Equipment",
  PU: "Packaging/Supply",
};

export function categoryNameFor(code: string): string {
  return CATEGORY_NAMES[code] ?? code;
}

type ProductRow = {
  id: number;
  item_code: string;
  description: string;
  brand: string | null;
  pack_size: string | null;
  category_code: string | null;
  category_name: string | null;
  unit_price: number;
  price_history: string;
  first_seen: string;
  last_seen: string;
  order_count: number;
  preferred_programs: string | null;
  tags: string | null;
  is_active: number;
};

export type CatalogSighting = {
  itemCode: string;
  description?: string;
  brand?: string;
  packSize?: string;
  categoryCode?: string;
  categoryName?: string;
  unitPrice: number;
  observedDate: string;
};

export type UpsertResult = {
  product: Product;
  created: boolean;
  priceChanged: boolean;
};

export type ProductSearch = {
  category?: string;
  activeOnly?: boolean;
  query?: string;
  limit?: number;
};

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    itemCode: row.item_code,
    description: row.description,
    brand: row.brand ?? "",
    packSize: row.pack_size ?? "",
    categoryCode: row.category_code ?? "",
    categoryName: row.category_name ?? "",
    unitPrice: row.unit_price,
    priceHistory: decodeJsonColumn(PriceHistorySchema, row.price_history, "products.price_history"),
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    orderCount: row.order_count,
    preferredPrograms: decodeJsonColumn(CodeSetSchema, row.preferred_programs, "products.preferred_programs"),
    tags: decodeJsonColumn(CodeSetSchema, row.tags, "products.tags"),
    isActive: row.is_active === 1,
  };
}

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter(Boolean))];
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Rejects sightings that can never become a catalog entry; returns the trimmed item code. */
export function assertValidSighting(itemCode: string, unitPrice: number): string {
  const code = itemCode.trim();
  if (!code) throw new InvalidKeyError(itemCode);
  // Stored prices are whole cents, so a sub-cent price would land as zero.
  if (!Number.isFinite(unitPrice) || roundMoney(unitPrice) <= 0) throw new InvalidPriceError(code, unitPrice);
  return code;
}

export class ProductStore {
  private readonly searchLimit: number;

  constructor(private readonly database: OrderingDatabase, options: { searchLimit?: number } = {}) {
    this.searchLimit = options.searchLimit ?? 50;
  }

  private get db() {
    return this.database.db;
  }

  find(itemCode: string): Product | undefined {
    const row = this.db.prepare<[string], ProductRow>("SELECT * FROM products WHERE item_code=?").get(itemCode.trim());
    return row ? toProduct(row) : undefined;
  }

  findById(id: number): Product | undefined {
    const row = this.db.prepare<[number], ProductRow>("SELECT * FROM products WHERE id=?").get(id);
    return row ? toProduct(row) : undefined;
  }

  private require(itemCode: string): Product {
    const product = this.find(itemCode);
    if (!product) throw new UnknownProductError(itemCode);
    return product;
  }

  /**
   * Merges one invoice sighting into the catalog.
   *
   * Price history only grows: a new point is appended when the price moved and the
   * sighting is not older than the last recorded point. Free-text fields follow the
   * most recent sighting that carries a value. An inactive product seen after its
   * last sighting is active again.
   */
  upsertFromInvoiceLine(sighting: CatalogSighting): UpsertResult {
    const itemCode = assertValidSighting(sighting.itemCode, sighting.unitPrice);
    const price = roundMoney(sighting.unitPrice);
    const observed = sighting.observedDate;
    const categoryCode = sighting.categoryCode?.trim() ?? "";
    const categoryName = sighting.categoryName?.trim() || (categoryCode ? categoryNameFor(categoryCode) : "");

    return this.database.transaction(() => {
      const existing = this.find(itemCode);
      if (!existing) {
        const history: PricePoint[] = [{ date: observed, price }];
        this.db
          .prepare(
            `INSERT INTO products(item_code, description, brand, pack_size, category_code, category_name,
              unit_price, price_history, first_seen, last_seen, order_count, preferred_programs, tags, is_active)
             VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, '[]', '[]', 1)`
          )
          .run(
            itemCode,
            sighting.description?.trim() ?? "",
            sighting.brand?.trim() ?? "",
            sighting.packSize?.trim() ?? "",
            categoryCode,
            categoryName,
            price,
            JSON.stringify(history),
            observed,
            observed
          );
        this.database.addAudit("product.created", "product", itemCode, `first seen ${observed} at ${price.toFixed(2)}`);
        return { product: this.require(itemCode), created: true, priceChanged: false };
      }

      const history = [...existing.priceHistory];
      const lastPoint = history[history.length - 1];
      let unitPrice = existing.unitPrice;
      let priceChanged = false;
      if (price !== existing.unitPrice && (!lastPoint || observed >= lastPoint.date)) {
        history.push({ date: observed, price });
        unitPrice = price;
        priceChanged = true;
      }

      const isLatest = observed >= existing.lastSeen;
      const seenAgain = !existing.isActive && observed > existing.lastSeen;
      const refresh = (next: string | undefined, current: string) => {
        const value = next?.trim();
        return isLatest && value ? value : current;
      };

      this.db
        .prepare(
          `UPDATE products SET description=?, brand=?, pack_size=?, category_code=?, category_name=?,
            unit_price=?, price_history=?, first_seen=?, last_seen=?, order_count=order_count+1,
            is_active=?
           WHERE id=?`
        )
        .run(
          refresh(sighting.description, existing.description),
          refresh(sighting.brand, existing.brand),
          refresh(sighting.packSize, existing.packSize),
          refresh(categoryCode, existing.categoryCode),
          refresh(categoryName, existing.categoryName),
          unitPrice,
          JSON.stringify(history),
          observed < existing.firstSeen ? observed : existing.firstSeen,
          isLatest ? observed : existing.lastSeen,
          existing.isActive || seenAgain ? 1 : 0,
          existing.id
        );
      if (seenAgain) {
        this.database.addAudit("product.reactivated", "product", itemCode, `seen again on ${observed}`);
      }
      if (priceChanged) {
        this.database.addAudit(
          "product.price_changed",
          "product",
          itemCode,
          `${existing.unitPrice.toFixed(2)} -> ${price.toFixed(2)} on ${observed}`
        );
      }
      return { product: this.require(itemCode), created: false, priceChanged };
    });
  }

  /** Snapshot of matching products: exact code match first, then most ordered and most recently seen. */
  search(filter: ProductSearch = {}): Product[] {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (filter.activeOnly ?? true) {
      clauses.push("is_active = 1");
    }
    if (filter.category) {
      clauses.push("category_code = ?");
      values.push(filter.category);
    }
    const query = filter.query?.trim();
    const orderBy = ["order_count DESC", "last_seen DESC", "description"];
    if (query) {
      const like = `%${escapeLike(query)}%`;
      clauses.push("(description LIKE ? ESCAPE '\\' OR brand LIKE ? ESCAPE '\\' OR item_code LIKE ? ESCAPE '\\')");
      values.push(like, like, like);
      orderBy.unshift("CASE WHEN item_code = ? THEN 0 ELSE 1 END");
      values.push(query);
    }
    values.push(filter.limit ?? this.searchLimit);
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<unknown[], ProductRow>(
        `SELECT * FROM products ${where} ORDER BY ${orderBy.join(", ")} LIMIT ?`
      )
      .all(...values);
    return rows.map(toProduct);
  }

  deactivate(itemCode: string): Product {
    return this.setActive(itemCode, false);
  }

  reactivate(itemCode: string): Product {
    return this.setActive(itemCode, true);
  }

  private setActive(itemCode: string, active: boolean): Product {
    const product = this.require(itemCode);
    if (product.isActive === active) return product;
    this.db.prepare("UPDATE products SET is_active=? WHERE id=?").run(active ? 1 : 0, product.id);
    this.database.addAudit(active ? "product.reactivated" : "product.deactivated", "product", product.itemCode, "");
    return { ...product, isActive: active };
  }

  /** Deactivates every active product last seen before `cutoffDate`; returns their codes. */
  deactivateNotSeenSince(cutoffDate: string): string[] {
    return this.database.transaction(() => {
      const codes = this.db
        .prepare<[string], { item_code: string }>(
          "SELECT item_code FROM products WHERE is_active = 1 AND last_seen < ? ORDER BY item_code"
        )
        .all(cutoffDate)
        .map((r) => r.item_code);
      for (const code of codes) {
        this.db.prepare("UPDATE products SET is_active = 0 WHERE item_code=?").run(code);
        this.database.addAudit("product.deactivated", "product", code, `not seen since ${cutoffDate}`);
      }
      return codes;
    });
  }

  setTags(itemCode: string, tags: string[]): Product {
    const product = this.require(itemCode);
    const next = uniqueTrimmed(tags);
    this.db.prepare("UPDATE products SET tags=? WHERE id=?").run(JSON.stringify(next), product.id);
    return { ...product, tags: next };
  }

  addPreferredPrograms(itemCode: string, codes: string[]): Product {
    const product = this.require(itemCode);
    const next = uniqueTrimmed([...product.preferredPrograms, ...codes]);
    if (next.length !== product.preferredPrograms.length) {
      this.db.prepare("UPDATE products SET preferred_programs=? WHERE id=?").run(JSON.stringify(next), product.id);
    }
    return { ...product, preferredPrograms: next };
  }

  /** Removes a product nothing refers to; referenced products must be detached first. */
  delete(itemCode: string) {
    const product = this.require(itemCode);
    const count = (table: "order_items" | "invoice_items") =>
      this.db.prepare<[number], { n: number }>(`SELECT COUNT(*) AS n FROM ${table} WHERE product_id=?`).get(product.id)?.n ?? 0;
    const orderLines = count("order_items");
    const invoiceLines = count("invoice_items");
    if (orderLines > 0 || invoiceLines > 0) {
      throw new ProductInUseError(product.itemCode, orderLines, invoiceLines);
    }
    this.db.prepare("DELETE FROM products WHERE id=?").run(product.id);
    this.database.addAudit("product.deleted", "product", product.itemCode, "");
  }

  categorySummary(): CategorySummary[] {
    const rows = this.db
      .prepare<[], { category_code: string | null; category_name: string | null; count: number; avg_price: number }>(
        `SELECT category_code, MAX(category_name) AS category_name, COUNT(*) AS count, AVG(unit_price) AS avg_price
         FROM products WHERE is_active = 1
         GROUP BY category_code ORDER BY count DESC, category_code`
      )
      .all();
    return rows.map((row) => ({
      categoryCode: row.category_code ?? "",
      categoryName: row.category_name ?? "",
      count: row.count,
      averagePrice: roundMoney(row.avg_price),
    }));
  }

  frequentlyOrdered(limit = 20): Product[] {
    return this.db
      .prepare<[number], ProductRow>(
        "SELECT * FROM products WHERE is_active = 1 ORDER BY order_count DESC, last_seen DESC LIMIT ?"
      )
      .all(limit)
      .map(toProduct);
  }
}
