import { OrderingEngine } from "../engine.js";
import { ParsedInvoiceInput } from "../schemas.js";

export const TODAY = "2025-03-01";

export function makeEngine(options: { seedPrograms?: boolean } = {}) {
  return new OrderingEngine({
    dbPath: ":memory:",
    now: () => new Date(`${TODAY}T12:00:00Z`),
    seedPrograms: options.seedPrograms,
  });
}

type LineSpec = {
  itemCode: string;
  quantity: number;
  unitPrice: number;
  extendedPrice?: number;
  description?: string;
  brand?: string;
  category?: string;
};

export function invoicePayload(invoiceNumber: string, invoiceDate: string, lines: LineSpec[]): ParsedInvoiceInput {
  return {
    invoiceNumber,
    invoiceDate,
    deliveryDate: invoiceDate,
    location: "TEST SCHOOL",
    totalAmount: lines.reduce((sum, l) => sum + (l.extendedPrice ?? l.quantity * l.unitPrice), 0),
    lines: lines.map((l) => ({
      itemCode: l.itemCode,
      description: l.description ?? `ITEM ${l.itemCode}`,
      brand: l.brand ?? "Test",
      packSize: "1x1 EA",
      category: l.category ?? "GR",
      quantity: l.quantity,
      unitPrice: l.unitPrice,
      extendedPrice: l.extendedPrice ?? Math.round(l.quantity * l.unitPrice * 100) / 100,
    })),
  };
}
