import { z } from "zod";
import { InvalidPayloadError } from "./errors.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const optionalText = z.string().trim().optional().default("");

export const ParsedInvoiceLineSchema = z.object({
  itemCode: z.string(),
  description: optionalText,
  brand: optionalText,
  packSize: optionalText,
  category: optionalText,
  categoryName: z.string().trim().optional(),
  quantity: z.number().int().nonnegative(),
  unitPrice: z.number(),
  extendedPrice: z.number(),
});

export const ParsedInvoiceSchema = z.object({
  invoiceNumber: z.string().trim().min(1),
  invoiceDate: isoDate.optional(),
  deliveryDate: isoDate.optional(),
  location: z.string().trim().optional(),
  totalAmount: z.number().optional(),
  documentPath: z.string().optional(),
  lines: z.array(ParsedInvoiceLineSchema),
});

export type ParsedInvoiceInput = z.input<typeof ParsedInvoiceSchema>;
export type ParsedInvoice = z.output<typeof ParsedInvoiceSchema>;
export type ParsedInvoiceLine = z.output<typeof ParsedInvoiceLineSchema>;

export const ProgramCategorySchema = z.enum(["before_after", "toddler", "infant", "gsrp"]);

export const ProgramDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  shortCode: z.string().trim().min(1),
  category: ProgramCategorySchema,
  color: z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected #RRGGBB"),
});

export type ProgramDefinition = z.infer<typeof ProgramDefinitionSchema>;

export const OrderStatusSchema = z.enum(["draft", "ready", "submitted", "completed"]);

export const NewOrderSchema = z.object({
  name: z.string().trim().min(1),
  deliveryDate: isoDate.optional(),
  notes: z.string().optional(),
  createdBy: z.string().trim().optional(),
});

export type NewOrder = z.input<typeof NewOrderSchema>;

export const TransitionPayloadSchema = z.object({
  confirmationNumber: z.string().optional(),
  submittedDate: isoDate.optional(),
  actualTotal: z.number().optional(),
});

export type TransitionPayload = z.infer<typeof TransitionPayloadSchema>;

export const PriceHistorySchema = z.array(z.object({ date: z.string(), price: z.number() }));
export const CodeSetSchema = z.array(z.string());

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, subject: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new InvalidPayloadError(subject, issues);
  }
  return result.data;
}

/** Decodes a JSON text column; NULL and empty strings read as the empty collection. */
export function decodeJsonColumn<T extends z.ZodTypeAny>(schema: T, raw: string | null, column: string): z.output<T> {
  return parseOrThrow(schema, raw ? JSON.parse(raw) : [], column);
}
