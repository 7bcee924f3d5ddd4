export type ErrorContext = Record<string, unknown>;

export class OrderingError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.context = context;
  }
}

export class InvalidPriceError extends OrderingError {
  constructor(itemCode: string, price: number) {
    super("InvalidPriceError", `Unit price for item ${itemCode || "(blank)"} must be positive, got ${price}`, { itemCode, price });
  }
}

export class InvalidKeyError extends OrderingError {
  constructor(value: string) {
    super("InvalidKeyError", "Item code must not be empty", { value });
  }
}

export class InvalidQuantityError extends OrderingError {
  constructor(quantity: number, context: ErrorContext = {}) {
    super("InvalidQuantityError", `Quantity must be a positive integer, got ${quantity}`, { ...context, quantity });
  }
}

export class InvalidPayloadError extends OrderingError {
  constructor(subject: string, issues: string[]) {
    super("InvalidPayloadError", `Invalid ${subject}: ${issues.join("; ")}`, { subject, issues });
  }
}

export class DuplicateInvoiceError extends OrderingError {
  constructor(invoiceNumber: string) {
    super("DuplicateInvoiceError", `Invoice ${invoiceNumber} has already been recorded`, { invoiceNumber });
  }
}

export class DuplicateProgramError extends OrderingError {
  constructor(shortCode: string, name: string) {
    super("DuplicateProgramError", `Program ${shortCode} (${name}) already exists`, { shortCode, name });
  }
}

export class UnknownProductError extends OrderingError {
  constructor(itemCode: string, reason = "not found") {
    super("UnknownProductError", `Product ${itemCode} ${reason}`, { itemCode, reason });
  }
}

export class UnknownProgramError extends OrderingError {
  constructor(shortCode: string, reason = "not found") {
    super("UnknownProgramError", `Program ${shortCode} ${reason}`, { shortCode, reason });
  }
}

export class UnknownOrderError extends OrderingError {
  constructor(orderId: number) {
    super("UnknownOrderError", `Order ${orderId} not found`, { orderId });
  }
}

export class UnknownOrderLineError extends OrderingError {
  constructor(orderId: number, lineId: number) {
    super("UnknownOrderLineError", `Line ${lineId} does not belong to order ${orderId}`, { orderId, lineId });
  }
}

export class UnknownInvoiceError extends OrderingError {
  constructor(invoiceNumber: string) {
    super("UnknownInvoiceError", `Invoice ${invoiceNumber} not found`, { invoiceNumber });
  }
}

export class EmptyAllocationError extends OrderingError {
  constructor(orderId: number, itemCode: string) {
    super("EmptyAllocationError", `Line for ${itemCode} on order ${orderId} must be allocated to at least one program`, { orderId, itemCode });
  }
}

export class OrderLockedError extends OrderingError {
  constructor(orderId: number, status: string) {
    super("OrderLockedError", `Order ${orderId} is ${status} and can no longer be edited`, { orderId, status });
  }
}

export class InvalidTransitionError extends OrderingError {
  constructor(orderId: number, from: string, to: string, reason?: string) {
    super(
      "InvalidTransitionError",
      `Order ${orderId} cannot move from ${from} to ${to}${reason ? `: ${reason}` : ""}`,
      { orderId, from, to, reason }
    );
  }
}

export class IncompleteSubmissionError extends OrderingError {
  constructor(orderId: number, field: string) {
    super("IncompleteSubmissionError", `Order ${orderId} is missing ${field}`, { orderId, field });
  }
}

export class ProductInUseError extends OrderingError {
  constructor(itemCode: string, orderLines: number, invoiceLines: number) {
    super(
      "ProductInUseError",
      `Product ${itemCode} is referenced by ${orderLines} order line(s) and ${invoiceLines} invoice line(s)`,
      { itemCode, orderLines, invoiceLines }
    );
  }
}
