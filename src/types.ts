export type ProgramCategory = "before_after" | "toddler" | "infant" | "gsrp";

export type OrderStatus = "draft" | "ready" | "submitted" | "completed";

export type PricePoint = {
  date: string;
  price: number;
};

export type Product = {
  id: number;
  itemCode: string;
  description: string;
  brand: string;
  packSize: string;
  categoryCode: string;
  categoryName: string;
  unitPrice: number;
  priceHistory: PricePoint[];
  firstSeen: string;
  lastSeen: string;
  orderCount: number;
  preferredPrograms: string[];
  tags: string[];
  isActive: boolean;
};

export type Program = {
  id: number;
  name: string;
  shortCode: string;
  category: ProgramCategory;
  color: string;
  isActive: boolean;
};

export type Order = {
  id: number;
  name: string;
  createdDate: string;
  deliveryDate?: string;
  status: OrderStatus;
  totalEstimate: number;
  actualTotal?: number;
  notes?: string;
  createdBy?: string;
  submittedDate?: string;
  confirmationNumber?: string;
};

export type OrderLine = {
  id: number;
  orderId: number;
  productId: number;
  quantity: number;
  programs: string[];
  isGsrp: boolean;
  notes?: string;
};

export type OrderLineDetail = OrderLine & {
  itemCode: string;
  description: string;
  brand: string;
  packSize: string;
  categoryName: string;
  unitPrice: number;
};

export type OrderWithLines = Order & {
  lines: OrderLineDetail[];
};

export type InvoiceRecord = {
  id: number;
  invoiceNumber: string;
  invoiceDate?: string;
  deliveryDate?: string;
  location?: string;
  totalAmount?: number;
  itemCount: number;
  documentPath?: string;
  parsedData: unknown;
  processedDate: string;
};

export type InvoiceLine = {
  id: number;
  invoiceId: number;
  productId: number;
  itemCode: string;
  quantity: number;
  unitPrice: number;
  extendedPrice: number;
  priceMismatch: boolean;
};

export type InvoiceWithLines = InvoiceRecord & {
  lines: InvoiceLine[];
};

/** Warning raised when a line's extended price disagrees with quantity × unit price. */
export type ExtendedPriceMismatch = {
  kind: "ExtendedPriceMismatch";
  invoiceNumber: string;
  lineIndex: number;
  itemCode: string;
  quantity: number;
  unitPrice: number;
  extendedPrice: number;
  expected: number;
};

export type AuditEntry = {
  event: string;
  entity: "product" | "program" | "order" | "invoice";
  entityId: string;
  timestamp: string;
  details: string;
};

export type ReconciliationResult = {
  invoice: InvoiceRecord;
  lines: InvoiceLine[];
  warnings: ExtendedPriceMismatch[];
  createdProducts: string[];
  updatedProducts: string[];
  auditTrail: AuditEntry[];
};

export type ProgramCostShare = {
  shortCode: string;
  amount: number;
};

export type OrderCostAllocation = {
  orderId: number;
  total: number;
  byProgram: ProgramCostShare[];
};

export type CategorySummary = {
  categoryCode: string;
  categoryName: string;
  count: number;
  averagePrice: number;
};
