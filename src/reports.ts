import { OrderCostAllocation, OrderWithLines, ProgramCostShare } from "./types.js";

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/**
 * Splits an amount evenly across program codes in whole cents. Leftover cents go to
 * the first codes in the given order, so the shares always add up to the amount.
 */
export function splitEvenly(amount: number, codes: string[]): ProgramCostShare[] {
  if (codes.length === 0) return [];
  const cents = toCents(amount);
  const base = Math.floor(cents / codes.length);
  const remainder = cents - base * codes.length;
  return codes.map((shortCode, i) => ({
    shortCode,
    amount: (base + (i < remainder ? 1 : 0)) / 100,
  }));
}

/**
 * Per-program cost of an order. Each line's quantity × unit price is shared evenly by
 * the programs it is allocated to; there is no per-program quantity.
 */
export function allocateOrderCost(order: OrderWithLines): OrderCostAllocation {
  const byProgram = new Map<string, number>();
  let totalCents = 0;
  for (const line of order.lines) {
    const lineCost = toCents(line.quantity * line.unitPrice) / 100;
    totalCents += toCents(lineCost);
    for (const share of splitEvenly(lineCost, line.programs)) {
      byProgram.set(share.shortCode, (byProgram.get(share.shortCode) ?? 0) + toCents(share.amount));
    }
  }
  return {
    orderId: order.id,
    total: totalCents / 100,
    byProgram: [...byProgram.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([shortCode, cents]) => ({ shortCode, amount: cents / 100 })),
  };
}
