import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "./config.js";
import { OrderingEngine } from "./engine.js";
import { OrderingError } from "./errors.js";

const config = loadConfig();
const dataPath = path.resolve(process.argv[2] ?? "data/sampleInvoices.json");

const payloads: unknown[] = JSON.parse(fs.readFileSync(dataPath, "utf-8"));

const engine = OrderingEngine.fromConfig(config);

console.log(`Reconciling ${payloads.length} invoices into ${config.dbPath}...\n`);

for (const payload of payloads) {
  try {
    const result = engine.invoices.recordInvoice(payload);
    console.log(`Invoice ${result.invoice.invoiceNumber}`);
    console.log(JSON.stringify({ created: result.createdProducts, updated: result.updatedProducts, warnings: result.warnings }, null, 2));
  } catch (err) {
    if (!(err instanceof OrderingError)) throw err;
    console.log(`Skipped: ${err.code} ${err.message}`);
  }
  console.log("---------------------------------------------\n");
}

const frequent = engine.products.frequentlyOrdered(3);
const order = engine.orders.createOrder({ name: "Weekly Snack Order", createdBy: "demo" });
for (const product of frequent) {
  engine.orders.addLine(order.id, { itemCode: product.itemCode, quantity: 2, programCodes: ["kinawa", "cornell"] });
}

console.log("Catalog by category:");
console.log(JSON.stringify(engine.products.categorySummary(), null, 2));
console.log(`\nDraft order ${order.id}, estimate ${engine.orders.recomputeEstimate(order.id).toFixed(2)}`);
console.log(JSON.stringify(engine.allocateCost(order.id), null, 2));

engine.close();
console.log("\nDemo finished. Inspect the database for the catalog and audit log.");
