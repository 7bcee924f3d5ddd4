import { z } from "zod";
import { parseOrThrow } from "./schemas.js";

const EnvSchema = z.object({
  ORDERING_DB_PATH: z.string().trim().min(1).default("./ordering.db"),
  ORDERING_PRICE_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  ORDERING_SEARCH_LIMIT: z.coerce.number().int().positive().default(50),
  ORDERING_SEED_PROGRAMS: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((v) => v === "true" || v === "1"),
});

export type OrderingConfig = {
  dbPath: string;
  priceTolerance: number;
  searchLimit: number;
  seedPrograms: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrderingConfig {
  const parsed = parseOrThrow(EnvSchema, env, "environment");
  return {
    dbPath: parsed.ORDERING_DB_PATH,
    priceTolerance: parsed.ORDERING_PRICE_TOLERANCE,
    searchLimit: parsed.ORDERING_SEARCH_LIMIT,
    seedPrograms: parsed.ORDERING_SEED_PROGRAMS,
  };
}
