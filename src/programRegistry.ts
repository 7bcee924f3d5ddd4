import fs from "node:fs";
import { z } from "zod";
import { OrderingDatabase } from "./database.js";
import { DuplicateProgramError, UnknownProgramError } from "./errors.js";
import { parseOrThrow, ProgramCategorySchema, ProgramDefinition, ProgramDefinitionSchema } from "./schemas.js";
import { Program, ProgramCategory } from "./types.js";

type ProgramRow = {
  id: number;
  name: string;
  short_code: string;
  category: string;
  color: string;
  is_active: number;
};

const DEFAULT_PROGRAMS_PATH = new URL("../data/programs.json", import.meta.url);

function toProgram(row: ProgramRow): Program {
  return {
    id: row.id,
    name: row.name,
    shortCode: row.short_code,
    category: parseOrThrow(ProgramCategorySchema, row.category, "programs.category"),
    color: row.color,
    isActive: row.is_active === 1,
  };
}

/** Reads the default program list shipped in data/programs.json. */
export function loadDefaultPrograms(path: string | URL = DEFAULT_PROGRAMS_PATH): ProgramDefinition[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path, "utf-8"));
  return parseOrThrow(z.array(ProgramDefinitionSchema), raw, "program seed");
}

export class ProgramRegistry {
  constructor(private readonly database: OrderingDatabase) {}

  private get db() {
    return this.database.db;
  }

  list(activeOnly = true): Program[] {
    const where = activeOnly ? "WHERE is_active = 1" : "";
    return this.db
      .prepare<[], ProgramRow>(`SELECT * FROM programs ${where} ORDER BY category, name`)
      .all()
      .map(toProgram);
  }

  byCategory(activeOnly = true): Partial<Record<ProgramCategory, Program[]>> {
    const groups: Partial<Record<ProgramCategory, Program[]>> = {};
    for (const program of this.list(activeOnly)) {
      const group = groups[program.category] ?? [];
      group.push(program);
      groups[program.category] = group;
    }
    return groups;
  }

  resolve(shortCode: string): Program | undefined {
    const row = this.db.prepare<[string], ProgramRow>("SELECT * FROM programs WHERE short_code=?").get(shortCode.trim());
    return row ? toProgram(row) : undefined;
  }

  /** Resolves a code to an active program or throws. */
  requireActive(shortCode: string): Program {
    const program = this.resolve(shortCode);
    if (!program) throw new UnknownProgramError(shortCode);
    if (!program.isActive) throw new UnknownProgramError(shortCode, "is inactive");
    return program;
  }

  create(input: unknown): Program {
    const definition = parseOrThrow(ProgramDefinitionSchema, input, "program");
    return this.database.transaction(() => {
      const clash = this.db
        .prepare<[string, string], ProgramRow>("SELECT * FROM programs WHERE short_code=? OR name=?")
        .get(definition.shortCode, definition.name);
      if (clash) throw new DuplicateProgramError(definition.shortCode, definition.name);
      this.db
        .prepare("INSERT INTO programs(name, short_code, category, color, is_active) VALUES(?, ?, ?, ?, 1)")
        .run(definition.name, definition.shortCode, definition.category, definition.color);
      this.database.addAudit("program.created", "program", definition.shortCode, definition.name);
      return this.requireActive(definition.shortCode);
    });
  }

  deactivate(shortCode: string): Program {
    return this.setActive(shortCode, false);
  }

  reactivate(shortCode: string): Program {
    return this.setActive(shortCode, true);
  }

  private setActive(shortCode: string, active: boolean): Program {
    const program = this.resolve(shortCode);
    if (!program) throw new UnknownProgramError(shortCode);
    if (program.isActive === active) return program;
    this.db.prepare("UPDATE programs SET is_active=? WHERE id=?").run(active ? 1 : 0, program.id);
    this.database.addAudit(active ? "program.reactivated" : "program.deactivated", "program", program.shortCode, "");
    return { ...program, isActive: active };
  }

  /** Inserts each program that is not there yet; existing rows are left untouched. Returns how many were added. */
  seed(definitions: ProgramDefinition[]): number {
    const insert = this.db.prepare(
      "INSERT OR IGNORE INTO programs(name, short_code, category, color, is_active) VALUES(?, ?, ?, ?, 1)"
    );
    return this.database.transaction(() => {
      let added = 0;
      for (const definition of definitions) {
        added += insert.run(definition.name, definition.shortCode, definition.category, definition.color).changes;
      }
      return added;
    });
  }
}
