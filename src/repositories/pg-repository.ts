import type { QueryResultRow } from "pg";
import { z } from "zod";
import { IntegrityError, NotFoundError, UniquenessViolation, ValidationError } from "../errors";
import type { Entity, TableDefinition } from "./tables";
import type { NewRecord, RecordPatch, Repository, Where } from "./types";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

const pgErrorSchema = z.object({
  code: z.string(),
  constraint: z.string().optional(),
  detail: z.string().optional(),
  message: z.string().optional(),
});

const countSchema = z.object({ count: z.number().int() });

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";
const CHECK_VIOLATION = "23514";

/** Maps PostgreSQL constraint failures onto the registry's error types. */
export const translateError = (error: unknown, entity: string): unknown => {
  const parsed = pgErrorSchema.safeParse(error);
  if (!parsed.success) {
    return error;
  }
  const { code, constraint, detail, message } = parsed.data;
  switch (code) {
    case UNIQUE_VIOLATION:
      return new UniquenessViolation(entity, constraint ? [constraint] : [], detail ?? message);
    case FOREIGN_KEY_VIOLATION:
    case CHECK_VIOLATION:
      return new IntegrityError(detail ?? message ?? `${entity} violates ${constraint ?? code}`);
    default:
      return error;
  }
};

export class PgRepository<T extends Entity> implements Repository<T> {
  private readonly columns: Map<string, string>;
  private readonly selectList: string;

  constructor(
    readonly definition: TableDefinition<T>,
    private readonly db: Queryable
  ) {
    const entries: Array<[string, string]> = Object.entries(definition.columns);
    this.columns = new Map(entries);
    this.selectList = ["id", ...entries.map(([field, column]) => `${column} AS "${field}"`)].join(", ");
  }

  async findById(id: number): Promise<T | null> {
    const result = await this.run(
      `SELECT ${this.selectList} FROM ${this.definition.table} WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? this.toRecord(result.rows[0]) : null;
  }

  async findOne(where: Where<T>): Promise<T | null> {
    const values: unknown[] = [];
    const clause = this.whereClause(where, values);
    const result = await this.run(
      `SELECT ${this.selectList} FROM ${this.definition.table}${clause} ORDER BY id LIMIT 1`,
      values
    );
    return result.rows.length > 0 ? this.toRecord(result.rows[0]) : null;
  }

  async findMany(where?: Where<T>): Promise<T[]> {
    const values: unknown[] = [];
    const clause = this.whereClause(where, values);
    const result = await this.run(
      `SELECT ${this.selectList} FROM ${this.definition.table}${clause} ORDER BY id`,
      values
    );
    return result.rows.map((row) => this.toRecord(row));
  }

  async count(where?: Where<T>): Promise<number> {
    const values: unknown[] = [];
    const clause = this.whereClause(where, values);
    const result = await this.run(`SELECT COUNT(*)::int AS count FROM ${this.definition.table}${clause}`, values);
    return countSchema.parse(result.rows[0]).count;
  }

  async create(data: NewRecord<T>): Promise<T> {
    const columns: string[] = [];
    const values: unknown[] = [];
    for (const [field, value] of Object.entries(data)) {
      if (value === undefined) continue;
      columns.push(this.columnFor(field));
      values.push(value);
    }
    const placeholders = values.map((_value, index) => `$${index + 1}`).join(", ");
    const result = await this.run(
      `INSERT INTO ${this.definition.table} (${columns.join(", ")}) VALUES (${placeholders}) RETURNING ${this.selectList}`,
      values
    );
    return this.toRecord(result.rows[0]);
  }

  async update(id: number, patch: RecordPatch<T>): Promise<T> {
    const assignments: string[] = [];
    const values: unknown[] = [];
    for (const [field, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${this.columnFor(field)} = $${values.length}`);
    }
    if (assignments.length === 0) {
      const existing = await this.findById(id);
      if (!existing) throw new NotFoundError(this.definition.entity, id);
      return existing;
    }
    values.push(id);
    const result = await this.run(
      `UPDATE ${this.definition.table} SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${this.selectList}`,
      values
    );
    if (result.rows.length === 0) {
      throw new NotFoundError(this.definition.entity, id);
    }
    return this.toRecord(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.run(`DELETE FROM ${this.definition.table} WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  private whereClause(where: Where<T> | undefined, values: unknown[]): string {
    if (!where) return "";
    const clauses: string[] = [];
    for (const [field, value] of Object.entries(where)) {
      if (value === undefined) continue;
      const column = field === "id" ? "id" : this.columnFor(field);
      if (value === null) {
        clauses.push(`${column} IS NULL`);
      } else {
        values.push(value);
        clauses.push(`${column} = $${values.length}`);
      }
    }
    return clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
  }

  private columnFor(field: string): string {
    const column = this.columns.get(field);
    if (!column) {
      throw new ValidationError(field, `not a column of ${this.definition.table}`);
    }
    return column;
  }

  private toRecord(row: QueryResultRow): T {
    return this.definition.schema.parse(row);
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      throw translateError(error, this.definition.entity);
    }
  }
}
