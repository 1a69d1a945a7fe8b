import { NotFoundError, UniquenessViolation } from "../errors";
import type { Entity } from "../repositories/tables";
import type { Repository, Where } from "../repositories/types";

export async function requireRecord<T extends Entity>(repository: Repository<T>, id: number): Promise<T> {
  const record = await repository.findById(id);
  if (!record) {
    throw new NotFoundError(repository.definition.entity, id);
  }
  return record;
}

/** Fails when another record (other than `exceptId`) already matches `where`. */
export async function assertUnique<T extends Entity>(
  repository: Repository<T>,
  where: Where<T>,
  exceptId?: number
): Promise<void> {
  const existing = await repository.findOne(where);
  if (existing && existing.id !== exceptId) {
    throw new UniquenessViolation(repository.definition.entity, Object.keys(where));
  }
}
