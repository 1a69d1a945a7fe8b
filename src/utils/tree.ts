import { IntegrityError } from "../errors";

/**
 * Walks the parent chain from `parentId` and fails if it reaches `childId`,
 * i.e. if attaching `childId` under `parentId` would close a cycle.
 */
export async function assertAcyclic(
  entity: string,
  childId: number,
  parentId: number | null,
  loadParentId: (id: number) => Promise<number | null>
): Promise<void> {
  const seen = new Set<number>();
  let current = parentId;
  while (current !== null) {
    if (current === childId) {
      throw new IntegrityError(`${entity} ${childId} cannot be nested under ${parentId}: that would form a cycle`);
    }
    if (seen.has(current)) {
      throw new IntegrityError(`${entity} hierarchy already contains a cycle at ${current}`);
    }
    seen.add(current);
    current = await loadParentId(current);
  }
}
