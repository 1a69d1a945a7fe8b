import type pino from "pino";
import type { z } from "zod";
import { FormatError, IntegrityError, NotFoundError } from "../errors";
import type { IpBlock } from "../repositories/tables";
import type { DataStore } from "../repositories/types";
import { blockContains, findFreeBlock, formatBlock, isNetworkAddress } from "../utils/subnet";
import { assertAcyclic } from "../utils/tree";
import { BlockInputSchema, parseInput, prefixLengthField } from "../validators";
import { requireRecord } from "./guards";

export interface BlockFilter {
  simulatorId?: number;
  organizationId?: number;
}

/**
 * Address space handed out to organizations on a simulator. Blocks nest: a
 * child lies inside its parent on the same simulator. Blocks created by hand
 * may overlap their siblings (that is how an intermediate level is inserted
 * before `reparent`); `allocate` only hands out space no sibling uses.
 */
export class IpBlockService {
  private logger: pino.Logger;

  constructor(
    private store: DataStore,
    logger: pino.Logger
  ) {
    this.logger = logger.child({ component: "IpBlockService" });
  }

  async create(input: z.input<typeof BlockInputSchema>): Promise<IpBlock> {
    const data = parseInput(BlockInputSchema, input);
    if (!isNetworkAddress(data)) {
      throw new FormatError(`${formatBlock(data)} has host bits set`);
    }

    return this.store.transaction(async (tx) => {
      if (data.parentId !== null) {
        await tx.lock(tx.ipBlocks.definition.table);
      }
      await requireRecord(tx.simulators, data.simulatorId);
      await requireRecord(tx.organizations, data.organizationId);
      if (data.parentId !== null) {
        const parent = await requireRecord(tx.ipBlocks, data.parentId);
        assertNests(parent, data);
      }
      const block = await tx.ipBlocks.create(data);
      this.logger.info(
        { blockId: block.id, simulatorId: block.simulatorId, organizationId: block.organizationId, parentId: block.parentId },
        `Block ${formatBlock(block)} created`
      );
      return block;
    });
  }

  async get(blockId: number): Promise<IpBlock> {
    return requireRecord(this.store.ipBlocks, blockId);
  }

  async list(filter: BlockFilter = {}): Promise<IpBlock[]> {
    return this.store.ipBlocks.findMany(filter);
  }

  async children(blockId: number): Promise<IpBlock[]> {
    return this.store.ipBlocks.findMany({ parentId: blockId });
  }

  async reparent(blockId: number, parentId: number | null): Promise<IpBlock> {
    return this.store.transaction(async (tx) => {
      await tx.lock(tx.ipBlocks.definition.table);
      const block = await requireRecord(tx.ipBlocks, blockId);
      if (parentId !== null) {
        const parent = await requireRecord(tx.ipBlocks, parentId);
        assertNests(parent, block);
      }
      await assertAcyclic("IPBlock", blockId, parentId, async (id) => {
        const ancestor = await requireRecord(tx.ipBlocks, id);
        return ancestor.parentId;
      });
      const moved = await tx.ipBlocks.update(blockId, { parentId });
      this.logger.info({ blockId, parentId }, `Block ${formatBlock(moved)} moved`);
      return moved;
    });
  }

  /**
   * Carve the first free aligned sub-block of the given prefix length out of
   * a parent block.
   */
  async allocate(parentId: number, mask: number, organizationId: number): Promise<IpBlock> {
    const prefix = parseInput(prefixLengthField, mask);
    return this.store.transaction(async (tx) => {
      await tx.lock(tx.ipBlocks.definition.table);
      const parent = await requireRecord(tx.ipBlocks, parentId);
      await requireRecord(tx.organizations, organizationId);
      if (prefix < parent.mask) {
        throw new RangeError(`Cannot allocate a /${prefix} inside ${formatBlock(parent)}`);
      }
      const siblings = await tx.ipBlocks.findMany({ parentId });
      const free = findFreeBlock(parent, prefix, siblings);
      if (!free) {
        throw new IntegrityError(`No free /${prefix} left in ${formatBlock(parent)}`);
      }
      const block = await tx.ipBlocks.create({
        simulatorId: parent.simulatorId,
        organizationId,
        parentId,
        subnet: free.subnet,
        mask: free.mask,
      });
      this.logger.info({ blockId: block.id, parentId, organizationId }, `Block ${formatBlock(block)} allocated`);
      return block;
    });
  }

  async remove(blockId: number): Promise<void> {
    await this.store.transaction(async (tx) => {
      const childCount = await tx.ipBlocks.count({ parentId: blockId });
      if (childCount > 0) {
        throw new IntegrityError(`IPBlock ${blockId} still has ${childCount} sub-block(s)`);
      }
      const deleted = await tx.ipBlocks.delete(blockId);
      if (!deleted) {
        throw new NotFoundError("IPBlock", blockId);
      }
    });
    this.logger.info({ blockId }, "Block removed");
  }
}

type BlockShape = Pick<IpBlock, "simulatorId" | "parentId" | "subnet" | "mask">;

function assertNests(parent: IpBlock, child: BlockShape): void {
  if (parent.simulatorId !== child.simulatorId) {
    throw new IntegrityError(`${formatBlock(child)} and its parent ${formatBlock(parent)} belong to different simulators`);
  }
  if (!blockContains(parent, child)) {
    throw new IntegrityError(`${formatBlock(child)} does not lie inside ${formatBlock(parent)}`);
  }
}
