import type pino from "pino";
import type { z } from "zod";
import { IntegrityError, NotFoundError } from "../errors";
import type { Organization, User } from "../repositories/tables";
import type { DataStore } from "../repositories/types";
import { assertAcyclic } from "../utils/tree";
import { nameField, OrganizationInputSchema, parseInput } from "../validators";
import { assertUnique, requireRecord } from "./guards";

/**
 * Organizations form a tree through `parentId`. The owner has full control of
 * an organization; admins are listed separately.
 */
export class OrganizationService {
  private logger: pino.Logger;

  constructor(
    private store: DataStore,
    logger: pino.Logger
  ) {
    this.logger = logger.child({ component: "OrganizationService" });
  }

  async create(input: z.input<typeof OrganizationInputSchema>): Promise<Organization> {
    const data = parseInput(OrganizationInputSchema, input);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.users, data.ownerId);
      if (data.parentId !== null) {
        await requireRecord(tx.organizations, data.parentId);
      }
      await assertUnique(tx.organizations, { name: data.name });
      const organization = await tx.organizations.create(data);
      this.logger.info(
        { organizationId: organization.id, name: organization.name, parentId: organization.parentId },
        "Organization created"
      );
      return organization;
    });
  }

  async get(organizationId: number): Promise<Organization> {
    return requireRecord(this.store.organizations, organizationId);
  }

  async list(): Promise<Organization[]> {
    return this.store.organizations.findMany();
  }

  async rename(organizationId: number, name: string): Promise<Organization> {
    const parsed = parseInput(nameField, name);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.organizations, organizationId);
      await assertUnique(tx.organizations, { name: parsed }, organizationId);
      return tx.organizations.update(organizationId, { name: parsed });
    });
  }

  async setParent(organizationId: number, parentId: number | null): Promise<Organization> {
    return this.store.transaction(async (tx) => {
      await tx.lock(tx.organizations.definition.table);
      await requireRecord(tx.organizations, organizationId);
      if (parentId !== null) {
        await requireRecord(tx.organizations, parentId);
      }
      await assertAcyclic("Organization", organizationId, parentId, async (id) => {
        const organization = await requireRecord(tx.organizations, id);
        return organization.parentId;
      });
      const organization = await tx.organizations.update(organizationId, { parentId });
      this.logger.info({ organizationId, parentId }, "Organization moved");
      return organization;
    });
  }

  /** Parent chain, nearest first. */
  async ancestors(organizationId: number): Promise<Organization[]> {
    const chain: Organization[] = [];
    const seen = new Set<number>([organizationId]);
    let current = await requireRecord(this.store.organizations, organizationId);
    while (current.parentId !== null && !seen.has(current.parentId)) {
      seen.add(current.parentId);
      current = await requireRecord(this.store.organizations, current.parentId);
      chain.push(current);
    }
    return chain;
  }

  async children(organizationId: number): Promise<Organization[]> {
    return this.store.organizations.findMany({ parentId: organizationId });
  }

  async addAdmin(organizationId: number, userId: number): Promise<void> {
    await this.store.transaction(async (tx) => {
      await requireRecord(tx.organizations, organizationId);
      await requireRecord(tx.users, userId);
      const existing = await tx.organizationAdmins.findOne({ organizationId, userId });
      if (existing) return;
      await tx.organizationAdmins.create({ organizationId, userId });
      this.logger.info({ organizationId, userId }, "Organization admin added");
    });
  }

  async removeAdmin(organizationId: number, userId: number): Promise<boolean> {
    const entry = await this.store.organizationAdmins.findOne({ organizationId, userId });
    if (!entry) return false;
    await this.store.organizationAdmins.delete(entry.id);
    this.logger.info({ organizationId, userId }, "Organization admin removed");
    return true;
  }

  async listAdmins(organizationId: number): Promise<User[]> {
    await requireRecord(this.store.organizations, organizationId);
    const entries = await this.store.organizationAdmins.findMany({ organizationId });
    return Promise.all(entries.map((entry) => requireRecord(this.store.users, entry.userId)));
  }

  /** The owner or a listed admin. */
  async isAdmin(organizationId: number, userId: number): Promise<boolean> {
    const organization = await requireRecord(this.store.organizations, organizationId);
    if (organization.ownerId === userId) return true;
    return (await this.store.organizationAdmins.count({ organizationId, userId })) > 0;
  }

  async remove(organizationId: number): Promise<void> {
    await this.store.transaction(async (tx) => {
      const childCount = await tx.organizations.count({ parentId: organizationId });
      if (childCount > 0) {
        throw new IntegrityError(`Organization ${organizationId} still has ${childCount} child organization(s)`);
      }
      const deleted = await tx.organizations.delete(organizationId);
      if (!deleted) {
        throw new NotFoundError("Organization", organizationId);
      }
    });
    this.logger.info({ organizationId }, "Organization removed");
  }
}
