import type pino from "pino";
import type { z } from "zod";
import { IntegrityError, NotFoundError } from "../errors";
import type { IpAssignment, Topology } from "../repositories/tables";
import type { DataStore } from "../repositories/types";
import { encodeBinding, type AddressBinding } from "../utils/address";
import { assignmentLabel, portLabel, topologyLabel, topologyUserLabel } from "../utils/labels";
import { addressField, AssignmentInputSchema, parseInput } from "../validators";
import { requireRecord } from "./guards";

/**
 * Instantiated topologies: who may reach them through a simulator and which
 * addresses are bound to their ports.
 */
export class TopologyService {
  private logger: pino.Logger;

  constructor(
    private store: DataStore,
    logger: pino.Logger
  ) {
    this.logger = logger.child({ component: "TopologyService" });
  }

  async instantiate(templateId: number, ownerId: number): Promise<Topology> {
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.templates, templateId);
      await requireRecord(tx.users, ownerId);
      const topology = await tx.topologies.create({ templateId, ownerId });
      this.logger.info({ topologyId: topology.id, templateId, ownerId }, `${topologyLabel(topology)} instantiated`);
      return topology;
    });
  }

  async get(topologyId: number): Promise<Topology> {
    return requireRecord(this.store.topologies, topologyId);
  }

  async listByOwner(ownerId: number): Promise<Topology[]> {
    return this.store.topologies.findMany({ ownerId });
  }

  async remove(topologyId: number): Promise<void> {
    const deleted = await this.store.topologies.delete(topologyId);
    if (!deleted) {
      throw new NotFoundError("Topology", topologyId);
    }
    this.logger.info({ topologyId }, "Topology removed");
  }

  async permitAddress(topologyId: number, address: string): Promise<void> {
    const parsed = parseInput(addressField, address);
    await this.store.transaction(async (tx) => {
      await requireRecord(tx.topologies, topologyId);
      const existing = await tx.topologyUsers.findOne({ topologyId, address: parsed });
      if (existing) return;
      const entry = await tx.topologyUsers.create({ topologyId, address: parsed });
      this.logger.info({ topologyId }, topologyUserLabel(entry));
    });
  }

  async revokeAddress(topologyId: number, address: string): Promise<boolean> {
    const parsed = parseInput(addressField, address);
    const entry = await this.store.topologyUsers.findOne({ topologyId, address: parsed });
    if (!entry) return false;
    await this.store.topologyUsers.delete(entry.id);
    this.logger.info({ topologyId, address: parsed }, "Topology access revoked");
    return true;
  }

  async listPermittedAddresses(topologyId: number): Promise<string[]> {
    const entries = await this.store.topologyUsers.findMany({ topologyId });
    return entries.map((entry) => entry.address);
  }

  /** A topology with no permitted addresses is open to everybody. */
  async isAddressPermitted(topologyId: number, address: string): Promise<boolean> {
    const parsed = parseInput(addressField, address);
    await requireRecord(this.store.topologies, topologyId);
    const entries = await this.store.topologyUsers.findMany({ topologyId });
    return entries.length === 0 || entries.some((entry) => entry.address === parsed);
  }

  /**
   * Bind an address to a port of the topology's template. The same address
   * may be bound more than once; deciding whether that is allowed is left to
   * the caller.
   */
  async assignAddress(input: z.input<typeof AssignmentInputSchema>): Promise<IpAssignment> {
    const data = parseInput(AssignmentInputSchema, input);
    return this.store.transaction(async (tx) => {
      const topology = await requireRecord(tx.topologies, data.topologyId);
      const port = await requireRecord(tx.ports, data.portId);
      const node = await requireRecord(tx.nodes, port.nodeId);
      if (node.templateId !== topology.templateId) {
        throw new IntegrityError(
          `Port ${port.id} is not part of template ${topology.templateId} used by ${topologyLabel(topology)}`
        );
      }
      const template = await requireRecord(tx.templates, node.templateId);
      const assignment = await tx.ipAssignments.create(data);
      this.logger.info(
        { assignmentId: assignment.id, topologyId: topology.id },
        assignmentLabel(assignment, portLabel(template, node, port))
      );
      return assignment;
    });
  }

  async unassign(assignmentId: number): Promise<boolean> {
    const deleted = await this.store.ipAssignments.delete(assignmentId);
    if (deleted) {
      this.logger.info({ assignmentId }, "Address unassigned");
    }
    return deleted;
  }

  async listAssignments(topologyId: number): Promise<IpAssignment[]> {
    return this.store.ipAssignments.findMany({ topologyId });
  }

  /** Address, mask and MAC in network byte order, ready for the simulator. */
  async bindingFor(assignmentId: number): Promise<AddressBinding> {
    const assignment = await requireRecord(this.store.ipAssignments, assignmentId);
    return encodeBinding(assignment);
  }
}
