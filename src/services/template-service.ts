import type pino from "pino";
import { z } from "zod";
import { IntegrityError, NotFoundError } from "../errors";
import type { Link, Port, TemplateNode, TopologyTemplate } from "../repositories/tables";
import type { DataStore, Repositories } from "../repositories/types";
import { NODE_TYPE_LABELS, TemplateVisibility } from "../shared-types";
import { linkLabel, nodeLabel, portLabel } from "../utils/labels";
import {
  LinkInputSchema,
  nameField,
  NodeInputSchema,
  parseInput,
  PortInputSchema,
  TemplateInputSchema,
} from "../validators";
import { assertUnique, requireRecord } from "./guards";

const lossinessField = z.number().min(0).max(1);

export interface TemplateLayout {
  template: TopologyTemplate;
  nodes: TemplateNode[];
  ports: Port[];
  links: Link[];
}

export interface TemplateServiceOptions {
  clock?: () => Date;
}

/**
 * Topology templates and their nodes, ports and links. Any change to a
 * template's contents refreshes its `dateUpdated`.
 */
export class TemplateService {
  private logger: pino.Logger;
  private clock: () => Date;

  constructor(
    private store: DataStore,
    logger: pino.Logger,
    options: TemplateServiceOptions = {}
  ) {
    this.logger = logger.child({ component: "TemplateService" });
    this.clock = options.clock ?? (() => new Date());
  }

  async create(input: z.input<typeof TemplateInputSchema>): Promise<TopologyTemplate> {
    const data = parseInput(TemplateInputSchema, input);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.users, data.ownerId);
      await requireRecord(tx.organizations, data.organizationId);
      await assertUnique(tx.templates, { name: data.name });
      const template = await tx.templates.create({ ...data, dateUpdated: this.clock() });
      this.logger.info({ templateId: template.id, name: template.name }, "Template created");
      return template;
    });
  }

  async get(templateId: number): Promise<TopologyTemplate> {
    return requireRecord(this.store.templates, templateId);
  }

  async list(): Promise<TopologyTemplate[]> {
    return this.store.templates.findMany();
  }

  async rename(templateId: number, name: string): Promise<TopologyTemplate> {
    const parsed = parseInput(nameField, name);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.templates, templateId);
      await assertUnique(tx.templates, { name: parsed }, templateId);
      return tx.templates.update(templateId, { name: parsed, dateUpdated: this.clock() });
    });
  }

  async setVisibility(templateId: number, visibility: TemplateVisibility): Promise<TopologyTemplate> {
    const parsed = parseInput(z.enum(TemplateVisibility), visibility);
    await requireRecord(this.store.templates, templateId);
    return this.store.templates.update(templateId, { visibility: parsed, dateUpdated: this.clock() });
  }

  /**
   * Private templates are visible to their owner, protected ones also to
   * members of the template's organization, public ones to everybody.
   */
  async canView(templateId: number, userId: number): Promise<boolean> {
    const template = await requireRecord(this.store.templates, templateId);
    const profile = await this.store.profiles.findOne({ userId });
    return isVisible(template, userId, profile?.organizationId ?? null);
  }

  async listVisibleTo(userId: number): Promise<TopologyTemplate[]> {
    const profile = await this.store.profiles.findOne({ userId });
    const templates = await this.store.templates.findMany();
    return templates.filter((template) => isVisible(template, userId, profile?.organizationId ?? null));
  }

  async addNode(input: z.input<typeof NodeInputSchema>): Promise<TemplateNode> {
    const data = parseInput(NodeInputSchema, input);
    return this.store.transaction(async (tx) => {
      const template = await requireRecord(tx.templates, data.templateId);
      const node = await tx.nodes.create(data);
      await this.touch(tx, template.id);
      this.logger.info({ nodeId: node.id, node: nodeLabel(template, node), type: NODE_TYPE_LABELS[node.type] }, "Node added");
      return node;
    });
  }

  async removeNode(nodeId: number): Promise<void> {
    await this.store.transaction(async (tx) => {
      const node = await requireRecord(tx.nodes, nodeId);
      await tx.nodes.delete(nodeId);
      await this.touch(tx, node.templateId);
    });
    this.logger.info({ nodeId }, "Node removed");
  }

  async addPort(input: z.input<typeof PortInputSchema>): Promise<Port> {
    const data = parseInput(PortInputSchema, input);
    return this.store.transaction(async (tx) => {
      const node = await requireRecord(tx.nodes, data.nodeId);
      const template = await requireRecord(tx.templates, node.templateId);
      const port = await tx.ports.create(data);
      await this.touch(tx, template.id);
      this.logger.info({ portId: port.id, port: portLabel(template, node, port) }, "Port added");
      return port;
    });
  }

  /**
   * Connect two distinct ports on nodes of the same template.
   */
  async addLink(input: z.input<typeof LinkInputSchema>): Promise<Link> {
    const data = parseInput(LinkInputSchema, input);
    if (data.port1Id === data.port2Id) {
      throw new IntegrityError(`A link needs two distinct ports, got port ${data.port1Id} twice`);
    }
    return this.store.transaction(async (tx) => {
      const port1 = await requireRecord(tx.ports, data.port1Id);
      const port2 = await requireRecord(tx.ports, data.port2Id);
      const node1 = await requireRecord(tx.nodes, port1.nodeId);
      const node2 = await requireRecord(tx.nodes, port2.nodeId);
      if (node1.templateId !== node2.templateId) {
        throw new IntegrityError(
          `Ports ${port1.id} and ${port2.id} belong to different templates (${node1.templateId}, ${node2.templateId})`
        );
      }
      const template = await requireRecord(tx.templates, node1.templateId);
      const link = await tx.links.create(data);
      await this.touch(tx, template.id);
      this.logger.info(
        {
          linkId: link.id,
          link: linkLabel(
            template,
            [
              { node: node1, port: port1 },
              { node: node2, port: port2 },
            ],
            link
          ),
        },
        "Link added"
      );
      return link;
    });
  }

  async setLossiness(linkId: number, lossiness: number): Promise<Link> {
    const parsed = parseInput(lossinessField, lossiness);
    return this.store.transaction(async (tx) => {
      const link = await requireRecord(tx.links, linkId);
      const port = await requireRecord(tx.ports, link.port1Id);
      const node = await requireRecord(tx.nodes, port.nodeId);
      const updated = await tx.links.update(linkId, { lossiness: parsed });
      await this.touch(tx, node.templateId);
      return updated;
    });
  }

  async getLayout(templateId: number): Promise<TemplateLayout> {
    const template = await requireRecord(this.store.templates, templateId);
    const nodes = await this.store.nodes.findMany({ templateId });
    const ports = (await Promise.all(nodes.map((node) => this.store.ports.findMany({ nodeId: node.id })))).flat();

    const links = new Map<number, Link>();
    for (const port of ports) {
      for (const link of await this.store.links.findMany({ port1Id: port.id })) {
        links.set(link.id, link);
      }
    }

    return {
      template,
      nodes,
      ports,
      links: [...links.values()].sort((a, b) => a.id - b.id),
    };
  }

  async remove(templateId: number): Promise<void> {
    await this.store.transaction(async (tx) => {
      const instances = await tx.topologies.count({ templateId });
      if (instances > 0) {
        throw new IntegrityError(`Template ${templateId} is still instantiated by ${instances} topology(ies)`);
      }
      const deleted = await tx.templates.delete(templateId);
      if (!deleted) {
        throw new NotFoundError("TopologyTemplate", templateId);
      }
    });
    this.logger.info({ templateId }, "Template removed");
  }

  private async touch(repositories: Repositories, templateId: number): Promise<void> {
    await repositories.templates.update(templateId, { dateUpdated: this.clock() });
  }
}

function isVisible(template: TopologyTemplate, userId: number, organizationId: number | null): boolean {
  switch (template.visibility) {
    case TemplateVisibility.PUBLIC:
      return true;
    case TemplateVisibility.PROTECTED:
      return template.ownerId === userId || template.organizationId === organizationId;
    case TemplateVisibility.PRIVATE:
      return template.ownerId === userId;
  }
}
