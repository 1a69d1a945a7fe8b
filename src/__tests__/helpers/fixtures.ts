import { createRegistry, type Registry } from "../../registry";
import type { DataStore } from "../../repositories/types";
import { NodeType, TemplateVisibility, UserRole } from "../../shared-types";
import { createMemoryStore, silentLogger } from "./memory-store";

export interface Harness {
  store: DataStore;
  registry: Registry;
  /** Advances the clock handed to the template service by one day per call. */
  clock: () => Date;
}

export function createHarness(): Harness {
  const store = createMemoryStore();
  let day = 0;
  const clock = () => new Date(Date.UTC(2024, 0, 1 + day++));
  return { store, clock, registry: createRegistry(store, silentLogger, { clock }) };
}

/** A user, an organization owned by them and a profile tying the two. */
export async function seedOrganization(registry: Registry, name = "Lab") {
  const owner = await registry.users.createUser({ username: `${name.toLowerCase()}-owner` });
  const organization = await registry.organizations.create({ name, ownerId: owner.id });
  await registry.users.createProfile({ userId: owner.id, organizationId: organization.id, role: UserRole.INSTRUCTOR });
  return { owner, organization };
}

/** Template with two nodes, one port each, linked together. */
export async function seedTemplate(registry: Registry, name = "pair") {
  const { owner, organization } = await seedOrganization(registry, `${name}-org`);
  const template = await registry.templates.create({
    name,
    ownerId: owner.id,
    organizationId: organization.id,
    visibility: TemplateVisibility.PRIVATE,
  });
  const left = await registry.templates.addNode({ templateId: template.id, name: "left", type: NodeType.VIRTUAL_NODE });
  const right = await registry.templates.addNode({ templateId: template.id, name: "right", type: NodeType.HUB });
  const leftPort = await registry.templates.addPort({ nodeId: left.id, name: "eth0" });
  const rightPort = await registry.templates.addPort({ nodeId: right.id, name: "eth0" });
  const link = await registry.templates.addLink({ port1Id: leftPort.id, port2Id: rightPort.id });
  return { owner, organization, template, left, right, leftPort, rightPort, link };
}
