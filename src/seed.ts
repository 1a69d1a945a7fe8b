// VNS Registry - Seed Script
// Initializes the database with example data

import type pino from "pino";
import type { Registry } from "./registry";
import { NodeType, TemplateVisibility, UserRole } from "./shared-types";

export async function seed(registry: Registry, logger: pino.Logger): Promise<void> {
  // sim-1 is created first; its presence means the example data is in place.
  if (await registry.simulators.getByName("sim-1")) {
    logger.info("Example data already present, skipping seed");
    return;
  }
  logger.info("Seeding database...");

  const simulator = await registry.simulators.register({ name: "sim-1", address: "192.168.1.100" });

  const admin = await registry.users.createUser({ username: "admin", email: "admin@example.com" });
  const organization = await registry.organizations.create({ name: "Example University", ownerId: admin.id });
  await registry.users.createProfile({ userId: admin.id, organizationId: organization.id, role: UserRole.ADMIN });

  const template = await registry.templates.create({
    name: "single-router",
    ownerId: admin.id,
    organizationId: organization.id,
    visibility: TemplateVisibility.PUBLIC,
  });
  const client = await registry.templates.addNode({ templateId: template.id, name: "client", type: NodeType.VIRTUAL_NODE });
  const server = await registry.templates.addNode({ templateId: template.id, name: "server", type: NodeType.WEB_SERVER });
  const clientPort = await registry.templates.addPort({ nodeId: client.id, name: "eth0" });
  const serverPort = await registry.templates.addPort({ nodeId: server.id, name: "eth0" });
  await registry.templates.addLink({ port1Id: clientPort.id, port2Id: serverPort.id });

  const block = await registry.ipBlocks.create({
    simulatorId: simulator.id,
    organizationId: organization.id,
    subnet: "10.0.0.0",
    mask: 8,
  });
  const subnet = await registry.ipBlocks.allocate(block.id, 24, organization.id);

  const topology = await registry.topologies.instantiate(template.id, admin.id);
  const base = subnet.subnet.split(".").slice(0, 3).join(".");
  await registry.topologies.assignAddress({ topologyId: topology.id, portId: clientPort.id, address: `${base}.1`, mask: 24 });
  await registry.topologies.assignAddress({ topologyId: topology.id, portId: serverPort.id, address: `${base}.2`, mask: 24 });

  logger.info({ topologyId: topology.id }, "Seeding complete");
}

if (require.main === module) {
  void (async () => {
    const { pool, store } = await import("./db");
    const { logger } = await import("./logger");
    const { createRegistry } = await import("./registry");
    try {
      await seed(createRegistry(store, logger), logger);
    } catch (error) {
      logger.error(error, "Seeding failed");
      process.exitCode = 1;
    } finally {
      await pool.end();
    }
  })();
}
