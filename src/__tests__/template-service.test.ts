import { beforeEach, describe, expect, it } from "vitest";
import { IntegrityError, NotFoundError, UniquenessViolation } from "../errors";
import type { Registry } from "../registry";
import { NodeType, TemplateVisibility, UserRole } from "../shared-types";
import { createHarness, seedOrganization, seedTemplate } from "./helpers/fixtures";

describe("TemplateService", () => {
  let registry: Registry;

  beforeEach(() => {
    registry = createHarness().registry;
  });

  it("keeps template names unique", async () => {
    const { owner, organization } = await seedOrganization(registry);
    const input = { name: "star", ownerId: owner.id, organizationId: organization.id, visibility: TemplateVisibility.PUBLIC };

    await registry.templates.create(input);
    await expect(registry.templates.create(input)).rejects.toThrow(UniquenessViolation);
  });

  it("rejects visibility and node type codes outside their choice sets", async () => {
    const { owner, organization } = await seedOrganization(registry);
    const unknownCode: number = 9;

    await expect(
      registry.templates.create({ name: "star", ownerId: owner.id, organizationId: organization.id, visibility: unknownCode })
    ).rejects.toThrow(RangeError);

    const { template } = await seedTemplate(registry);
    await expect(registry.templates.addNode({ templateId: template.id, name: "n", type: unknownCode })).rejects.toThrow(
      RangeError
    );
  });

  it("assembles the layout of a template", async () => {
    const { template, left, right, leftPort, rightPort, link } = await seedTemplate(registry);

    const layout = await registry.templates.getLayout(template.id);

    expect(layout.nodes).toEqual([left, right]);
    expect(layout.ports).toEqual([leftPort, rightPort]);
    expect(layout.links).toEqual([link]);
    expect(link).toEqual({ id: link.id, port1Id: leftPort.id, port2Id: rightPort.id, lossiness: 0 });
    expect(left.type).toBe(NodeType.VIRTUAL_NODE);
  });

  it("refreshes dateUpdated whenever the template changes", async () => {
    const { owner, organization } = await seedOrganization(registry);
    const template = await registry.templates.create({
      name: "star",
      ownerId: owner.id,
      organizationId: organization.id,
      visibility: TemplateVisibility.PRIVATE,
    });
    expect(template.dateUpdated).toEqual(new Date(Date.UTC(2024, 0, 1)));

    await registry.templates.addNode({ templateId: template.id, name: "hub", type: NodeType.HUB });

    expect((await registry.templates.get(template.id)).dateUpdated).toEqual(new Date(Date.UTC(2024, 0, 2)));
  });

  it("requires links between two distinct ports of one template", async () => {
    const first = await seedTemplate(registry, "first");
    const second = await seedTemplate(registry, "second");

    await expect(
      registry.templates.addLink({ port1Id: first.leftPort.id, port2Id: first.leftPort.id })
    ).rejects.toThrow(IntegrityError);
    await expect(
      registry.templates.addLink({ port1Id: first.leftPort.id, port2Id: second.rightPort.id })
    ).rejects.toThrow(IntegrityError);
    await expect(registry.templates.addLink({ port1Id: first.leftPort.id, port2Id: 999 })).rejects.toThrow(
      NotFoundError
    );
  });

  it("bounds link lossiness to [0, 1]", async () => {
    const { leftPort, rightPort, link } = await seedTemplate(registry);

    expect((await registry.templates.setLossiness(link.id, 0.25)).lossiness).toBe(0.25);
    await expect(registry.templates.setLossiness(link.id, 1.5)).rejects.toThrow(RangeError);
    await expect(
      registry.templates.addLink({ port1Id: leftPort.id, port2Id: rightPort.id, lossiness: -0.1 })
    ).rejects.toThrow(RangeError);
  });

  it("applies visibility rules", async () => {
    const { owner, organization, template } = await seedTemplate(registry);
    const colleague = await registry.users.createUser({ username: "colleague" });
    await registry.users.createProfile({ userId: colleague.id, organizationId: organization.id, role: UserRole.TA });
    const outsider = await registry.users.createUser({ username: "outsider" });

    expect(await registry.templates.canView(template.id, owner.id)).toBe(true);
    expect(await registry.templates.canView(template.id, colleague.id)).toBe(false);

    await registry.templates.setVisibility(template.id, TemplateVisibility.PROTECTED);
    expect(await registry.templates.canView(template.id, colleague.id)).toBe(true);
    expect(await registry.templates.canView(template.id, outsider.id)).toBe(false);

    await registry.templates.setVisibility(template.id, TemplateVisibility.PUBLIC);
    expect(await registry.templates.canView(template.id, outsider.id)).toBe(true);
    expect((await registry.templates.listVisibleTo(outsider.id)).map((visible) => visible.id)).toEqual([template.id]);
  });

  it("refuses to remove instantiated templates", async () => {
    const { owner, template } = await seedTemplate(registry);
    const topology = await registry.topologies.instantiate(template.id, owner.id);

    await expect(registry.templates.remove(template.id)).rejects.toThrow(IntegrityError);
    await registry.topologies.remove(topology.id);
    await registry.templates.remove(template.id);
    await expect(registry.templates.get(template.id)).rejects.toThrow(NotFoundError);
  });
});
