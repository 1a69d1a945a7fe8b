import { z } from "zod";
import { NodeType, TemplateVisibility, UserRole } from "../shared-types";

export interface Entity {
  id: number;
}

/**
 * Maps an entity onto its table: column names for every field but `id`,
 * a row schema, and the field sets the table keeps unique.
 */
export interface TableDefinition<T extends Entity> {
  entity: string;
  table: string;
  columns: { [K in Exclude<keyof T, "id">]: string };
  schema: z.ZodType<T>;
  unique: Array<Array<Exclude<keyof T, "id">>>;
}

const id = z.number().int();
const foreignKey = z.number().int();

export const userSchema = z.object({
  id,
  username: z.string(),
  email: z.string().nullable(),
});
export type User = z.infer<typeof userSchema>;

export const simulatorSchema = z.object({
  id,
  name: z.string(),
  address: z.string(),
});
export type Simulator = z.infer<typeof simulatorSchema>;

export const organizationSchema = z.object({
  id,
  name: z.string(),
  parentId: foreignKey.nullable(),
  ownerId: foreignKey,
});
export type Organization = z.infer<typeof organizationSchema>;

export const organizationAdminSchema = z.object({
  id,
  organizationId: foreignKey,
  userId: foreignKey,
});
export type OrganizationAdmin = z.infer<typeof organizationAdminSchema>;

export const userProfileSchema = z.object({
  id,
  userId: foreignKey,
  organizationId: foreignKey,
  role: z.enum(UserRole),
});
export type UserProfile = z.infer<typeof userProfileSchema>;

export const topologyTemplateSchema = z.object({
  id,
  name: z.string(),
  dateUpdated: z.date(),
  ownerId: foreignKey,
  organizationId: foreignKey,
  visibility: z.enum(TemplateVisibility),
});
export type TopologyTemplate = z.infer<typeof topologyTemplateSchema>;

export const templateNodeSchema = z.object({
  id,
  templateId: foreignKey,
  name: z.string(),
  type: z.enum(NodeType),
});
export type TemplateNode = z.infer<typeof templateNodeSchema>;

export const portSchema = z.object({
  id,
  nodeId: foreignKey,
  name: z.string(),
});
export type Port = z.infer<typeof portSchema>;

export const linkSchema = z.object({
  id,
  port1Id: foreignKey,
  port2Id: foreignKey,
  lossiness: z.number(),
});
export type Link = z.infer<typeof linkSchema>;

export const topologySchema = z.object({
  id,
  ownerId: foreignKey,
  templateId: foreignKey,
});
export type Topology = z.infer<typeof topologySchema>;

export const topologyUserSchema = z.object({
  id,
  topologyId: foreignKey,
  address: z.string(),
});
export type TopologyUser = z.infer<typeof topologyUserSchema>;

export const ipAssignmentSchema = z.object({
  id,
  topologyId: foreignKey,
  portId: foreignKey,
  address: z.string(),
  mask: z.number().int(),
});
export type IpAssignment = z.infer<typeof ipAssignmentSchema>;

export const ipBlockSchema = z.object({
  id,
  simulatorId: foreignKey,
  parentId: foreignKey.nullable(),
  organizationId: foreignKey,
  subnet: z.string(),
  mask: z.number().int(),
});
export type IpBlock = z.infer<typeof ipBlockSchema>;

export interface Tables {
  users: TableDefinition<User>;
  simulators: TableDefinition<Simulator>;
  organizations: TableDefinition<Organization>;
  organizationAdmins: TableDefinition<OrganizationAdmin>;
  profiles: TableDefinition<UserProfile>;
  templates: TableDefinition<TopologyTemplate>;
  nodes: TableDefinition<TemplateNode>;
  ports: TableDefinition<Port>;
  links: TableDefinition<Link>;
  topologies: TableDefinition<Topology>;
  topologyUsers: TableDefinition<TopologyUser>;
  ipAssignments: TableDefinition<IpAssignment>;
  ipBlocks: TableDefinition<IpBlock>;
}

export const tables: Tables = {
  users: {
    entity: "User",
    table: "users",
    columns: { username: "username", email: "email" },
    schema: userSchema,
    unique: [["username"]],
  },
  simulators: {
    entity: "Simulator",
    table: "simulators",
    columns: { name: "name", address: "address" },
    schema: simulatorSchema,
    unique: [["name"], ["address"]],
  },
  organizations: {
    entity: "Organization",
    table: "organizations",
    columns: { name: "name", parentId: "parent_id", ownerId: "owner_id" },
    schema: organizationSchema,
    unique: [["name"]],
  },
  organizationAdmins: {
    entity: "OrganizationAdmin",
    table: "organization_admins",
    columns: { organizationId: "organization_id", userId: "user_id" },
    schema: organizationAdminSchema,
    unique: [["organizationId", "userId"]],
  },
  profiles: {
    entity: "UserProfile",
    table: "user_profiles",
    columns: { userId: "user_id", organizationId: "organization_id", role: "role" },
    schema: userProfileSchema,
    unique: [["userId"]],
  },
  templates: {
    entity: "TopologyTemplate",
    table: "topology_templates",
    columns: {
      name: "name",
      dateUpdated: "date_updated",
      ownerId: "owner_id",
      organizationId: "organization_id",
      visibility: "visibility",
    },
    schema: topologyTemplateSchema,
    unique: [["name"]],
  },
  nodes: {
    entity: "Node",
    table: "nodes",
    columns: { templateId: "template_id", name: "name", type: "type" },
    schema: templateNodeSchema,
    unique: [],
  },
  ports: {
    entity: "Port",
    table: "ports",
    columns: { nodeId: "node_id", name: "name" },
    schema: portSchema,
    unique: [],
  },
  links: {
    entity: "Link",
    table: "links",
    columns: { port1Id: "port1_id", port2Id: "port2_id", lossiness: "lossiness" },
    schema: linkSchema,
    unique: [],
  },
  topologies: {
    entity: "Topology",
    table: "topologies",
    columns: { ownerId: "owner_id", templateId: "template_id" },
    schema: topologySchema,
    unique: [],
  },
  topologyUsers: {
    entity: "TopologyUser",
    table: "topology_users",
    columns: { topologyId: "topology_id", address: "address" },
    schema: topologyUserSchema,
    unique: [["topologyId", "address"]],
  },
  ipAssignments: {
    entity: "IPAssignment",
    table: "ip_assignments",
    columns: { topologyId: "topology_id", portId: "port_id", address: "address", mask: "mask" },
    schema: ipAssignmentSchema,
    unique: [],
  },
  ipBlocks: {
    entity: "IPBlock",
    table: "ip_blocks",
    columns: {
      simulatorId: "simulator_id",
      parentId: "parent_id",
      organizationId: "organization_id",
      subnet: "subnet",
      mask: "mask",
    },
    schema: ipBlockSchema,
    unique: [],
  },
};
