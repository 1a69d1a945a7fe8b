import {
  tables,
  type Entity,
  type IpAssignment,
  type IpBlock,
  type Link,
  type Organization,
  type OrganizationAdmin,
  type Port,
  type Simulator,
  type TableDefinition,
  type TemplateNode,
  type Topology,
  type TopologyTemplate,
  type TopologyUser,
  type User,
  type UserProfile,
} from "./tables";

export type NewRecord<T extends Entity> = Omit<T, "id">;
export type RecordPatch<T extends Entity> = Partial<Omit<T, "id">>;
/** Equality filter; `null` matches an absent reference. */
export type Where<T extends Entity> = Partial<T>;

export interface Repository<T extends Entity> {
  readonly definition: TableDefinition<T>;
  findById(id: number): Promise<T | null>;
  findOne(where: Where<T>): Promise<T | null>;
  findMany(where?: Where<T>): Promise<T[]>;
  count(where?: Where<T>): Promise<number>;
  create(data: NewRecord<T>): Promise<T>;
  /** Throws NotFoundError when no row has the id. */
  update(id: number, patch: RecordPatch<T>): Promise<T>;
  delete(id: number): Promise<boolean>;
}

export interface Repositories {
  users: Repository<User>;
  simulators: Repository<Simulator>;
  organizations: Repository<Organization>;
  organizationAdmins: Repository<OrganizationAdmin>;
  profiles: Repository<UserProfile>;
  templates: Repository<TopologyTemplate>;
  nodes: Repository<TemplateNode>;
  ports: Repository<Port>;
  links: Repository<Link>;
  topologies: Repository<Topology>;
  topologyUsers: Repository<TopologyUser>;
  ipAssignments: Repository<IpAssignment>;
  ipBlocks: Repository<IpBlock>;
}

export interface DataStore extends Repositories {
  /**
   * Runs `work` against a store whose writes commit together or not at all.
   * Calling `transaction` on that store joins the open transaction.
   */
  transaction<R>(work: (store: DataStore) => Promise<R>): Promise<R>;
  /**
   * Serialises writers sharing `name` until the enclosing transaction ends.
   * Taken first in check-then-write paths that no constraint covers.
   */
  lock(name: string): Promise<void>;
}

export type RepositoryFactory = <T extends Entity>(definition: TableDefinition<T>) => Repository<T>;

export const buildRepositories = (create: RepositoryFactory): Repositories => ({
  users: create(tables.users),
  simulators: create(tables.simulators),
  organizations: create(tables.organizations),
  organizationAdmins: create(tables.organizationAdmins),
  profiles: create(tables.profiles),
  templates: create(tables.templates),
  nodes: create(tables.nodes),
  ports: create(tables.ports),
  links: create(tables.links),
  topologies: create(tables.topologies),
  topologyUsers: create(tables.topologyUsers),
  ipAssignments: create(tables.ipAssignments),
  ipBlocks: create(tables.ipBlocks),
});
