export * from "./errors";
export * from "./shared-types";
export * from "./utils/address";
export * from "./utils/subnet";
export * from "./utils/labels";
export * from "./repositories/tables";
export * from "./repositories/types";
export { PgRepository, translateError, type Queryable } from "./repositories/pg-repository";
export { createPgStore, createSqlStore, poolExecutor, type TransactionClient } from "./repositories/pg-store";
export { createRegistry, type Registry } from "./registry";
export { UserService } from "./services/user-service";
export { SimulatorService } from "./services/simulator-service";
export { OrganizationService } from "./services/organization-service";
export { TemplateService, type TemplateLayout, type TemplateServiceOptions } from "./services/template-service";
export { TopologyService } from "./services/topology-service";
export { IpBlockService, type BlockFilter } from "./services/ip-block-service";
export { migrate, SCHEMA_PATH } from "./migrate";
export { seed } from "./seed";
