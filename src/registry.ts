import type pino from "pino";
import type { DataStore } from "./repositories/types";
import { IpBlockService } from "./services/ip-block-service";
import { OrganizationService } from "./services/organization-service";
import { SimulatorService } from "./services/simulator-service";
import { TemplateService, type TemplateServiceOptions } from "./services/template-service";
import { TopologyService } from "./services/topology-service";
import { UserService } from "./services/user-service";

export interface Registry {
  users: UserService;
  simulators: SimulatorService;
  organizations: OrganizationService;
  templates: TemplateService;
  topologies: TopologyService;
  ipBlocks: IpBlockService;
}

export function createRegistry(store: DataStore, logger: pino.Logger, options: TemplateServiceOptions = {}): Registry {
  return {
    users: new UserService(store, logger),
    simulators: new SimulatorService(store, logger),
    organizations: new OrganizationService(store, logger),
    templates: new TemplateService(store, logger, options),
    topologies: new TopologyService(store, logger),
    ipBlocks: new IpBlockService(store, logger),
  };
}
