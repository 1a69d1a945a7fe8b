import type {
  IpAssignment,
  Link,
  Port,
  TemplateNode,
  Topology,
  TopologyTemplate,
  TopologyUser,
} from "../repositories/tables";
import { formatBlock } from "./subnet";

// Display strings used in log lines and admin listings.

export const topologyLabel = (topology: Pick<Topology, "id">) => `Topology ${topology.id}`;

export const nodeLabel = (template: Pick<TopologyTemplate, "name">, node: Pick<TemplateNode, "name">) =>
  `${template.name}: ${node.name}`;

export const portLabel = (
  template: Pick<TopologyTemplate, "name">,
  node: Pick<TemplateNode, "name">,
  port: Pick<Port, "name">
) => `${nodeLabel(template, node)}: ${port.name}`;

export const linkLabel = (
  template: Pick<TopologyTemplate, "name">,
  ends: [{ node: Pick<TemplateNode, "name">; port: Pick<Port, "name"> }, { node: Pick<TemplateNode, "name">; port: Pick<Port, "name"> }],
  link: Pick<Link, "lossiness">
) => {
  const [a, b] = ends;
  const loss = link.lossiness > 0 ? ` (${(link.lossiness * 100).toFixed(1)}% loss)` : "";
  return `${template.name}: ${a.node.name}:${a.port.name} <--> ${b.node.name}:${b.port.name}${loss}`;
};

export const topologyUserLabel = (entry: Pick<TopologyUser, "address" | "topologyId">) =>
  `${entry.address} may interact with ${topologyLabel({ id: entry.topologyId })}`;

export const assignmentLabel = (assignment: Pick<IpAssignment, "topologyId" | "address" | "mask">, port: string) =>
  `${topologyLabel({ id: assignment.topologyId })}: ${port} <== ${formatBlock({ subnet: assignment.address, mask: assignment.mask })}`;
