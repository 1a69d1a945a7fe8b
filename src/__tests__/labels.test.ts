import { describe, expect, it } from "vitest";
import { assignmentLabel, linkLabel, portLabel, topologyLabel, topologyUserLabel } from "../utils/labels";

describe("labels", () => {
  const template = { name: "pair" };
  const left = { node: { name: "client" }, port: { name: "eth0" } };
  const right = { node: { name: "server" }, port: { name: "eth1" } };

  it("describes topologies and their access list", () => {
    expect(topologyLabel({ id: 7 })).toBe("Topology 7");
    expect(topologyUserLabel({ topologyId: 7, address: "10.0.0.2" })).toBe("10.0.0.2 may interact with Topology 7");
  });

  it("describes template parts", () => {
    expect(portLabel(template, left.node, left.port)).toBe("pair: client: eth0");
    expect(linkLabel(template, [left, right], { lossiness: 0 })).toBe("pair: client:eth0 <--> server:eth1");
    expect(linkLabel(template, [left, right], { lossiness: 0.125 })).toBe(
      "pair: client:eth0 <--> server:eth1 (12.5% loss)"
    );
  });

  it("describes assignments", () => {
    expect(assignmentLabel({ topologyId: 3, address: "10.0.1.1", mask: 24 }, "pair: client: eth0")).toBe(
      "Topology 3: pair: client: eth0 <== 10.0.1.1/24"
    );
  });
});
