import { describe, expect, it } from "vitest";
import { addressToNumber } from "../utils/address";
import {
  blockContains,
  blockContainsAddress,
  blockRange,
  blocksOverlap,
  findFreeBlock,
  formatBlock,
  isNetworkAddress,
} from "../utils/subnet";

describe("subnet arithmetic", () => {
  it("computes the range of a block", () => {
    expect(blockRange({ subnet: "10.0.0.0", mask: 8 })).toEqual({
      start: addressToNumber("10.0.0.0"),
      end: addressToNumber("10.255.255.255"),
    });
    expect(blockRange({ subnet: "192.168.1.77", mask: 24 })).toEqual({
      start: addressToNumber("192.168.1.0"),
      end: addressToNumber("192.168.1.255"),
    });
  });

  it("detects host bits", () => {
    expect(isNetworkAddress({ subnet: "10.1.0.0", mask: 16 })).toBe(true);
    expect(isNetworkAddress({ subnet: "10.1.0.1", mask: 16 })).toBe(false);
    expect(isNetworkAddress({ subnet: "10.1.0.1", mask: 32 })).toBe(true);
  });

  it("checks containment and overlap", () => {
    const outer = { subnet: "10.0.0.0", mask: 8 };
    expect(blockContains(outer, { subnet: "10.20.0.0", mask: 16 })).toBe(true);
    expect(blockContains(outer, { subnet: "11.0.0.0", mask: 16 })).toBe(false);
    expect(blockContains({ subnet: "10.20.0.0", mask: 16 }, outer)).toBe(false);
    expect(blocksOverlap({ subnet: "10.20.0.0", mask: 16 }, outer)).toBe(true);
    expect(blocksOverlap({ subnet: "10.0.0.0", mask: 24 }, { subnet: "10.0.1.0", mask: 24 })).toBe(false);
    expect(blockContainsAddress(outer, "10.9.9.9")).toBe(true);
    expect(blockContainsAddress(outer, "9.9.9.9")).toBe(false);
  });

  it("formats blocks in CIDR notation", () => {
    expect(formatBlock({ subnet: "10.0.0.0", mask: 8 })).toBe("10.0.0.0/8");
  });
});

describe("findFreeBlock", () => {
  const parent = { subnet: "10.0.0.0", mask: 22 };

  it("returns the first aligned block when nothing is taken", () => {
    expect(findFreeBlock(parent, 24, [])).toEqual({ subnet: "10.0.0.0", mask: 24 });
  });

  it("skips taken blocks, including larger ones", () => {
    const taken = [
      { subnet: "10.0.0.0", mask: 24 },
      { subnet: "10.0.2.0", mask: 23 },
    ];
    expect(findFreeBlock(parent, 24, taken)).toEqual({ subnet: "10.0.1.0", mask: 24 });
    expect(findFreeBlock(parent, 23, taken)).toBeNull();
  });

  it("returns null when the parent is full or the prefix is shorter than the parent's", () => {
    expect(findFreeBlock(parent, 22, [{ subnet: "10.0.1.128", mask: 25 }])).toBeNull();
    expect(findFreeBlock(parent, 16, [])).toBeNull();
  });
});
