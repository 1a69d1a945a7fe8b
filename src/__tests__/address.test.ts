import crypto from "crypto";
import { describe, expect, it } from "vitest";
import { FormatError } from "../errors";
import {
  addressToNumber,
  deriveMac,
  encodeBinding,
  formatAddress,
  formatMac,
  maskFromPrefixLength,
  numberToAddress,
  parseAddress,
  prefixLengthToNumber,
} from "../utils/address";

describe("parseAddress", () => {
  it("encodes a dotted quad as four network-order bytes", () => {
    expect([...parseAddress("10.0.0.1")]).toEqual([10, 0, 0, 1]);
    expect([...parseAddress("192.168.254.3")]).toEqual([192, 168, 254, 3]);
    expect([...parseAddress("255.255.255.255")]).toEqual([255, 255, 255, 255]);
  });

  it("round-trips through formatAddress", () => {
    for (const address of ["0.0.0.0", "10.0.0.1", "172.16.31.200", "8.8.4.4", "255.255.255.255"]) {
      expect(formatAddress(parseAddress(address))).toBe(address);
    }
  });

  it.each(["999.1.1.1", "not-an-ip", "", "1.2.3", "1.2.3.4.5", "01.2.3.4", " 1.2.3.4", "1.2.3.-4", "256.0.0.0"])(
    "rejects %j with FormatError",
    (value) => {
      expect(() => parseAddress(value)).toThrow(FormatError);
    }
  );

  it("converts to and from unsigned integers", () => {
    expect(addressToNumber("192.168.1.1")).toBe(3232235777);
    expect(addressToNumber("255.255.255.255")).toBe(4294967295);
    expect(numberToAddress(3232235777)).toBe("192.168.1.1");
  });
});

describe("maskFromPrefixLength", () => {
  it("sets the high bits", () => {
    expect([...maskFromPrefixLength(24)]).toEqual([0xff, 0xff, 0xff, 0x00]);
    expect([...maskFromPrefixLength(1)]).toEqual([0x80, 0x00, 0x00, 0x00]);
    expect([...maskFromPrefixLength(32)]).toEqual([0xff, 0xff, 0xff, 0xff]);
    expect([...maskFromPrefixLength(20)]).toEqual([0xff, 0xff, 0xf0, 0x00]);
  });

  it("returns unsigned numbers", () => {
    expect(prefixLengthToNumber(1)).toBe(0x80000000);
    expect(prefixLengthToNumber(32)).toBe(0xffffffff);
  });

  it.each([0, 33, -1, 1.5, Number.NaN])("rejects %s with RangeError", (bits) => {
    expect(() => maskFromPrefixLength(bits)).toThrow(RangeError);
  });
});

describe("deriveMac", () => {
  it("is deterministic and starts with a zero octet", () => {
    const first = deriveMac("10.0.0.1");
    const second = deriveMac("10.0.0.1");
    expect(first).toHaveLength(6);
    expect(first.equals(second)).toBe(true);
    expect(first[0]).toBe(0x00);
  });

  it("uses the first five bytes of the MD5 of the address text", () => {
    const digest = crypto.createHash("md5").update("10.0.0.1").digest();
    expect([...deriveMac("10.0.0.1")]).toEqual([0, ...digest.subarray(0, 5)]);
  });

  it("differs across distinct addresses", () => {
    const addresses = ["10.0.0.1", "10.0.0.2", "10.0.0.3", "10.0.1.1", "192.168.0.1", "172.16.0.1"];
    const macs = new Set(addresses.map((address) => formatMac(deriveMac(address))));
    expect(macs.size).toBe(addresses.length);
    expect(deriveMac("10.0.0.1").equals(deriveMac("10.0.0.2"))).toBe(false);
  });

  it("rejects malformed addresses", () => {
    expect(() => deriveMac("10.0.0")).toThrow(FormatError);
  });
});

describe("encodeBinding", () => {
  it("produces address, mask and mac buffers", () => {
    const binding = encodeBinding({ address: "10.1.2.3", mask: 16 });
    expect([...binding.address]).toEqual([10, 1, 2, 3]);
    expect([...binding.mask]).toEqual([255, 255, 0, 0]);
    expect(binding.mac.equals(deriveMac("10.1.2.3"))).toBe(true);
  });

  it("formats macs as colon-separated hex", () => {
    expect(formatMac(Buffer.from([0, 1, 0xab, 0x10, 0xff, 2]))).toBe("00:01:ab:10:ff:02");
  });
});
