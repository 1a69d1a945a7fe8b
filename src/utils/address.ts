import crypto from "crypto";
import { FormatError } from "../errors";

const IPV4_REGEX =
  /^(?:(?:25[0-5]|2[0-4]\d|1\d{2}|[1-9]?\d)\.){3}(?:25[0-5]|2[0-4]\d|1\d{2}|[1-9]?\d)$/;

export const isAddress = (value: string) => IPV4_REGEX.test(value);

/**
 * Dotted-quad text to its 4-byte network-order form.
 * Throws FormatError for anything but a canonical IPv4 literal.
 */
export const parseAddress = (value: string): Buffer => {
  if (!isAddress(value)) {
    throw new FormatError(`Invalid IPv4 address: ${JSON.stringify(value)}`);
  }
  return Buffer.from(value.split(".").map((part) => Number(part)));
};

export const formatAddress = (bytes: Uint8Array): string => {
  if (bytes.length !== 4) {
    throw new FormatError(`IPv4 address must be 4 bytes, got ${bytes.length}`);
  }
  return Array.from(bytes).join(".");
};

export const addressToNumber = (value: string): number => parseAddress(value).readUInt32BE(0);

export const numberToAddress = (value: number): string =>
  [
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff,
  ].join(".");

/** Unsigned 32-bit subnet mask with the high `bits` bits set. */
export const prefixLengthToNumber = (bits: number): number => {
  if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
    throw new RangeError(`Prefix length must be an integer in [1, 32], got ${bits}`);
  }
  return (0xffffffff ^ ((2 ** (32 - bits)) - 1)) >>> 0;
};

export const maskFromPrefixLength = (bits: number): Buffer => {
  const mask = Buffer.alloc(4);
  mask.writeUInt32BE(prefixLengthToNumber(bits), 0);
  return mask;
};

/**
 * Synthetic hardware address for an IP: a zero octet followed by the first
 * five bytes of the MD5 digest of the address text.
 */
export const deriveMac = (address: string): Buffer => {
  parseAddress(address);
  const digest = crypto.createHash("md5").update(address, "ascii").digest();
  return Buffer.concat([Buffer.from([0x00]), digest.subarray(0, 5)]);
};

export const formatMac = (bytes: Uint8Array): string =>
  Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(":");

export interface AddressBinding {
  address: Buffer;
  mask: Buffer;
  mac: Buffer;
}

/** Binary tuple a simulator needs to bind an address to a link endpoint. */
export const encodeBinding = (assignment: { address: string; mask: number }): AddressBinding => ({
  address: parseAddress(assignment.address),
  mask: maskFromPrefixLength(assignment.mask),
  mac: deriveMac(assignment.address),
});
