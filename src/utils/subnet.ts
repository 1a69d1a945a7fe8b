import { addressToNumber, numberToAddress, prefixLengthToNumber } from "./address";

export interface Block {
  subnet: string;
  mask: number;
}

export type BlockRange = {
  start: number;
  end: number;
};

export const blockRange = ({ subnet, mask }: Block): BlockRange => {
  const maskValue = prefixLengthToNumber(mask);
  const network = (addressToNumber(subnet) & maskValue) >>> 0;
  const broadcast = (network | (~maskValue >>> 0)) >>> 0;
  return { start: network, end: broadcast };
};

export const isNetworkAddress = (block: Block) =>
  blockRange(block).start === addressToNumber(block.subnet);

export const blockContains = (outer: Block, inner: Block) => {
  const a = blockRange(outer);
  const b = blockRange(inner);
  return a.start <= b.start && b.end <= a.end;
};

export const blocksOverlap = (left: Block, right: Block) => {
  const a = blockRange(left);
  const b = blockRange(right);
  return a.start <= b.end && b.start <= a.end;
};

export const blockContainsAddress = (block: Block, address: string) => {
  const value = addressToNumber(address);
  const range = blockRange(block);
  return value >= range.start && value <= range.end;
};

export const formatBlock = ({ subnet, mask }: Block) => `${subnet}/${mask}`;

/**
 * First aligned block of the given prefix length inside `parent` that does not
 * overlap any of `taken`, or null when the parent is full.
 */
export const findFreeBlock = (parent: Block, mask: number, taken: Block[]): Block | null => {
  if (mask < parent.mask) {
    return null;
  }
  const range = blockRange(parent);
  const size = 2 ** (32 - mask);
  const used = taken.map(blockRange).sort((a, b) => a.start - b.start);

  let start = range.start;
  while (start + size - 1 <= range.end) {
    const end = start + size - 1;
    const clash = used.find((other) => other.start <= end && start <= other.end);
    if (!clash) {
      return { subnet: numberToAddress(start), mask };
    }
    // skip to the first aligned candidate past the clashing block
    start = range.start + Math.ceil((clash.end + 1 - range.start) / size) * size;
  }

  return null;
};
