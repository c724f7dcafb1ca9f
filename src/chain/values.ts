import { formatUnits, isAddress } from 'ethers';

// Contract reads come back as `unknown`; these narrow them or throw.

export function expectBigInt(value: unknown, label: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw new TypeError(`${label}: expected an integer, got ${describe(value)}`);
}

export function expectAddress(value: unknown, label: string): string {
  if (typeof value === 'string' && isAddress(value)) return value;
  throw new TypeError(`${label}: expected an address, got ${describe(value)}`);
}

export function expectHex(value: unknown, label: string): string {
  if (typeof value === 'string' && /^0x[0-9a-fA-F]*$/.test(value)) return value;
  throw new TypeError(`${label}: expected hex data, got ${describe(value)}`);
}

export function expectList(value: unknown, label: string): readonly unknown[] {
  if (Array.isArray(value)) return value;
  throw new TypeError(`${label}: expected a list, got ${describe(value)}`);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${value}"`;
  return typeof value;
}

/**
 * Smallest-unit integer → display amount.
 */
export function toDecimal(amount: bigint, decimals: number): number {
  return Number(formatUnits(amount, decimals));
}

export function ceilDiv(a: bigint, b: bigint): bigint {
  return (a + b - 1n) / b;
}
