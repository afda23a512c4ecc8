/**
 * Address and amount primitives shared by the ledger, the API and the SDK
 */

import { z } from 'zod';

export type Address = `0x${string}`;

export const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

/** Largest amount the ledger can hold: 2^256 - 1 */
export const MAX_UINT256 = (1n << 256n) - 1n;

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

/**
 * Lower-case the hex digits so that differently-cased spellings of the
 * same account map to one key
 */
export function normalizeAddress(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

export const AddressSchema = z
  .custom<Address>(isAddress, { message: 'Must be a 0x-prefixed 20-byte hex address' })
  .transform(normalizeAddress);

/**
 * Amounts travel as decimal strings because JSON numbers cannot hold 256-bit
 * integers
 */
export const DecimalStringSchema = z
  .string()
  .regex(/^\d+$/, 'Amount must be a non-negative integer in decimal notation');

export const AmountSchema = DecimalStringSchema.transform((value) => BigInt(value)).refine(
  (value) => value <= MAX_UINT256,
  'Amount cannot exceed 2^256 - 1'
);
