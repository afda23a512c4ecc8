import { describe, expect, it } from 'vitest';
import { AddressSchema, AmountSchema, MAX_UINT256 } from '../address.schema.js';
import { EventsQuerySchema, MintRequestSchema, RoleAccountRequestSchema } from '../ledger.schema.js';
import { LEDGER_ROLES, isLedgerRole } from '../roles.js';

describe('AddressSchema', () => {
  it('lower-cases valid addresses', () => {
    expect(AddressSchema.parse('0xABCDEFabcdef0123456789ABCDEFabcdef012345')).toBe(
      '0xabcdefabcdef0123456789abcdefabcdef012345'
    );
  });

  it('rejects addresses of the wrong length or alphabet', () => {
    expect(AddressSchema.safeParse('0x1234').success).toBe(false);
    expect(AddressSchema.safeParse('0xzz34567890123456789012345678901234567890').success).toBe(false);
    expect(AddressSchema.safeParse(42).success).toBe(false);
  });
});

describe('AmountSchema', () => {
  it('parses decimal strings into bigints', () => {
    expect(AmountSchema.parse('500000000000000000000')).toBe(500n * 10n ** 18n);
    expect(AmountSchema.parse('0')).toBe(0n);
  });

  it('accepts the largest 256-bit value and rejects anything above it', () => {
    expect(AmountSchema.parse(MAX_UINT256.toString())).toBe(MAX_UINT256);
    expect(AmountSchema.safeParse((MAX_UINT256 + 1n).toString()).success).toBe(false);
  });

  it('rejects negative, fractional and numeric amounts', () => {
    expect(AmountSchema.safeParse('-1').success).toBe(false);
    expect(AmountSchema.safeParse('1.5').success).toBe(false);
    expect(AmountSchema.safeParse(10).success).toBe(false);
  });
});

describe('request schemas', () => {
  it('validates mint requests', () => {
    const parsed = MintRequestSchema.parse({
      to: '0x3333333333333333333333333333333333333333',
      amount: '7',
    });
    expect(parsed).toEqual({ to: '0x3333333333333333333333333333333333333333', amount: 7n });
  });

  it('requires an account for role changes', () => {
    expect(RoleAccountRequestSchema.safeParse({}).success).toBe(false);
  });

  it('coerces the event sequence filter from query strings', () => {
    expect(EventsQuerySchema.parse({ fromSequence: '4', type: 'transfer' })).toEqual({
      fromSequence: 4,
      type: 'transfer',
    });
    expect(EventsQuerySchema.safeParse({ type: 'unknown' }).success).toBe(false);
  });
});

describe('roles', () => {
  it('lists the three ledger roles', () => {
    expect(LEDGER_ROLES).toEqual(['admin', 'minter', 'pauser']);
  });

  it('validates role values', () => {
    expect(isLedgerRole('minter')).toBe(true);
    expect(isLedgerRole('owner')).toBe(false);
    expect(isLedgerRole(null)).toBe(false);
  });
});
