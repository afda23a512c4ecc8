/**
 * Typed client for the Monad Token ledger API
 *
 * Queries return amounts as bigint; mutating calls act as the configured
 * account (sent as X-Ledger-Account) and resolve with the events the
 * operation published.
 */

import {
  AccountResponseSchema,
  AllowanceResponseSchema,
  ErrorResponseSchema,
  EventsResponseSchema,
  ReceiptResponseSchema,
  TokenInfoResponseSchema,
  type EventsQuery,
  type LedgerEventResponse,
  type LedgerRole,
} from '@mona/types';
import { LedgerApiError } from './errors.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface LedgerClientConfig {
  baseUrl: string;
  /** Account mutating requests act as */
  account?: string;
  fetch?: FetchLike;
}

export interface TokenInfo {
  address: string;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  paused: boolean;
}

export interface AccountInfo {
  address: string;
  balance: bigint;
  roles: Record<LedgerRole, boolean>;
}

type WithTypedValues<E> = E extends { amount: string }
  ? Omit<E, 'amount' | 'timestamp'> & { amount: bigint; timestamp: Date }
  : Omit<E, 'timestamp'> & { timestamp: Date };

export type LedgerEventRecord = WithTypedValues<LedgerEventResponse>;

export interface Receipt {
  events: LedgerEventRecord[];
}

interface Schema<T> {
  parse(data: unknown): T;
}

export class LedgerClient {
  private readonly baseUrl: string;
  private readonly actingAccount: string | undefined;
  private readonly fetchFn: FetchLike;

  constructor(private readonly config: LedgerClientConfig) {
    // Remove trailing slash to prevent double slashes
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.actingAccount = config.account;
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Same server, acting as another account
   */
  as(account: string): LedgerClient {
    return new LedgerClient({ ...this.config, account });
  }

  // Queries

  async token(): Promise<TokenInfo> {
    const data = await this.request('GET', '/v1/token', TokenInfoResponseSchema);
    return { ...data, totalSupply: BigInt(data.totalSupply) };
  }

  async totalSupply(): Promise<bigint> {
    return (await this.token()).totalSupply;
  }

  async paused(): Promise<boolean> {
    return (await this.token()).paused;
  }

  async account(address: string): Promise<AccountInfo> {
    const data = await this.request(
      'GET',
      `/v1/accounts/${encodeURIComponent(address)}`,
      AccountResponseSchema
    );
    return { ...data, balance: BigInt(data.balance) };
  }

  async balanceOf(address: string): Promise<bigint> {
    return (await this.account(address)).balance;
  }

  async hasRole(role: LedgerRole, address: string): Promise<boolean> {
    return (await this.account(address)).roles[role];
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    const data = await this.request(
      'GET',
      `/v1/allowances/${encodeURIComponent(owner)}/${encodeURIComponent(spender)}`,
      AllowanceResponseSchema
    );
    return BigInt(data.allowance);
  }

  async events(query: EventsQuery = {}): Promise<LedgerEventRecord[]> {
    const params = new URLSearchParams();
    if (query.fromSequence !== undefined) {
      params.set('fromSequence', String(query.fromSequence));
    }
    if (query.type !== undefined) {
      params.set('type', query.type);
    }
    const search = params.toString() ? `?${params.toString()}` : '';

    const data = await this.request('GET', `/v1/events${search}`, EventsResponseSchema);
    return data.events.map(toEventRecord);
  }

  // Mutations

  mint(to: string, amount: bigint): Promise<Receipt> {
    return this.submit('/v1/mint', { to, amount: amount.toString() });
  }

  burn(amount: bigint): Promise<Receipt> {
    return this.submit('/v1/burn', { amount: amount.toString() });
  }

  transfer(to: string, amount: bigint): Promise<Receipt> {
    return this.submit('/v1/transfers', { to, amount: amount.toString() });
  }

  transferFrom(from: string, to: string, amount: bigint): Promise<Receipt> {
    return this.submit('/v1/transfers/delegated', { from, to, amount: amount.toString() });
  }

  approve(spender: string, amount: bigint): Promise<Receipt> {
    return this.submit('/v1/approvals', { spender, amount: amount.toString() });
  }

  pause(): Promise<Receipt> {
    return this.submit('/v1/pause');
  }

  unpause(): Promise<Receipt> {
    return this.submit('/v1/unpause');
  }

  grantRole(role: LedgerRole, account: string): Promise<Receipt> {
    return this.submit(`/v1/roles/${role}/grant`, { account });
  }

  revokeRole(role: LedgerRole, account: string): Promise<Receipt> {
    return this.submit(`/v1/roles/${role}/revoke`, { account });
  }

  renounceRole(role: LedgerRole): Promise<Receipt> {
    return this.submit(`/v1/roles/${role}/renounce`);
  }

  private async submit(path: string, body?: Record<string, string>): Promise<Receipt> {
    if (!this.actingAccount) {
      throw new Error('LedgerClient needs an account for mutating requests');
    }
    const data = await this.request('POST', path, ReceiptResponseSchema, body, {
      'X-Ledger-Account': this.actingAccount,
    });
    return { events: data.events.map(toEventRecord) };
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: Schema<T>,
    body?: Record<string, string>,
    headers: Record<string, string> = {}
  ): Promise<T> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
      body: method === 'POST' ? JSON.stringify(body ?? {}) : undefined,
    });

    const data: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsed = ErrorResponseSchema.safeParse(data);
      throw new LedgerApiError(
        parsed.success ? parsed.data.error : 'An error occurred',
        response.status,
        parsed.success ? parsed.data.kind : undefined
      );
    }

    return schema.parse(data);
  }
}

function toEventRecord(event: LedgerEventResponse): LedgerEventRecord {
  const timestamp = new Date(event.timestamp);
  if ('amount' in event) {
    return { ...event, amount: BigInt(event.amount), timestamp };
  }
  return { ...event, timestamp };
}
