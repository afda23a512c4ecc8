/**
 * HTTP test helpers
 * Provides utilities for making requests to the Hono app against a fresh ledger
 */

import type { Env, Hono } from 'hono';
import { LedgerEventEmitter, TokenLedger } from '@mona/core';
import { createApp } from '../app.js';
import { CALLER_HEADER } from '../middleware/caller.js';

export const DEPLOYER = '0x1111111111111111111111111111111111111111';
export const MINTER = '0x2222222222222222222222222222222222222222';
export const USER = '0x3333333333333333333333333333333333333333';
export const OTHER = '0x4444444444444444444444444444444444444444';
export const LEDGER_ADDRESS = '0x9999999999999999999999999999999999999999';
export const FIXED_TIME = new Date('2025-01-01T00:00:00.000Z');

/** 10^18 base units */
export const ONE = 10n ** 18n;

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Deploy a ledger with fixed addresses and clock, and an app serving it
 */
export function createTestApp() {
  const events = new LedgerEventEmitter();
  const ledger = TokenLedger.deploy(
    { deployer: DEPLOYER, address: LEDGER_ADDRESS, now: () => FIXED_TIME },
    { publisher: events }
  );
  const app = createApp({ ledger });
  return { app, ledger, events };
}

/**
 * Make an HTTP request to the Hono app
 *
 * @param app - Hono application instance
 * @param method - HTTP method (GET, POST, etc.)
 * @param path - Request path (e.g., '/v1/token')
 * @param options - Request options (body, headers)
 * @returns Response object
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    // Strings are sent as-is so tests can send malformed bodies
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.request(path, init);
}

/**
 * Make a request acting as `caller`
 */
export async function makeCallerRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  caller: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: {
      ...(options.headers ?? {}),
      [CALLER_HEADER]: caller,
    },
  });
}

/**
 * Parse a response body with a schema so assertions are typed
 */
export async function readJson<T>(
  response: Response,
  schema: { parse(data: unknown): T }
): Promise<T> {
  return schema.parse(await response.json());
}
