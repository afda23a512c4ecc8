/**
 * Tests for audit logging of ledger events
 * Verifies the level and message chosen for each event type and that
 * amounts reach the log as decimal strings
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LedgerEventEmitter, TokenLedger } from '@mona/core';
import { logger } from '@mona/observability';
import { initializeAuditLogging } from '../audit-logger.js';
import { DEPLOYER, FIXED_TIME, LEDGER_ADDRESS, USER } from '../../test/helpers.js';

const TIMESTAMP = FIXED_TIME.toISOString();

function spyOnLogger() {
  return {
    infoSpy: vi.spyOn(logger, 'info').mockImplementation(() => undefined),
    warnSpy: vi.spyOn(logger, 'warn').mockImplementation(() => undefined),
    debugSpy: vi.spyOn(logger, 'debug').mockImplementation(() => undefined),
  };
}

describe('Audit Logger', () => {
  let emitter: LedgerEventEmitter;
  let stop: () => void;
  let infoSpy: ReturnType<typeof spyOnLogger>['infoSpy'];
  let warnSpy: ReturnType<typeof spyOnLogger>['warnSpy'];
  let debugSpy: ReturnType<typeof spyOnLogger>['debugSpy'];

  beforeEach(() => {
    ({ infoSpy, warnSpy, debugSpy } = spyOnLogger());

    emitter = new LedgerEventEmitter();
    stop = initializeAuditLogging(emitter);
  });

  afterEach(() => {
    stop();
    vi.restoreAllMocks();
  });

  function deploy() {
    return TokenLedger.deploy(
      { deployer: DEPLOYER, address: LEDGER_ADDRESS, now: () => FIXED_TIME },
      { publisher: emitter }
    );
  }

  it('should log the genesis role grants and initial transfer', async () => {
    deploy();

    await vi.waitFor(() => {
      expect(debugSpy).toHaveBeenCalledWith(
        {
          event: 'transfer',
          sequence: 3,
          from: '0x0000000000000000000000000000000000000000',
          to: DEPLOYER,
          amount: '100000000000000000000000',
          timestamp: TIMESTAMP,
        },
        'Balance moved'
      );
    });
    const roleGrants = infoSpy.mock.calls.filter(([, message]) => message === 'Role granted');
    expect(roleGrants).toHaveLength(3);
  });

  it('should log mints at info level', async () => {
    const ledger = deploy();
    ledger.mint(DEPLOYER, USER, 10n);

    await vi.waitFor(() => {
      expect(infoSpy).toHaveBeenCalledWith(
        {
          event: 'mint-occurred',
          sequence: 5,
          to: USER,
          amount: '10',
          minter: DEPLOYER,
          timestamp: TIMESTAMP,
        },
        'Tokens minted'
      );
    });
  });

  it('should log burns at info level', async () => {
    const ledger = deploy();
    ledger.burn(DEPLOYER, 4n);

    await vi.waitFor(() => {
      expect(infoSpy).toHaveBeenCalledWith(
        { event: 'burn-occurred', sequence: 5, from: DEPLOYER, amount: '4', timestamp: TIMESTAMP },
        'Tokens burned'
      );
    });
  });

  it('should log revocations and pauses at warn level', async () => {
    const ledger = deploy();
    ledger.revokeRole(DEPLOYER, 'minter', DEPLOYER);
    ledger.pause(DEPLOYER);

    await vi.waitFor(() => {
      expect(warnSpy).toHaveBeenCalledWith(
        {
          event: 'role-revoked',
          sequence: 4,
          role: 'minter',
          account: DEPLOYER,
          sender: DEPLOYER,
          timestamp: TIMESTAMP,
        },
        'Role revoked'
      );
      expect(warnSpy).toHaveBeenCalledWith(
        { event: 'paused', sequence: 5, account: DEPLOYER, timestamp: TIMESTAMP },
        'Transfers paused'
      );
    });
  });

  it('should log resumption at info level and approvals at debug level', async () => {
    const ledger = deploy();
    ledger.pause(DEPLOYER);
    ledger.unpause(DEPLOYER);
    ledger.approve(DEPLOYER, USER, 2n);

    await vi.waitFor(() => {
      expect(infoSpy).toHaveBeenCalledWith(
        { event: 'unpaused', sequence: 5, account: DEPLOYER, timestamp: TIMESTAMP },
        'Transfers resumed'
      );
      expect(debugSpy).toHaveBeenCalledWith(
        {
          event: 'approval',
          sequence: 6,
          owner: DEPLOYER,
          spender: USER,
          amount: '2',
          timestamp: TIMESTAMP,
        },
        'Allowance set'
      );
    });
  });

  it('should stop logging once stopped', async () => {
    stop();
    deploy();

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(infoSpy).not.toHaveBeenCalledWith(expect.anything(), 'Role granted');
  });
});
