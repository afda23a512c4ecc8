import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

const DEPLOYER = '0x1111111111111111111111111111111111111111';

describe('loadConfig', () => {
  it('should apply defaults when only the deployer is set', () => {
    expect(loadConfig({ LEDGER_DEPLOYER: DEPLOYER })).toEqual({
      port: 3000,
      logLevel: 'info',
      deployer: DEPLOYER,
      ledgerAddress: undefined,
      corsOrigins: [],
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      LEDGER_DEPLOYER: '0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA',
      LEDGER_ADDRESS: '0x9999999999999999999999999999999999999999',
      CORS_ORIGINS: 'https://wallet.example.com, https://dash.example.com,',
    });

    expect(config).toEqual({
      port: 8080,
      logLevel: 'debug',
      deployer: '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
      ledgerAddress: '0x9999999999999999999999999999999999999999',
      corsOrigins: ['https://wallet.example.com', 'https://dash.example.com'],
    });
  });

  it('should reject a missing deployer', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it('should name each invalid variable', () => {
    expect(() => loadConfig({ LEDGER_DEPLOYER: 'nobody', PORT: '0' })).toThrow(
      'Invalid environment configuration: PORT: Number must be greater than or equal to 1; LEDGER_DEPLOYER: Must be a 0x-prefixed 20-byte hex address'
    );
  });
});
