import { describe, expect, it } from 'vitest';

import { parseEnv, toIndexerConfig } from '../config.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const config = toIndexerConfig(parseEnv({}), '/srv/indexer');

    expect(config).toEqual({
      assetCacheTtlMs: 600_000,
      reconnectBaseDelayMs: 1_000,
      reconnectMaxDelayMs: 60_000,
      rpcTimeoutMs: 30_000,
      rpcUrl: 'wss://polkadot-asset-hub-rpc.polkadot.io',
      schemaPath: '/srv/indexer/artifacts/asset-hub-schema.json',
    });
  });

  it('reads overrides', () => {
    const config = toIndexerConfig(
      parseEnv({
        XCM_INDEXER_RPC_TIMEOUT_MS: '500',
        XCM_INDEXER_RPC_URL: 'ws://127.0.0.1:9944',
        XCM_INDEXER_SCHEMA_PATH: '/tmp/schema.json',
      }),
      '/srv/indexer'
    );

    expect(config.rpcUrl).toBe('ws://127.0.0.1:9944');
    expect(config.rpcTimeoutMs).toBe(500);
    expect(config.schemaPath).toBe('/tmp/schema.json');
  });

  it('rejects non-WebSocket URLs', () => {
    expect(() => parseEnv({ XCM_INDEXER_RPC_URL: 'https://example.org' })).toThrow(
      'XCM_INDEXER_RPC_URL: Node URL must use ws:// or wss://'
    );
  });

  it('rejects malformed numbers', () => {
    expect(() => parseEnv({ XCM_INDEXER_RPC_TIMEOUT_MS: 'soon' })).toThrow('XCM_INDEXER_RPC_TIMEOUT_MS');
  });

  it('rejects a base delay above the maximum', () => {
    expect(() =>
      parseEnv({ XCM_INDEXER_RECONNECT_BASE_DELAY_MS: '5000', XCM_INDEXER_RECONNECT_MAX_DELAY_MS: '1000' })
    ).toThrow('must not exceed');
  });
});
