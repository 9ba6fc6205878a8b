import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('fills defaults', () => {
    expect(loadConfig({})).toEqual({
      dataDir: './data',
      sourceBaseUrl: 'https://mempool-dumpster.flashbots.net/ethereum/mainnet',
      sourceIndexUrl: 'https://mempool-dumpster.flashbots.net/index.html',
      fetchTimeoutMs: 60_000,
      rowGroupSize: 10_000,
      metricsPort: undefined,
    });
  });

  it('coerces numeric settings', () => {
    const cfg = loadConfig({ MEMPOOL_DATADIR: '/srv/archive', ROW_GROUP_SIZE: '500', INGEST_METRICS_PORT: '9400' });
    expect(cfg).toMatchObject({ dataDir: '/srv/archive', rowGroupSize: 500, metricsPort: 9400 });
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ ROW_GROUP_SIZE: '0', SOURCE_BASE_URL: 'not a url' })).toThrow(/Environment validation failed:[\s\S]*SOURCE_BASE_URL[\s\S]*ROW_GROUP_SIZE/);
  });
});
