import 'dotenv/config';
import { createLogger } from '@mempool-archive/archive';
import { createApp } from './app';
import { loadConfig } from './config';
import { RangeQueryEngine } from './queryEngine';

const log = createLogger('api');
const cfg = loadConfig();

const app = createApp(new RangeQueryEngine(cfg.dataDir));
const server = app.listen(cfg.port, () => log.info({ port: cfg.port, dataDir: cfg.dataDir }, 'api up'));

function shutdown(signal: string) {
  log.info({ signal }, 'shutting down');
  server.close((err) => {
    if (err) log.error({ err }, 'close failed');
    process.exit(err ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
