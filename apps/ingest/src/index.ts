import 'dotenv/config';
import { createServer, type Server } from 'node:http';
import { createLogger } from '@mempool-archive/archive';
import { USAGE, UsageError, parseCommand, runCommand, type Command } from './cli';
import { loadConfig } from './config';
import { DumpsterListing } from './listing';
import { registry } from './metrics';
import { Ingestor } from './pipeline';
import { HttpSource } from './source';
import { PartitionWriter } from './writer';

const log = createLogger('ingest');

function startMetricsServer(port: number): Server {
  const server = createServer(async (req, res) => {
    if (req.url?.startsWith('/metrics')) {
      const body = await registry.metrics();
      res.writeHead(200, { 'Content-Type': registry.contentType }); res.end(body); return;
    }
    if (req.url?.startsWith('/healthz')) {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok' })); return;
    }
    res.writeHead(404); res.end();
  });
  server.listen(port, () => log.info({ port }, 'ingest metrics up'));
  return server;
}

function readCommand(argv: string[], dataDir: string): Command | 'help' | 'usage' {
  try {
    return parseCommand(argv, dataDir);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`${err.message}\n`);
    return 'usage';
  }
}

async function main(): Promise<number> {
  const cfg = loadConfig();
  const cmd = readCommand(process.argv.slice(2), cfg.dataDir);
  if (cmd === 'help' || cmd === 'usage') {
    process.stdout.write(`${USAGE}\n`);
    return cmd === 'help' ? 0 : 2;
  }

  const source = new HttpSource(cfg.sourceBaseUrl, cfg.fetchTimeoutMs);
  const listing = new DumpsterListing(cfg.sourceIndexUrl, cfg.sourceBaseUrl, cfg.fetchTimeoutMs);
  const metrics = cfg.metricsPort ? startMetricsServer(cfg.metricsPort) : undefined;
  try {
    return await runCommand(cmd, {
      listing,
      ingestorFor: (dataDir) => new Ingestor(source, new PartitionWriter({ dataDir, rowGroupSize: cfg.rowGroupSize })),
      print: (line) => process.stdout.write(`${line}\n`),
    });
  } finally {
    metrics?.close();
  }
}

main()
  .then((code) => { process.exitCode = code; })
  .catch((err) => { log.error({ err }, 'fatal'); process.exit(1); });
