import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const decodedRowsTotal = new Counter({
  name: 'archive_decoded_rows_total',
  help: 'CSV rows seen by the decoder, by outcome (accepted|rejected)',
  labelNames: ['kind', 'outcome'],
  registers: [registry],
});

export const normalizerDroppedTotal = new Counter({
  name: 'archive_normalizer_dropped_total',
  help: 'Records dropped during normalization (undecodable raw payloads)',
  labelNames: ['kind'],
  registers: [registry],
});

export const partitionsTotal = new Counter({
  name: 'archive_partitions_total',
  help: 'Partition write outcomes (written|skipped|failed)',
  labelNames: ['kind', 'result'],
  registers: [registry],
});

export const sourceBytesTotal = new Counter({
  name: 'archive_source_bytes_total',
  help: 'Compressed bytes downloaded from the upstream dump',
  labelNames: ['kind'],
  registers: [registry],
});

export const ingestDurationMs = new Histogram({
  name: 'archive_ingest_duration_ms',
  help: 'Wall time of one day/kind ingestion (fetch, decode, normalize, write)',
  labelNames: ['kind'],
  buckets: [100, 500, 1000, 5000, 15000, 60000, 180000, 600000],
  registers: [registry],
});
