import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Total API requests',
  labelNames: ['route', 'code'],
  registers: [registry],
});

export const apiLatencyMs = new Histogram({
  name: 'api_latency_ms',
  help: 'API latency in ms',
  labelNames: ['route'],
  buckets: [10, 25, 50, 100, 200, 400, 800, 1600],
  registers: [registry],
});

export const queryRowsTotal = new Counter({
  name: 'archive_query_rows_total',
  help: 'Raw transactions returned by range queries',
  registers: [registry],
});

export const partitionsReadTotal = new Counter({
  name: 'archive_query_partitions_read_total',
  help: 'Partitions opened by range queries',
  registers: [registry],
});

export const rowGroupsTotal = new Counter({
  name: 'archive_query_row_groups_total',
  help: 'Row groups seen by range queries, by whether their timestamp stats allowed skipping them',
  labelNames: ['outcome'],
  registers: [registry],
});
