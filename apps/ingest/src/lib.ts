export * from './types';
export * from './shapes';
export { decodeDump, extractFirstMember } from './decoder';
export { normalize } from './normalizer';
export { decodeRawTx, type DecodedPayload, type PayloadResult } from './rawTx';
export { PartitionWriter, DEFAULT_ROW_GROUP_SIZE, type WriteOutcome, type PartitionWriterOptions } from './writer';
export { Ingestor, type IngestOptions, type BatchOptions, type IngestResult, type BatchEntry } from './pipeline';
export { HttpSource, dumpUrl, type SourceFetcher } from './source';
export { DumpsterListing, parseDayIndex, parseMonthIndex, type ListingService } from './listing';
