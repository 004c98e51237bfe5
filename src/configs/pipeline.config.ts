import { registerAs } from '@nestjs/config';
import { parseBoolean, parseInteger } from '../common/utils/env.util';

export interface PipelineConfig {
  rawDir: string;
  processedDir: string;
  urlsCsv: string;
  parseMaxErrors: number;
  fetchTimeoutMs: number;
  fetchRetries: number;
  fetchConcurrency: number;
  fetchStrict: boolean;
  loadChunkSize: number;
  preferImage: boolean;
}

export default registerAs(
  'pipeline',
  (): PipelineConfig => ({
    rawDir: process.env.RAW_DIR || 'data/raw/openflights',
    processedDir: process.env.PROCESSED_DIR || 'data/processed',
    urlsCsv: process.env.URLS_CSV || 'data/external/image_urls.csv',
    // 0 aborts on the first malformed row
    parseMaxErrors: parseInteger(process.env.PARSE_MAX_ERRORS, 0, 'PARSE_MAX_ERRORS'),
    fetchTimeoutMs: parseInteger(process.env.FETCH_TIMEOUT_MS, 15000, 'FETCH_TIMEOUT_MS', 1),
    fetchRetries: parseInteger(process.env.FETCH_RETRIES, 3, 'FETCH_RETRIES', 1),
    fetchConcurrency: parseInteger(process.env.FETCH_CONCURRENCY, 4, 'FETCH_CONCURRENCY', 1),
    fetchStrict: parseBoolean(process.env.FETCH_STRICT, false),
    loadChunkSize: parseInteger(process.env.LOAD_CHUNK_SIZE, 500, 'LOAD_CHUNK_SIZE', 1),
    preferImage: parseBoolean(process.env.PREFER_IMAGE, true),
  }),
);
