import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Primary crawl (sequential HTTP engine)
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '15', 10),
  CRAWL_TIMEOUT: parseInt(process.env.CRAWL_TIMEOUT || '15000', 10), // per request
  CRAWL_MAX_ATTEMPTS: parseInt(process.env.CRAWL_MAX_ATTEMPTS || '3', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '500', 10), // doubled per attempt

  // Fallback crawl (concurrent Crawlee engine)
  FALLBACK_ENABLED: process.env.FALLBACK_ENABLED !== 'false', // Default true
  FALLBACK_TIMEOUT: parseInt(process.env.FALLBACK_TIMEOUT || '90000', 10),
  FALLBACK_CONCURRENCY: parseInt(process.env.FALLBACK_CONCURRENCY || '4', 10),
  FALLBACK_DELAY_MS: parseInt(process.env.FALLBACK_DELAY_MS || '500', 10),
  FALLBACK_NAVIGATION_TIMEOUT: parseInt(process.env.FALLBACK_NAVIGATION_TIMEOUT || '20000', 10),
  FALLBACK_MAX_REDIRECTS: parseInt(process.env.FALLBACK_MAX_REDIRECTS || '5', 10),

  // Digest
  MAX_OUTPUT_BYTES: parseInt(process.env.MAX_OUTPUT_BYTES || '7800', 10),
  DIGEST_DEDUP_POLICY: process.env.DIGEST_DEDUP_POLICY || 'product-repeats',
} as const;

export default env;
