/**
 * Crawling System
 * Main export file for crawl utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './duplicate-detector';
export * from './link-discoverer';
