/**
 * Digest assembly: page dedup, sentence dedup, company signals and the
 * byte-budgeted renderer
 */

export * from './page-deduplicator';
export * from './sentence-deduplicator';
export * from './summary';
export * from './company-signals';
export * from './digest.assembler';
