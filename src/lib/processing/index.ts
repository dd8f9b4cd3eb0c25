/**
 * Content Processing System
 * Main export file for content processing
 */

export * from './text.processor';
export * from './structured-data';
export * from './html.processor';
