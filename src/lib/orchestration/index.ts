/**
 * Crawler Orchestration
 */

export * from './orchestrator.types';
export * from './crawler-orchestrator';
