/**
 * Campaign Graph
 *
 * Resumable, per-session workflow engine with interactive nodes that
 * suspend on a question until the client replies, and the campaign
 * configuration workflow built on it.
 *
 * @packageDocumentation
 */

export * from './graph';
export type * from './types/graph.types';
export * from './constants';
export * from './errors';
export * from './logger';
export * from './messages';

// Schema and state management with Zod
export * from './schema/state-schema';
export * from './schema/tracker-schema';

// Checkpoints and persistence
export * from './checkpoint-store';
export * from './persistence/storage-adapter';
export * from './persistence/memory-adapter';

// Sessions
export * from './suspension-broker';
export * from './session';
export * from './session-registry';

// Campaign workflow
export * from './campaign/campaign-graph';
export * from './campaign/campaign-state';
export type * from './campaign/types';
export * from './clients/completion';
export * from './clients/list-provider';

// Server
export * from './app';
export * from './config';
export * from './transport/connection-manager';
export * from './transport/connection-handler';
export * from './server';
