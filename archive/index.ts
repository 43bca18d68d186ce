/**
 * Weather Archive - Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';

// Record model and codecs
export * from './record';
export * from './date';
export * from './codec';

// Store and queries
export * from './archive';
export * from './variables';
export * from './stats';
export * from './random';
export * from './resample';
export * from './ranges';
export * from './query';

// Loading and configuration
export * from './ingest/loader';
export * from './config';
export * from './errors';
