/**
 * RPS Export - Main Entry Point
 * =============================
 * Exports all public API
 */

// Types
export * from './types';

// Core
export * from './core/config';
export * from './core/errors';

// Data pipeline
export * from './data';

// Utils
export * from './utils/logger';

// CLI
export { main, buildConfig, createProgram } from './cli';
