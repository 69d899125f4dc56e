/**
 * Shared types and interfaces for the refnote CLI
 */

import type { Logger } from './api/logger.js';
import type { Settings } from './config/settings.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Path of the YAML config file */
  config?: string;
  /** Output JSON for scripting */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  settings: Settings;
  logger: Logger;
  /** Aborted on SIGINT / SIGTERM */
  signal?: AbortSignal;
}
