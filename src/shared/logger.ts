/**
 * Pipeline Logger
 *
 * File logger for the request pipeline. Appends timestamped lines to LOG_PATH
 * so console output stays clean for library consumers.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from './config.js';

/**
 * Log levels for pipeline operations
 */
export enum PipelineLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Pipeline logger utility
 */
export class PipelineLogger {
  private static enabled = true;

  private static log(level: PipelineLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Pipeline:${level}] ${message}`;

    try {
      fs.appendFileSync(LOG_PATH, logMsg + '\n');
    } catch (error) {
      // disabled after the first failed write
      this.enabled = false;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Pipeline:ERROR] Cannot write ${LOG_PATH}, file logging disabled: ${reason}`);
    }
  }

  static isEnabled(): boolean {
    return this.enabled;
  }

  static info(message: string): void {
    this.log(PipelineLogLevel.INFO, message);
  }

  static warn(message: string): void {
    this.log(PipelineLogLevel.WARN, message);
  }

  static error(message: string, error?: unknown): void {
    const detail = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : '';
    this.log(PipelineLogLevel.ERROR, `${message}${detail}`);
  }

  /**
   * Only written when LOG_LEVEL=DEBUG
   */
  static debug(message: string): void {
    if (LOG_LEVEL === 'DEBUG') {
      this.log(PipelineLogLevel.DEBUG, message);
    }
  }

  static settingsLoaded(source: string, entries: number): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(PipelineLogLevel.INFO, `Loaded ${entries} entries from ${source}`);
  }

  static settingsEntrySkipped(source: string, entry: string, reason: string): void {
    this.log(PipelineLogLevel.WARN, `Skipped ${source} entry '${entry}': ${reason}`);
  }

  static requestClassified(category: string, complex: boolean): void {
    this.debug(`Request classified as '${category}'${complex ? ' (complex)' : ''}`);
  }

  static domainDetected(domain: string, keyword: string): void {
    this.debug(`Domain '${domain}' detected via keyword '${keyword}'`);
  }

  static retrievalMatched(topics: string[], keywords: string[]): void {
    if (topics.length === 0) {
      this.info(`No knowledge topics matched keywords [${keywords.join(', ')}]`);
      return;
    }
    this.info(`Matched ${topics.length} topic(s) [${topics.join(', ')}] for keywords [${keywords.join(', ')}]`);
  }

  static skillFallback(userId: string, rawTier: string | undefined, fallbackTier: string): void {
    const shown = rawTier === undefined ? 'none' : `'${rawTier}'`;
    this.warn(`User '${userId}' has tier ${shown}; using ${fallbackTier}`);
  }

  static fallbackPlanUsed(planKey: string, reason: string): void {
    this.warn(`Using fallback plan '${planKey}': ${reason}`);
  }

  static backendFailure(provider: string, error: unknown): void {
    this.error(`Generation backend '${provider}' failed`, error);
  }

  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}
