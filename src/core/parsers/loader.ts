/**
 * @fileOverview: Parser registry with a one-time availability probe per dialect
 * @module: ParserLoader
 * @keyFunctions:
 *   - probe(): Load a dialect's adapter once and remember whether that worked
 *   - availability(): Tri-state used by the checker before a pass
 *   - load(): The adapter, or ParserUnavailableError
 * @dependencies:
 *   - errorHandler: ParserUnavailableError for dialects that failed to load
 */

import { ParserUnavailableError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import type { Dialect, DialectAvailability, ParserAdapter, ParserFactory } from './types';

type ProbeResult = { ok: true; adapter: ParserAdapter } | { ok: false; reason: string };

export class ParserLoader {
  private readonly factories = new Map<Dialect, ParserFactory>();
  private readonly probes = new Map<Dialect, ProbeResult>();

  constructor(factories: ParserFactory[]) {
    for (const factory of factories) {
      this.factories.set(factory.dialect, factory);
    }
  }

  isOptional(dialect: Dialect): boolean {
    return this.factories.get(dialect)?.optional ?? false;
  }

  probe(dialect: Dialect): boolean {
    return this.probeResult(dialect).ok;
  }

  /**
   * `not-applicable` when there is nothing to parse; the adapter is only loaded otherwise.
   */
  availability(dialect: Dialect, fileCount: number): DialectAvailability {
    if (fileCount === 0) return 'not-applicable';
    return this.probe(dialect) ? 'available' : 'unavailable';
  }

  load(dialect: Dialect): ParserAdapter {
    const result = this.probeResult(dialect);
    if (!result.ok) {
      throw new ParserUnavailableError(dialect, result.reason);
    }
    return result.adapter;
  }

  private probeResult(dialect: Dialect): ProbeResult {
    const cached = this.probes.get(dialect);
    if (cached) return cached;

    const factory = this.factories.get(dialect);
    let result: ProbeResult;
    if (!factory) {
      result = { ok: false, reason: 'no parser registered' };
    } else {
      try {
        result = { ok: true, adapter: factory.load() };
      } catch (error) {
        result = { ok: false, reason: error instanceof Error ? error.message : String(error) };
      }
    }

    if (!result.ok) {
      logger.debug('Parser failed to load', { dialect, reason: result.reason });
    }
    this.probes.set(dialect, result);
    return result;
  }
}
