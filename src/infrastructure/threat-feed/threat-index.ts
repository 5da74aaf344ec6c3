import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { ThreatIndicatorSet } from '../../domain/index.js';

/** Immutable set of threat indicators, exact string membership. */
export class ThreatIndex implements ThreatIndicatorSet {
  private readonly indicators: ReadonlySet<string>;

  constructor(indicators: Iterable<string> = []) {
    this.indicators = new Set(indicators);
  }

  /**
   * Parses feed text: one indicator per line, surrounding whitespace
   * trimmed, blank lines and `#` comments skipped.
   */
  static fromFeedText(text: string): ThreatIndex {
    const entries: string[] = [];
    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      if (line === '' || line.startsWith('#')) continue;
      entries.push(line);
    }
    return new ThreatIndex(entries);
  }

  get size(): number {
    return this.indicators.size;
  }

  contains(address: string): boolean {
    return this.indicators.has(address);
  }
}

/**
 * Loads the threat feed file once at startup.
 *
 * Falls back to an empty index if the file is missing or unreadable.
 */
export function loadThreatFeed(path: string, log: Logger): ThreatIndex {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    log.warn({ err, path }, 'Threat feed not readable — threat checks match nothing');
    return new ThreatIndex();
  }

  const index = ThreatIndex.fromFeedText(text);
  log.info({ path, entries: index.size }, 'Threat feed loaded');
  return index;
}
