/**
 * Name clash bookkeeping for one merge run
 */

export type MergeMode = 'strict' | 'graceful';

export interface ClashEvent {
  mode: MergeMode;
  keys: string[];
  /** Scope path the colliding source nodes came from */
  sourceScope: string;
  /** Scope path of the destination container */
  destinationScope: string;
  /** Source document name */
  source: string;
}

export interface MissingSourceEvent {
  pkg: string;
  source: string;
}

/**
 * Collects every clash seen during a run. Strict clashes decide whether the
 * run must abort; graceful clashes only feed the warning summary.
 *
 * One instance belongs to one orchestration run; call `reset()` (or create a
 * new set) before starting another.
 */
export class NameClashSet {
  private strictEvents: ClashEvent[] = [];
  private gracefulEvents: ClashEvent[] = [];
  private missing: MissingSourceEvent[] = [];

  record(event: ClashEvent): void {
    if (event.mode === 'strict') {
      this.strictEvents.push(event);
    } else {
      this.gracefulEvents.push(event);
    }
  }

  recordMissingSource(event: MissingSourceEvent): void {
    this.missing.push(event);
  }

  anyStrictClash(): boolean {
    return this.strictEvents.length > 0;
  }

  anyGracefulClash(): boolean {
    return this.gracefulEvents.length > 0;
  }

  anyMissingSource(): boolean {
    return this.missing.length > 0;
  }

  get strict(): readonly ClashEvent[] {
    return this.strictEvents;
  }

  get graceful(): readonly ClashEvent[] {
    return this.gracefulEvents;
  }

  get missingSources(): readonly MissingSourceEvent[] {
    return this.missing;
  }

  reset(): void {
    this.strictEvents = [];
    this.gracefulEvents = [];
    this.missing = [];
  }
}

/**
 * Format clashes for display
 */
export function formatClashes(clashes: NameClashSet): string {
  const lines: string[] = [];

  if (clashes.strict.length > 0 || clashes.missingSources.length > 0) {
    lines.push('Errors:');
    for (const event of clashes.strict) {
      lines.push(`  - ${describeClash(event)}`);
    }
    for (const { pkg, source } of clashes.missingSources) {
      lines.push(`  - Package "${pkg}" is missing in ${source}`);
    }
  }

  if (clashes.graceful.length > 0) {
    lines.push('Warnings:');
    for (const event of clashes.graceful) {
      lines.push(`  - ${describeClash(event)} (skipped)`);
    }
  }

  return lines.join('\n');
}

function describeClash(event: ClashEvent): string {
  return `${event.keys.length} name clash(es) between ${event.sourceScope} (${event.source}) and ${event.destinationScope}: ${event.keys.join(', ')}`;
}
