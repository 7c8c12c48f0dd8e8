/**
 * Ownership Tracing System
 *
 * Tracks the lifecycle of sequence storage: allocations, releases, borrows
 * and misuse (stale reads, double releases). Used for debugging leaks and
 * use-after-release bugs.
 *
 * Recording is enabled by the `trace` config value (SEQFLOW_TRACE=1) or
 * `tracer.enable()`. With `debug` on, each event is also written out.
 */

import { config } from "./config.js";

/**
 * Kinds of ownership events.
 */
export type OwnershipEventKind =
  | "allocate" // a combinator produced a fresh buffer
  | "release" // buffer.release()
  | "detach" // buffer.detach() moved the elements out
  | "borrow" // take/drop/slice/view aliased existing storage
  | "stale-access" // a read hit released storage
  | "double-release"; // release/detach on released storage

/**
 * A single ownership event record.
 */
export interface OwnershipEvent {
  kind: OwnershipEventKind;
  /** Storage the event refers to */
  storageId: number;
  /** Number of elements involved */
  length: number;
  /** Operation that triggered the event, e.g. "map" */
  operation: string;
  /** Timestamp for ordering */
  timestamp: number;
}

/**
 * Options for the tracer.
 */
export interface TracerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Collects ownership events.
 */
export class OwnershipTracer {
  private records: OwnershipEvent[] = [];
  private enabled: boolean | undefined;
  private readonly writer: (line: string) => void;

  constructor(options: TracerOptions = {}) {
    this.writer = options.writer ?? ((line: string) => console.error(line));
  }

  /**
   * Check if tracing is enabled. Falls back to the `trace` config value
   * until enable()/disable() is called.
   */
  isEnabled(): boolean {
    return this.enabled ?? config.get<boolean>("trace") === true;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /**
   * Record an ownership event.
   */
  record(kind: OwnershipEventKind, storageId: number, length: number, operation: string): void {
    if (!this.isEnabled()) return;

    const event: OwnershipEvent = {
      kind,
      storageId,
      length,
      operation,
      timestamp: Date.now(),
    };
    this.records.push(event);

    if (config.get<boolean>("debug") === true) {
      this.writer(formatEvent(event));
    }
  }

  /**
   * Get all records.
   */
  getAllRecords(): OwnershipEvent[] {
    return [...this.records];
  }

  /**
   * Get the records for one storage, oldest first.
   */
  getRecordsFor(storageId: number): OwnershipEvent[] {
    return this.records.filter((r) => r.storageId === storageId);
  }

  /**
   * Ids of storage that was allocated and never released or detached.
   */
  getLeaks(): number[] {
    const live = new Set<number>();
    for (const record of this.records) {
      if (record.kind === "allocate") live.add(record.storageId);
      else if (record.kind === "release" || record.kind === "detach") live.delete(record.storageId);
    }
    return [...live];
  }

  /**
   * Format trace output for CLI.
   */
  formatForCLI(): string {
    if (this.records.length === 0) {
      return "No ownership events recorded.";
    }
    return this.records.map(formatEvent).join("\n");
  }

  /**
   * Clear all records.
   */
  clear(): void {
    this.records = [];
  }

  /**
   * Drop records and go back to following the `trace` config value.
   */
  reset(): void {
    this.records = [];
    this.enabled = undefined;
  }
}

function formatEvent(event: OwnershipEvent): string {
  return `  [${event.kind}] #${event.storageId} ${event.operation} (${event.length})`;
}

/**
 * Global tracer instance.
 */
export const tracer = new OwnershipTracer();
