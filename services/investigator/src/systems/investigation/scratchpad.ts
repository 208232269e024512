/**
 * Investigation Scratchpad
 * Append-only, ordered log of every action; the only reasoning state
 */

import type {
  EntryKind,
  NewEntry,
  Payload,
  ScratchpadEntry,
  ScratchpadSummary,
} from "./types.js";

export interface ScratchpadOptions {
  clock?: () => Date;
  onAppend?: (entry: ScratchpadEntry) => void;
}

const KINDS: readonly EntryKind[] = ["schema_lookup", "query", "metric_computation", "synthesis", "error"];

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Copy plain data with object keys sorted at every level
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === "object" && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        sorted[key] = canonicalize(child);
      }
    }
    return sorted;
  }
  return value;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? "null";
}

export class Scratchpad {
  private readonly entries: ScratchpadEntry[] = [];
  private readonly clock: () => Date;
  private readonly onAppend?: (entry: ScratchpadEntry) => void;

  constructor(options: ScratchpadOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.onAppend = options.onAppend;
  }

  /**
   * Record an action. Payloads are copied and frozen; returns the sequence number.
   */
  append(entry: NewEntry): number {
    const seq = this.entries.length + 1;
    const recorded: ScratchpadEntry = deepFreeze({
      seq,
      kind: entry.kind,
      inputs: structuredClone<Payload>(entry.inputs),
      outputs: structuredClone<Payload>(entry.outputs),
      timestamp: this.clock().toISOString(),
    });

    this.entries.push(recorded);
    this.onAppend?.(recorded);
    return seq;
  }

  all(): readonly ScratchpadEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  ofKind(kind: EntryKind): readonly ScratchpadEntry[] {
    return this.entries.filter((e) => e.kind === kind);
  }

  /**
   * Deterministic text for the synthesis prompt
   */
  renderForPrompt(): string {
    return this.entries
      .map((e) =>
        [
          `#${e.seq} [${e.kind}] ${e.timestamp}`,
          `inputs: ${stableStringify(e.inputs)}`,
          `outputs: ${stableStringify(e.outputs)}`,
        ].join("\n")
      )
      .join("\n\n");
  }

  summary(): ScratchpadSummary {
    return summarizeEntries(this.entries);
  }

  toJSON(): readonly ScratchpadEntry[] {
    return this.all();
  }
}

export function summarizeEntries(entries: readonly ScratchpadEntry[]): ScratchpadSummary {
  const byKind: Record<EntryKind, number> = {
    schema_lookup: 0,
    query: 0,
    metric_computation: 0,
    synthesis: 0,
    error: 0,
  };
  for (const entry of entries) {
    byKind[entry.kind]++;
  }

  const first = entries[0];
  const last = entries[entries.length - 1];

  return {
    entries: entries.length,
    byKind,
    firstAt: first?.timestamp ?? null,
    lastAt: last?.timestamp ?? null,
    durationMs: first && last ? Date.parse(last.timestamp) - Date.parse(first.timestamp) : 0,
  };
}

export function formatSummary(summary: ScratchpadSummary): string {
  const counts = KINDS.filter((k) => summary.byKind[k] > 0).map((k) => `${k}=${summary.byKind[k]}`);
  return `${summary.entries} actions (${counts.join(", ") || "none"}) in ${(summary.durationMs / 1000).toFixed(1)}s`;
}
