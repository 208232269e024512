/**
 * Investigation phase state machine
 */

import { SalesIQError } from "@salesiq/core";
import type { Phase } from "./types.js";

const TRANSITIONS: Record<Phase, readonly Phase[]> = {
  created: ["schema_fetched", "failed"],
  schema_fetched: ["querying", "failed"],
  querying: ["analyzing", "failed"],
  // analyzing → querying is the single broadening pass
  analyzing: ["querying", "synthesizing", "failed"],
  // synthesis errors degrade; only cancellation or an internal fault fails here
  synthesizing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: Phase, to: Phase): boolean {
  return TRANSITIONS[from].includes(to);
}

export class PhaseMachine {
  private phase: Phase = "created";
  private readonly history: Phase[] = ["created"];

  constructor(private readonly onChange?: (next: Phase, previous: Phase) => void) {}

  get current(): Phase {
    return this.phase;
  }

  get path(): readonly Phase[] {
    return [...this.history];
  }

  get terminal(): boolean {
    return TRANSITIONS[this.phase].length === 0;
  }

  transition(next: Phase): void {
    if (!canTransition(this.phase, next)) {
      throw new SalesIQError(`Illegal phase transition ${this.phase} → ${next}`, "ILLEGAL_TRANSITION", {
        context: { from: this.phase, to: next },
      });
    }
    const previous = this.phase;
    this.phase = next;
    this.history.push(next);
    this.onChange?.(next, previous);
  }
}
