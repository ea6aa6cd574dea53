/**
 * Turn Tracker
 *
 * Records the states a chat turn enters, how long each stage took and which
 * stages degraded, then hands the result back as a TurnTrace.
 *
 * @example
 * ```typescript
 * const tracker = new TurnTracker('chat-123');
 * tracker.enter(TurnState.RETRIEVING);
 * tracker.startStage(TurnStage.RETRIEVAL);
 * const passages = await retriever.search(question);
 * tracker.endStage(TurnStage.RETRIEVAL);
 * ```
 */

import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { StateEntry, TurnStage, TurnState, TurnTrace } from './types.js';

export interface TurnTrackerOptions {
  logger?: Logger;
  /** Millisecond clock; defaults to performance.now */
  clock?: () => number;
}

export class TurnTracker {
  private readonly requestId: string;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly startMs: number;
  private readonly states: StateEntry[] = [];
  private readonly stageStarts = new Map<TurnStage, number>();
  private readonly durations: Partial<Record<TurnStage, number>> = {};
  private readonly degraded: Partial<Record<TurnStage, string>> = {};
  private grounded = false;
  private passageCount = 0;

  constructor(requestId: string, options: TurnTrackerOptions = {}) {
    this.requestId = requestId;
    this.logger = options.logger ?? getGlobalLogger().child('TurnTracker');
    this.clock = options.clock ?? (() => performance.now());
    this.startMs = this.clock();
  }

  enter(state: TurnState): void {
    const atMs = this.elapsed();
    this.states.push({ state, atMs });
    this.logger.trace('Turn state entered', { requestId: this.requestId, state, atMs });
  }

  startStage(stage: TurnStage): void {
    this.stageStarts.set(stage, this.clock());
  }

  /**
   * Close a stage and return its duration; 0 when it was never started.
   */
  endStage(stage: TurnStage): number {
    const started = this.stageStarts.get(stage);
    if (started === undefined) {
      return 0;
    }
    const durationMs = this.clock() - started;
    this.stageStarts.delete(stage);
    this.durations[stage] = durationMs;
    this.logger.debug(`Stage "${stage}" completed`, {
      requestId: this.requestId,
      stage,
      durationMs: Math.round(durationMs),
    });
    return durationMs;
  }

  markDegraded(stage: TurnStage, reason: string): void {
    this.degraded[stage] = reason;
  }

  setRetrievalOutcome(grounded: boolean, passageCount: number): void {
    this.grounded = grounded;
    this.passageCount = passageCount;
  }

  getStates(): TurnState[] {
    return this.states.map((entry) => entry.state);
  }

  getTrace(): TurnTrace {
    return {
      requestId: this.requestId,
      states: this.states.map((entry) => ({ ...entry })),
      durations: { ...this.durations },
      totalMs: this.elapsed(),
      degraded: { ...this.degraded },
      grounded: this.grounded,
      passageCount: this.passageCount,
    };
  }

  private elapsed(): number {
    return this.clock() - this.startMs;
  }
}
