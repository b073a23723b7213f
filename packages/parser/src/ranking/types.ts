/**
 * One scored member: where it starts and what it scored.
 */
export interface ScoredResult {
  /** Base name of the source file */
  readonly file: string;
  /** 1-based line of the member's first token */
  readonly line: number;
  /** Metric score */
  readonly value: number;
}
