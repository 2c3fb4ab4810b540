/**
 * A structured command ready for execution.
 * Components never build raw command strings; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}

/** Duration category for command timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "slow";

/** Timeout in ms per duration category. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 30_000,
  slow: 60_000,
};
