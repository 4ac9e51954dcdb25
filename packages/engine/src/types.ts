import type { ExitReason, ISODate } from "@backtest-lab/sdk";

/**
 * Position state during one replay. At most one long position exists per instrument.
 */
export type Position =
  | { readonly state: "flat" }
  | {
      readonly state: "long";
      readonly entryDate: ISODate;
      readonly entryPrice: number;
      readonly entryIndex: number;
      /** Bars processed since the entry bar. */
      readonly barsHeld: number;
    };

export type OpenPosition = Extract<Position, { state: "long" }>;

/** Exit thresholds derived from the entry price. */
export interface ExitLevels {
  readonly stopPrice: number;
  readonly targetPrice: number;
}

export type ExitCheck = ExitReason | null;
