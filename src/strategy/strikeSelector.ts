import type { InstrumentLookup, OptionContract, OptionType } from "../types.js";

export function roundToNearest(value: number, step: number): number {
  return Math.round(value / step) * step;
}

export type LegSelection =
  | { ok: true; contract: OptionContract; requestedStrike: number }
  | { ok: false; requestedStrike: number; reason: string };

export type StrikeSelection = {
  spot: number;
  expiry: string | null;
  call: LegSelection;
  put: LegSelection;
};

export function selectionComplete(
  selection: StrikeSelection
): selection is StrikeSelection & {
  call: Extract<LegSelection, { ok: true }>;
  put: Extract<LegSelection, { ok: true }>;
} {
  return selection.call.ok && selection.put.ok;
}

/**
 * Maps the index spot to one call and one put contract at a fixed offset.
 */
export class StrikeSelector {
  constructor(
    private readonly lookup: InstrumentLookup,
    private readonly offset: number,
    private readonly step: number
  ) {}

  select(spot: number, today: string): StrikeSelection {
    const callStrike = roundToNearest(spot - this.offset, this.step);
    const putStrike = roundToNearest(spot + this.offset, this.step);
    const expiry = this.lookup.nearestExpiry(today);

    console.log(
      `[StrikeSelector] spot=${spot.toFixed(2)} call=${callStrike} CE put=${putStrike} PE expiry=${expiry ?? "none"}`
    );

    if (!expiry) {
      const reason = `no option expiry on or after ${today}`;
      console.warn(`[StrikeSelector] Selection failed: ${reason}`);
      return {
        spot,
        expiry,
        call: { ok: false, requestedStrike: callStrike, reason },
        put: { ok: false, requestedStrike: putStrike, reason },
      };
    }

    return {
      spot,
      expiry,
      call: this.resolveLeg(callStrike, "CE", expiry),
      put: this.resolveLeg(putStrike, "PE", expiry),
    };
  }

  private resolveLeg(strike: number, optionType: OptionType, expiry: string): LegSelection {
    const candidates = [strike, strike + this.step, strike - this.step];
    for (const candidate of candidates) {
      const contract = this.lookup.find(candidate, optionType, expiry);
      if (!contract) {
        console.warn(`[StrikeSelector] ${candidate} ${optionType} ${expiry} not listed`);
        continue;
      }
      if (candidate !== strike) {
        console.log(`[StrikeSelector] Using alternate ${optionType} strike ${candidate} (wanted ${strike})`);
      }
      if (!this.lookup.isLiquid(contract)) {
        console.warn(`[StrikeSelector] ${contract.symbol} may be illiquid`);
      }
      return { ok: true, contract, requestedStrike: strike };
    }
    return {
      ok: false,
      requestedStrike: strike,
      reason: `no ${optionType} contract at ${candidates.join("/")} for ${expiry}`,
    };
  }
}
