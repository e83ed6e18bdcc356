/**
 * Failures that escape a single symbol. Per-symbol fetch failures are not
 * exceptions; they travel as failed outcomes.
 */

export interface SymbolFailure {
  symbol: string;
  error: string;
}

export class GroupBuildError extends Error {
  constructor(
    readonly seed: string,
    readonly failures: SymbolFailure[]
  ) {
    super(`[${seed}] no valid rows`);
    this.name = "GroupBuildError";
  }
}

export interface SeedFailure {
  seed: string;
  error: string;
}

export class ReportBuildError extends Error {
  constructor(readonly failedSeeds: SeedFailure[]) {
    super(
      `no groups could be built (failed seeds: ${
        failedSeeds.map(f => f.seed).join(", ") || "none"
      })`
    );
    this.name = "ReportBuildError";
  }
}
