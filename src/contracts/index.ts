// /src/contracts/index.ts
/**
 * Contracts - single source of truth for every record crossing the engine boundary.
 * Presentation and export code import from here, not from lib/psh internals.
 */

// Rate table (bedroom sizes, rate records, snapshots)
export * from "./rates";

// Calculation input (household / financial / family) and case metadata
export * from "./household";

// Engine output
export * from "./result";

// Error codes
export * from "./errors";
