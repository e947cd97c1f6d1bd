export type { BreakevenSet, PayoffSummary } from "./types.js";
export { DEFAULT_BREAKEVEN_TOLERANCE, findBreakevens, sortBreakevens } from "./breakeven.js";
export { summarize } from "./summary.js";
