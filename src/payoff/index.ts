export { callIntrinsic, putIntrinsic, legPayoff } from "./leg-payoff.js";
export { computeBullCallSpreadPayoff } from "./bull-call-spread.js";
export { computeIronCondorPayoff } from "./iron-condor.js";
export { computePayoff, payoffAt } from "./engine.js";
