export type { Simulation, SimulatorOptions } from "./types.js";
export { Simulator, simulate } from "./simulator.js";
