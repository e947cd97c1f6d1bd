export { type SpotGrid, linspace, createSpotGrid, gridStep } from "./spot-grid.js";
