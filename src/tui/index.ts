export type { ChartOptions, ReportOptions, SpotWindow } from "./types.js";
export { ReportRenderer } from "./renderer.js";
export { renderPayoffChart } from "./chart.js";
export { formatMoney, renderSummary } from "./format.js";
export { colorize, bold, pnlColor, RESET, GREEN, RED } from "./ansi.js";
