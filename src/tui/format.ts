import { sortBreakevens } from "../analysis/breakeven.js";
import type { PayoffSummary } from "../analysis/types.js";
import { LibDecimal } from "../lib/decimal/index.js";
import { colorize, pnlColor } from "./ansi.js";

/**
 * Two-decimal money string with a currency prefix, e.g. `₹7.00` or `₹-3.00`.
 * Non-finite values render as `---`.
 */
export function formatMoney(value: number, symbol: string): string {
	if (!Number.isFinite(value)) return "---";
	return `${symbol}${LibDecimal.fromExact(value).toFixed(2)}`;
}

function money(value: number, symbol: string, color: boolean): string {
	const text = formatMoney(value, symbol);
	return color ? colorize(text, pnlColor(value)) : text;
}

/** Max profit, max loss and breakeven lines; breakevens ascending or `None`. */
export function renderSummary(summary: PayoffSummary, symbol: string, color = false): string {
	const breakevens = sortBreakevens(summary.breakevens);
	const breakevenText =
		breakevens.length === 0 ? "None" : breakevens.map((b) => formatMoney(b, symbol)).join(", ");
	return [
		`Max Profit: ${money(summary.maxProfit, symbol, color)}`,
		`Max Loss: ${money(summary.maxLoss, symbol, color)}`,
		`Breakeven Point(s): ${breakevenText}`,
	].join("\n");
}
