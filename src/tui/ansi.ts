export const RESET = "\x1b[0m";
export const GREEN = "\x1b[32m";
export const RED = "\x1b[31m";
export const BOLD = "\x1b[1m";

export function colorize(text: string, color: string): string {
	return `${color}${text}${RESET}`;
}

export function bold(text: string): string {
	return `${BOLD}${text}${RESET}`;
}

/** Red for losses, green otherwise. */
export function pnlColor(value: number): string {
	return value < 0 ? RED : GREEN;
}
