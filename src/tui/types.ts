/** Inclusive spot-price range a chart is drawn over. */
export interface SpotWindow {
	readonly min: number;
	readonly max: number;
}

export interface ChartOptions {
	/** Plot columns, excluding the axis labels. Defaults to 60. */
	readonly width?: number | undefined;
	/** Plot rows. Defaults to 15. */
	readonly height?: number | undefined;
	/** Only samples whose spot lies in this range are plotted. Defaults to the whole grid. */
	readonly window?: SpotWindow | undefined;
	/** Shown in the axis titles. Defaults to the configured currency symbol. */
	readonly currencySymbol?: string | undefined;
}

export interface ReportOptions {
	/** Prefix for money values. Defaults to the configured currency symbol. */
	readonly currencySymbol?: string | undefined;
	/** Wrap the title and money values in ANSI colour codes. */
	readonly color?: boolean | undefined;
	readonly chart?: ChartOptions | undefined;
}
