export interface VolumeBar {
	close: number;
	volume: number;
}

/** On-balance volume, starting at 0 on the first bar. */
export function obvSeries(bars: VolumeBar[]): number[] {
	const series: number[] = [];
	let running = 0;
	bars.forEach((bar, index) => {
		if (index > 0) {
			const previous = bars[index - 1].close;
			if (bar.close > previous) {
				running += bar.volume;
			} else if (bar.close < previous) {
				running -= bar.volume;
			}
		}
		series.push(running);
	});
	return series;
}
