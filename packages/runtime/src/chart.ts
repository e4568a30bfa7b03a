import { DEFAULT_CHART_SETTINGS } from "@trendlens/core";
import type { ChartSettings } from "@trendlens/core";
import type { AnalysisBundle } from "./analysisTypes";

export interface CandlestickPoint {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
}

export interface LinePoint {
	timestamp: number;
	value: number;
}

export type PricePlot =
	| { type: "candlestick"; name: "OHLC"; points: CandlestickPoint[] }
	| { type: "line"; name: "Close Price"; points: LinePoint[] };

export interface OverlayLine {
	name: string;
	points: LinePoint[];
}

export type VolumeDirection = "up" | "down";

export interface VolumeBar {
	timestamp: number;
	volume: number;
	direction: VolumeDirection;
}

export interface ChartModel {
	title: string;
	price: PricePlot;
	overlays: OverlayLine[];
	/** Present only when the volume pane is enabled. */
	volume?: VolumeBar[];
}

const buildPricePlot = (
	bundle: AnalysisBundle,
	chartType: ChartSettings["chartType"]
): PricePlot => {
	if (chartType === "line") {
		return {
			type: "line",
			name: "Close Price",
			points: bundle.bars.map((bar) => ({
				timestamp: bar.timestamp,
				value: bar.close,
			})),
		};
	}
	return {
		type: "candlestick",
		name: "OHLC",
		points: bundle.bars.map(({ timestamp, open, high, low, close }) => ({
			timestamp,
			open,
			high,
			low,
			close,
		})),
	};
};

const movingAverageOverlay = (bundle: AnalysisBundle): OverlayLine[] => {
	const points: LinePoint[] = [];
	for (const point of bundle.indicators.sma20) {
		if (point.value !== null) {
			points.push({ timestamp: point.timestamp, value: point.value });
		}
	}
	return points.length ? [{ name: "SMA", points }] : [];
};

/**
 * Render-ready series for a bundle. Options left out fall back to the
 * configured chart defaults.
 */
export const buildChartModel = (
	bundle: AnalysisBundle,
	options: Partial<ChartSettings> = {}
): ChartModel => {
	const settings = { ...DEFAULT_CHART_SETTINGS, ...options };
	const model: ChartModel = {
		title: `${bundle.symbol} Price Trend (${bundle.label})`,
		price: buildPricePlot(bundle, settings.chartType),
		overlays: settings.showMovingAverage ? movingAverageOverlay(bundle) : [],
	};
	if (settings.showVolume) {
		model.volume = bundle.bars.map((bar): VolumeBar => ({
			timestamp: bar.timestamp,
			volume: bar.volume,
			direction: bar.close >= bar.open ? "up" : "down",
		}));
	}
	return model;
};
