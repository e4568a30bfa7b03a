import type { Bar, Resolution, Series } from "@trendlens/core";

export type RejectionReason =
	| "invalid_row"
	| "invalid_timestamp"
	| "invalid_price"
	| "invalid_volume"
	| "inconsistent_range"
	| "duplicate_timestamp";

export interface RejectedBar {
	/** Position of the row in the raw input. */
	index: number;
	reason: RejectionReason;
}

export type NormalizationResult =
	| { status: "ok"; series: Series; rejected: RejectedBar[] }
	| {
			status: "empty";
			reason: "no_bars" | "all_rejected";
			rejected: RejectedBar[];
	  };

// Epoch values below this are read as seconds (1e11 ms is March 1973).
const EPOCH_SECONDS_LIMIT = 1e11;

const TIME_KEYS = ["timestamp", "time", "date", "datetime", "t"];
const OPEN_KEYS = ["open", "o"];
const HIGH_KEYS = ["high", "h"];
const LOW_KEYS = ["low", "l"];
const CLOSE_KEYS = ["close", "c"];
const VOLUME_KEYS = ["volume", "v"];

interface RawFields {
	time: unknown;
	open: unknown;
	high: unknown;
	low: unknown;
	close: unknown;
	volume: unknown;
}

const isRow = (value: unknown): value is readonly unknown[] =>
	Array.isArray(value);

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const pick = (fields: Map<string, unknown>, keys: string[]): unknown => {
	for (const key of keys) {
		if (fields.has(key)) {
			return fields.get(key);
		}
	}
	return undefined;
};

const extractFields = (raw: unknown): RawFields | null => {
	if (isRow(raw)) {
		const [time, open, high, low, close, volume] = raw;
		return { time, open, high, low, close, volume };
	}
	if (!isRecord(raw)) {
		return null;
	}
	const fields = new Map<string, unknown>();
	for (const [key, value] of Object.entries(raw)) {
		fields.set(key.toLowerCase(), value);
	}
	return {
		time: pick(fields, TIME_KEYS),
		open: pick(fields, OPEN_KEYS),
		high: pick(fields, HIGH_KEYS),
		low: pick(fields, LOW_KEYS),
		close: pick(fields, CLOSE_KEYS),
		volume: pick(fields, VOLUME_KEYS),
	};
};

const toNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim().length) {
		const parsed = Number(value.trim());
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

const parseTimestamp = (value: unknown): number | null => {
	if (value instanceof Date) {
		const ts = value.getTime();
		return Number.isFinite(ts) ? ts : null;
	}
	const numeric = toNumber(value);
	if (numeric !== null) {
		if (numeric < 0) {
			return null;
		}
		return numeric < EPOCH_SECONDS_LIMIT ? numeric * 1_000 : numeric;
	}
	if (typeof value === "string") {
		const parsed = Date.parse(value);
		return Number.isNaN(parsed) ? null : parsed;
	}
	return null;
};

const parsePrice = (value: unknown): number | null => {
	const price = toNumber(value);
	return price !== null && price > 0 ? price : null;
};

const parseVolume = (value: unknown): number | null => {
	if (value === undefined || value === null) {
		return 0;
	}
	const volume = toNumber(value);
	return volume !== null && volume >= 0 ? volume : null;
};

type ParsedRow = { ok: true; bar: Bar } | { ok: false; reason: RejectionReason };

const parseRow = (raw: unknown): ParsedRow => {
	const fields = extractFields(raw);
	if (!fields) {
		return { ok: false, reason: "invalid_row" };
	}
	const timestamp = parseTimestamp(fields.time);
	if (timestamp === null) {
		return { ok: false, reason: "invalid_timestamp" };
	}
	const open = parsePrice(fields.open);
	const high = parsePrice(fields.high);
	const low = parsePrice(fields.low);
	const close = parsePrice(fields.close);
	if (open === null || high === null || low === null || close === null) {
		return { ok: false, reason: "invalid_price" };
	}
	const volume = parseVolume(fields.volume);
	if (volume === null) {
		return { ok: false, reason: "invalid_volume" };
	}
	if (
		low > high ||
		open < low ||
		open > high ||
		close < low ||
		close > high
	) {
		return { ok: false, reason: "inconsistent_range" };
	}
	return { ok: true, bar: { timestamp, open, high, low, close, volume } };
};

/**
 * Convert raw provider rows into a canonical series: valid bars only,
 * ascending by timestamp, one bar per timestamp (first seen wins).
 * Gaps between bars are kept as they are.
 */
export const normalizeBars = (
	raw: readonly unknown[],
	resolution: Resolution
): NormalizationResult => {
	if (!raw.length) {
		return { status: "empty", reason: "no_bars", rejected: [] };
	}

	const rejected: RejectedBar[] = [];
	const accepted: { index: number; bar: Bar }[] = [];

	raw.forEach((row, index) => {
		const parsed = parseRow(row);
		if (parsed.ok) {
			accepted.push({ index, bar: parsed.bar });
		} else {
			rejected.push({ index, reason: parsed.reason });
		}
	});

	// sort is stable, so equal timestamps keep input order
	accepted.sort((a, b) => a.bar.timestamp - b.bar.timestamp);

	const bars: Bar[] = [];
	let lastTimestamp: number | null = null;
	for (const entry of accepted) {
		if (entry.bar.timestamp === lastTimestamp) {
			rejected.push({ index: entry.index, reason: "duplicate_timestamp" });
			continue;
		}
		lastTimestamp = entry.bar.timestamp;
		bars.push(Object.freeze(entry.bar));
	}

	rejected.sort((a, b) => a.index - b.index);

	if (!bars.length) {
		return { status: "empty", reason: "all_rejected", rejected };
	}

	const series: Series = Object.freeze({
		resolution,
		bars: Object.freeze(bars),
	});
	return { status: "ok", series, rejected };
};
