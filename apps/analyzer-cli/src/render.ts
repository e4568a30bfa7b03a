import type { TimeframeLabel } from "@trendlens/core";
import {
	formatPrice,
	formatSignedPercent,
	renderNarrative,
} from "@trendlens/interpretation";
import type { AnalysisBundle, AnalysisOutcome } from "@trendlens/runtime";

export const DATA_UNAVAILABLE_TEXT =
	"Data not available. Please check the ticker symbol.";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_UNAVAILABLE = 2;

/**
 * Headline metrics and narrative for one bundle, as plain text.
 */
export const renderBundleText = (bundle: AnalysisBundle): string => {
	const { metrics } = bundle;
	const currency = bundle.currency ? ` ${bundle.currency}` : "";
	return [
		`${bundle.symbol} · ${bundle.label}`,
		`Current Price: ${formatPrice(metrics.latestPrice)}${currency} (${formatSignedPercent(
			metrics.sessionChangePercent
		)})`,
		`Period High: ${formatPrice(metrics.periodHigh)}`,
		`Period Low: ${formatPrice(metrics.periodLow)}`,
		"",
		renderNarrative(bundle.interpretation),
	].join("\n");
};

export const renderOutcomeText = (
	label: TimeframeLabel,
	outcome: AnalysisOutcome
): string => {
	switch (outcome.status) {
		case "ok":
			return renderBundleText(outcome.bundle);
		case "unavailable":
			return `${label}: ${DATA_UNAVAILABLE_TEXT}`;
		case "failed":
			return `${label}: ${outcome.message}`;
	}
};

/**
 * Exit status for a run: any failed outcome is 1; otherwise 2 when no label
 * produced a bundle.
 */
export const exitCodeFor = (outcomes: readonly AnalysisOutcome[]): number => {
	if (outcomes.some((outcome) => outcome.status === "failed")) {
		return EXIT_FAILED;
	}
	if (!outcomes.some((outcome) => outcome.status === "ok")) {
		return EXIT_UNAVAILABLE;
	}
	return EXIT_OK;
};
