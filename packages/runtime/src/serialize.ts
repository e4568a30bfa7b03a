import { stableStringify } from "@trendlens/core";
import type { AnalysisBundle } from "./analysisTypes";

/**
 * Bundle as JSON text with sorted keys. Equal bundles give equal text, byte
 * for byte.
 */
export const serializeBundle = (bundle: AnalysisBundle): string =>
	stableStringify(bundle);
