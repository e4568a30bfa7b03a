#!/usr/bin/env node
import process from "node:process";
import {
	hashJson,
	loadAnalyzerConfig,
	loadSymbolPresets,
	stableStringify,
} from "@trendlens/core";
import { parseCliArgs, readString } from "../apps/analyzer-cli/src/cliArgs";

const USAGE = `Usage:
  npm run config:print -- [options]

Options:
  --envPath <path>        Custom .env path
  --configDir <path>      Custom config directory
  --help                  Show this message`;

const printCanonicalSection = (label: string, payload: unknown): void => {
	console.log(`\n# ${label} (${hashJson(payload)})`);
	console.log(stableStringify(payload));
};

const main = (): void => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (argMap.help) {
		console.log(USAGE);
		return;
	}
	const configDir = readString(argMap, "configDir");
	const config = loadAnalyzerConfig({
		envPath: readString(argMap, "envPath"),
		configDir,
	});
	printCanonicalSection("analyzer", config);
	printCanonicalSection("presets", loadSymbolPresets(configDir));
};

try {
	main();
} catch (error) {
	console.error(
		"Failed to print config:",
		error instanceof Error ? error.message : error
	);
	process.exitCode = 1;
}
