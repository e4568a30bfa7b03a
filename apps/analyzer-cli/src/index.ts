#!/usr/bin/env node

import process from "node:process";
import { CcxtMarketDataClient } from "@trendlens/exchange-ccxt";
import { runCli } from "./run";

const main = async (): Promise<void> => {
	process.exitCode = await runCli(process.argv.slice(2), {
		stdout: (text) => console.log(text),
		stderr: (text) => console.error(text),
		createClient: (exchangeId) => new CcxtMarketDataClient({ exchangeId }),
	});
};

main().catch((error) => {
	console.error("Analysis failed:", error instanceof Error ? error.message : error);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
