#!/usr/bin/env node
// src/scripts/analyze_forwards.ts
//
// Per-channel summary of a simulated forwarding history: total amount sent,
// forward count and average forward size for every outgoing channel.
//
// Usage:
//   npm run analyze-forwards -- ./results/forwards.csv
//
// Read errors are reported, not signalled through the exit code.

import dotenv from "dotenv";

import { aggregateForwards } from "../forwards/aggregate.js";
import { readForwardsFile } from "../forwards/parseForwards.js";
import { formatForwardReport } from "../forwards/report.js";
import { isMainModule } from "../utils/isMainModule.js";
import { logFailure, logger } from "../utils/logger.js";

export function main(args: string[]): number {
    if (args.length !== 1 || args[0] === undefined) {
        logger.error("Usage: analyze_forwards <csv_file>");
        return 1;
    }

    const records = readForwardsFile(args[0]);
    if (!records.success) {
        logFailure(records.error);
        return 0;
    }

    logger.debug(`parsed ${records.value.length} forwards`);
    for (const line of formatForwardReport(aggregateForwards(records.value))) {
        console.log(line);
    }
    return 0;
}

if (isMainModule(import.meta.url)) {
    dotenv.config();
    try {
        process.exitCode = main(process.argv.slice(2));
    } catch (err) {
        logger.error("Fatal:", err);
        process.exitCode = 1;
    }
}
