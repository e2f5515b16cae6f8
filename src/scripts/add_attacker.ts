#!/usr/bin/env node
// src/scripts/add_attacker.ts
// =============================================================================
// ADD ATTACKER
// =============================================================================
//
// Reads <dir>/peacetime_network.json and <dir>/target.txt, injects an attacker
// node connected to the best-connected nodes outside the target's
// neighbourhood plus one channel to the target itself, and writes
//   <dir>/attacktime_network.json the augmented network
//   <dir>/attacker.csv            the attacker's alias
//
// Usage:
//   npm run add-attacker -- ./networks/small
//
// Env (see .env.example): ATTACKER_PUBKEY, ATTACK_CHANNEL_CAPACITY_MSAT,
// ATTACK_CHANNEL_FRACTION, ATTACK_BASE_SCID, TARGET_CHANNEL_SCID, LOG_LEVEL

import dotenv from "dotenv";

import { injectAttacker } from "../network/inject.js";
import { readNetworkInputs, writeInjection } from "../network/networkFiles.js";
import { isMainModule } from "../utils/isMainModule.js";
import { logFailure, logger } from "../utils/logger.js";
import { getNetworkPaths, loadAttackConfig } from "../utils/runConfig.js";

export function main(args: string[], env: NodeJS.ProcessEnv = process.env): number {
    if (args.length !== 1 || args[0] === undefined) {
        logger.error("Usage: add_attacker <network_directory>");
        return 1;
    }

    const config = loadAttackConfig(env);
    if (!config.success) {
        logFailure(config.error);
        return 1;
    }

    const paths = getNetworkPaths(args[0]);
    const inputs = readNetworkInputs(paths);
    if (!inputs.success) {
        logFailure(inputs.error);
        return 1;
    }

    const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, config.value);
    if (!result.success) {
        logFailure(result.error);
        return 1;
    }

    const r = result.value;
    logger.info(
        `target=${r.targetAlias} (${r.targetPubkey.slice(0, 8)}...) | ` +
        `channels=${inputs.value.network.channels.length} | new=${r.newChannels.length}`
    );

    const written = writeInjection(paths, r);
    if (!written.success) {
        logFailure(written.error);
        return 1;
    }

    console.log(`Added attacker ${r.attackerAlias} to network. Wrote output to ${paths.attacktime}`);
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
