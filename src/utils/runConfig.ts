// src/utils/runConfig.ts
// RUN CONFIGURATION - Single source of truth for network directory layout
// and the attacker injection parameters.
//
// Scripts call dotenv.config() before loadAttackConfig(); library code only
// ever sees the env object it is handed.

import path from "node:path";
import { z } from "zod";

import { ToolErrorKind, fail, ok, type ToolResult } from "./errors.js";

// Standard filenames inside a network directory
export const NETWORK_FILES = {
    PEACETIME: "peacetime_network.json",
    ATTACKTIME: "attacktime_network.json",
    TARGET: "target.txt",
    ATTACKER: "attacker.csv",
} as const;

export interface NetworkPaths {
    peacetime: string;
    attacktime: string;
    target: string;
    attacker: string;
}

export function getNetworkPaths(networkDir: string): NetworkPaths {
    return {
        peacetime: path.join(networkDir, NETWORK_FILES.PEACETIME),
        attacktime: path.join(networkDir, NETWORK_FILES.ATTACKTIME),
        target: path.join(networkDir, NETWORK_FILES.TARGET),
        attacker: path.join(networkDir, NETWORK_FILES.ATTACKER),
    };
}

export const DEFAULT_ATTACKER_PUBKEY =
    "035a43121d24b2ff465e85af9c07963701f259b5ce4ee636e3aeb503cc64142c11";

export interface AttackConfig {
    attackerPubkey: string;
    channelCapacityMsat: number;
    channelFraction: number;
    baseScid: bigint;
    targetScid: bigint;
}

// scids are u64, keep them out of double precision
const scidFromEnv = (fallback: bigint) =>
    z
        .string()
        .trim()
        .regex(/^\d+$/, "expected a non-negative integer")
        .default(fallback.toString())
        .transform(s => BigInt(s));

const AttackEnvSchema = z.object({
    ATTACKER_PUBKEY: z
        .string()
        .regex(/^[0-9a-f]{66}$/i, "expected a 33-byte hex public key")
        .default(DEFAULT_ATTACKER_PUBKEY),
    // max_htlc_size_msat is capacity - 5000, so anything smaller is useless
    ATTACK_CHANNEL_CAPACITY_MSAT: z.coerce.number().int().min(5_001).default(10_000_000),
    ATTACK_CHANNEL_FRACTION: z.coerce.number().gt(0).max(1).default(0.1),
    ATTACK_BASE_SCID: scidFromEnv(10_000_000n),
    TARGET_CHANNEL_SCID: scidFromEnv(9_999_999n),
});

export function loadAttackConfig(env: NodeJS.ProcessEnv = process.env): ToolResult<AttackConfig> {
    // Treat empty strings like unset variables
    const defined = Object.fromEntries(
        Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
    );

    const parsed = AttackEnvSchema.safeParse(defined);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(i => `${i.path.join(".")}: ${i.message}`)
            .join("; ");
        return fail(ToolErrorKind.MalformedInput, `Invalid configuration: ${issues}`);
    }

    const cfg = parsed.data;
    return ok({
        attackerPubkey: cfg.ATTACKER_PUBKEY.toLowerCase(),
        channelCapacityMsat: cfg.ATTACK_CHANNEL_CAPACITY_MSAT,
        channelFraction: cfg.ATTACK_CHANNEL_FRACTION,
        baseScid: cfg.ATTACK_BASE_SCID,
        targetScid: cfg.TARGET_CHANNEL_SCID,
    });
}
