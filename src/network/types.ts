// src/network/types.ts
// =============================================================================
// SIMULATED NETWORK SCHEMA
// =============================================================================
//
// A network file is a JSON object whose `sim_network` array holds channel
// records. Each channel names its two endpoints with their routing policy.
// Only the fields read below are validated; everything else is carried
// through to the output untouched.

import { z } from "zod";

export const NodeRecordSchema = z
    .object({
        pubkey: z.string().min(1),
        alias: z.unknown().optional(),
    })
    .passthrough();

export const ChannelRecordSchema = z
    .object({
        scid: z.union([z.number().int(), z.bigint(), z.string()]).optional(),
        capacity_msat: z.union([
            z.number().int().nonnegative(),
            z.bigint().nonnegative(),
            z.string().regex(/^\d+$/, "expected decimal digits"),
        ]),
        node_1: NodeRecordSchema,
        node_2: NodeRecordSchema,
    })
    .passthrough();

export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type ChannelRecord = z.infer<typeof ChannelRecordSchema>;

/** A loaded network: the untouched JSON plus a typed view of its channels. */
export interface NetworkGraph {
    raw: Record<string, unknown>;
    rawChannels: unknown[];
    channels: ChannelRecord[];
}

export interface UniqueNode {
    pubkey: string;
    /** Normalized numeric alias, null when the node has none */
    alias: string | null;
}

// =============================================================================
// SYNTHESIZED RECORDS
// =============================================================================

export interface SimNodePolicy {
    pubkey: string;
    alias: string | null;
    max_htlc_count: number;
    max_in_flight_msat: number;
    min_htlc_size_msat: number;
    max_htlc_size_msat: number;
    cltv_expiry_delta: number;
    base_fee: number;
    fee_rate_prop: number;
}

export interface SimChannel {
    scid: bigint;
    capacity_msat: number;
    node_1: SimNodePolicy;
    node_2: SimNodePolicy;
}

export interface InjectionResult {
    attackerPubkey: string;
    attackerAlias: string;
    targetPubkey: string;
    targetAlias: string;
    /** Number of attacker channels to candidate peers (excludes the target channel) */
    channelCount: number;
    newChannels: SimChannel[];
    /** Input graph with the new channels prepended to sim_network */
    graph: Record<string, unknown>;
}
