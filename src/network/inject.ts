// src/network/inject.ts
// =============================================================================
// ATTACKER INJECTION
// =============================================================================
//
// Adds a synthetic attacker to a peacetime network:
//   - channel_count = floor(fraction * unique nodes) channels to the highest
//     capacity nodes that do not already share a channel with the target
//   - one channel straight to the target, sized to the sum of the others
// New channels are prepended to sim_network. Everything is computed up front
// so a failed run never leaves partial output behind.

import { ToolErrorKind, fail, ok, type ToolResult } from "../utils/errors.js";
import type { AttackConfig } from "../utils/runConfig.js";
import { nextAttackerAlias, normalizeAlias } from "./alias.js";
import { candidateNodes, extractUniqueNodes, findTargetPubkey } from "./graph.js";
import type { InjectionResult, NetworkGraph, SimChannel, SimNodePolicy } from "./types.js";

/** Policy for a synthesized endpoint. The attacker forwards for free with a short CLTV delta. */
export function makeNodePolicy(
    pubkey: string,
    alias: string | null,
    isAttacker: boolean,
    channelCapacityMsat: number
): SimNodePolicy {
    return {
        pubkey,
        alias,
        max_htlc_count: 100,
        max_in_flight_msat: channelCapacityMsat,
        min_htlc_size_msat: 1_000,
        max_htlc_size_msat: channelCapacityMsat - 5_000,
        cltv_expiry_delta: isAttacker ? 40 : 144,
        base_fee: isAttacker ? 0 : 1_000,
        fee_rate_prop: isAttacker ? 0 : 1_000,
    };
}

function scidConflict(network: NetworkGraph, config: AttackConfig, channelCount: number): string | null {
    const lastGenerated = config.baseScid + BigInt(channelCount) - 1n;
    if (channelCount > 0 && config.targetScid >= config.baseScid && config.targetScid <= lastGenerated) {
        return `Target channel scid ${config.targetScid} collides with generated scids ${config.baseScid}..${lastGenerated}`;
    }

    const existing = new Set<string>();
    for (const chan of network.channels) {
        if (chan.scid !== undefined) existing.add(String(chan.scid));
    }

    if (existing.has(String(config.targetScid))) {
        return `Short channel id ${config.targetScid} already used by an existing channel`;
    }
    for (let i = 0; i < channelCount; i++) {
        const scid = config.baseScid + BigInt(i);
        if (existing.has(String(scid))) {
            return `Short channel id ${scid} already used by an existing channel`;
        }
    }
    return null;
}

export function injectAttacker(
    network: NetworkGraph,
    targetAliasText: string,
    config: AttackConfig
): ToolResult<InjectionResult> {
    const nodes = extractUniqueNodes(network.channels);

    const targetAlias = normalizeAlias(targetAliasText);
    const targetPubkey = targetAlias === null ? null : findTargetPubkey(nodes, targetAlias);
    if (targetAlias === null || targetPubkey === null) {
        return fail(ToolErrorKind.NotFound, `No node with alias '${targetAlias ?? targetAliasText.trim()}' found.`);
    }

    const attackerPubkey = config.attackerPubkey;
    if (nodes.has(attackerPubkey)) {
        return fail(ToolErrorKind.Conflict, `Attacker pubkey ${attackerPubkey} is already part of the network`);
    }
    const attackerAlias = nextAttackerAlias(nodes.values());

    const candidates = candidateNodes(network.channels, targetPubkey);
    const channelCount = Math.trunc(nodes.size * config.channelFraction);
    if (candidates.length < channelCount) {
        return fail(
            ToolErrorKind.NotFound,
            `Only ${candidates.length} candidate nodes available, need ${channelCount}`
        );
    }

    const conflict = scidConflict(network, config, channelCount);
    if (conflict) {
        return fail(ToolErrorKind.Conflict, conflict);
    }

    const capacity = config.channelCapacityMsat;
    const attacker = () => makeNodePolicy(attackerPubkey, attackerAlias, true, capacity);
    const newChannels: SimChannel[] = [];

    for (let i = 0; i < channelCount; i++) {
        const peer = candidates[i];
        if (peer === undefined) break;
        newChannels.push({
            scid: config.baseScid + BigInt(i),
            capacity_msat: capacity,
            node_1: attacker(),
            node_2: makeNodePolicy(peer, nodes.get(peer)?.alias ?? null, false, capacity),
        });
    }

    newChannels.push({
        scid: config.targetScid,
        capacity_msat: capacity * channelCount,
        node_1: attacker(),
        node_2: makeNodePolicy(targetPubkey, targetAlias, false, capacity),
    });

    return ok({
        attackerPubkey,
        attackerAlias,
        targetPubkey,
        targetAlias,
        channelCount,
        newChannels,
        graph: { ...network.raw, sim_network: [...newChannels, ...network.rawChannels] },
    });
}
