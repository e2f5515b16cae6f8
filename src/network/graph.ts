// src/network/graph.ts
// Connectivity and capacity statistics over a loaded channel list.

import { normalizeAlias } from "./alias.js";
import type { ChannelRecord, UniqueNode } from "./types.js";

function endpoints(chan: ChannelRecord): [string, string] {
    return [chan.node_1.pubkey, chan.node_2.pubkey];
}

export function capacityMsat(chan: ChannelRecord): bigint {
    return BigInt(chan.capacity_msat);
}

/**
 * Unique nodes keyed by pubkey, in first-seen order (node_1 before node_2).
 * The first occurrence of a pubkey decides its alias.
 */
export function extractUniqueNodes(channels: readonly ChannelRecord[]): Map<string, UniqueNode> {
    const nodes = new Map<string, UniqueNode>();

    for (const chan of channels) {
        for (const node of [chan.node_1, chan.node_2]) {
            if (nodes.has(node.pubkey)) continue;
            nodes.set(node.pubkey, {
                pubkey: node.pubkey,
                alias: normalizeAlias(node.alias),
            });
        }
    }

    return nodes;
}

export function findTargetPubkey(nodes: Map<string, UniqueNode>, targetAlias: string): string | null {
    for (const node of nodes.values()) {
        if (node.alias === targetAlias) return node.pubkey;
    }
    return null;
}

/** Sum of the capacity of every channel each node is an endpoint of. */
export function nodeCapacities(channels: readonly ChannelRecord[]): Map<string, bigint> {
    const capacity = new Map<string, bigint>();

    for (const chan of channels) {
        const c = capacityMsat(chan);
        for (const pk of endpoints(chan)) {
            capacity.set(pk, (capacity.get(pk) ?? 0n) + c);
        }
    }

    return capacity;
}

/** The target plus every node sharing a channel with it. */
export function targetNeighborhood(channels: readonly ChannelRecord[], targetPubkey: string): Set<string> {
    const connected = new Set<string>();

    for (const chan of channels) {
        const [n1, n2] = endpoints(chan);
        if (n1 === targetPubkey || n2 === targetPubkey) {
            connected.add(n1);
            connected.add(n2);
        }
    }

    return connected;
}

/**
 * Nodes not adjacent to the target, best connected first. Equal capacities
 * keep first-seen order.
 */
export function candidateNodes(channels: readonly ChannelRecord[], targetPubkey: string): string[] {
    const capacity = nodeCapacities(channels);
    const excluded = targetNeighborhood(channels, targetPubkey);

    const candidates: Array<[string, bigint]> = [];
    for (const [pk, c] of capacity) {
        if (!excluded.has(pk)) candidates.push([pk, c]);
    }

    candidates.sort((a, b) => (a[1] > b[1] ? -1 : a[1] < b[1] ? 1 : 0));
    return candidates.map(([pk]) => pk);
}
