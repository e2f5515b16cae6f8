// src/forwards/aggregate.ts

import type { ChannelStat, ForwardRecord, ForwardSummary } from "./types.js";

/**
 * Group forwards by outgoing channel. Channels come back ordered by total
 * amount descending; equal totals keep first-seen order.
 */
export function aggregateForwards(records: Iterable<ForwardRecord>): ForwardSummary {
    const byChannel = new Map<string, ChannelStat>();

    for (const r of records) {
        let stat = byChannel.get(r.channelOutId);
        if (!stat) {
            stat = { channelId: r.channelOutId, totalAmount: 0n, count: 0 };
            byChannel.set(r.channelOutId, stat);
        }
        stat.totalAmount += r.outgoingAmt;
        stat.count++;
    }

    const channels = [...byChannel.values()].sort((a, b) =>
        a.totalAmount > b.totalAmount ? -1 : a.totalAmount < b.totalAmount ? 1 : 0
    );

    let totalAmount = 0n;
    let totalCount = 0;
    for (const c of channels) {
        totalAmount += c.totalAmount;
        totalCount += c.count;
    }

    return { channels, totalAmount, totalCount };
}

/** total / count rounded to the nearest integer, ties to even; 0 when count is 0 */
export function roundedAverage(total: bigint, count: number): bigint {
    if (count <= 0) return 0n;

    const n = BigInt(count);
    const q = total / n;
    const r = total % n;
    const absR = r < 0n ? -r : r;

    const away = total < 0n ? q - 1n : q + 1n;

    if (2n * absR > n) return away;
    if (2n * absR === n && q % 2n !== 0n) return away;
    return q;
}
