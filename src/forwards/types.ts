// src/forwards/types.ts

/** One row of a simulated forwarding history; only the consumed columns. */
export interface ForwardRecord {
    channelOutId: string;
    /** millisatoshi */
    outgoingAmt: bigint;
}

export interface ChannelStat {
    channelId: string;
    totalAmount: bigint;
    count: number;
}

export interface ForwardSummary {
    /** Sorted by totalAmount, largest first */
    channels: ChannelStat[];
    totalAmount: bigint;
    totalCount: number;
}
