// src/forwards/report.ts
// Fixed-width text table for the per-channel forward summary.

import { roundedAverage } from "./aggregate.js";
import type { ForwardSummary } from "./types.js";

const RULE_WIDTH = 60;
const ID_WIDTH = 15;
const TOTAL_WIDTH = 19;
const COUNT_WIDTH = 9;
const AVG_WIDTH = 14;

export const NO_DATA_MESSAGE = "No data found in file";

export function groupThousands(value: bigint): string {
    const negative = value < 0n;
    const digits = (negative ? -value : value).toString();
    const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
    return negative ? `-${grouped}` : grouped;
}

function row(label: string, total: bigint, count: number): string {
    return [
        label.padEnd(ID_WIDTH),
        groupThousands(total).padStart(TOTAL_WIDTH),
        count.toString().padStart(COUNT_WIDTH),
        groupThousands(roundedAverage(total, count)).padStart(AVG_WIDTH),
    ].join(" ");
}

/** Report lines, ready for console.log one by one. */
export function formatForwardReport(summary: ForwardSummary): string[] {
    if (summary.channels.length === 0) {
        return [NO_DATA_MESSAGE];
    }

    const lines: string[] = [
        "Channel Out ID Analysis",
        "=".repeat(RULE_WIDTH),
        [
            "Channel ID".padEnd(ID_WIDTH),
            "Total Sent (msat)".padEnd(20),
            "Count".padEnd(10),
            "Avg per Forward".padEnd(15),
        ].join(" "),
        "-".repeat(RULE_WIDTH),
    ];

    for (const c of summary.channels) {
        lines.push(row(c.channelId, c.totalAmount, c.count));
    }

    lines.push("-".repeat(RULE_WIDTH));
    lines.push(row("TOTAL", summary.totalAmount, summary.totalCount));
    lines.push("");
    lines.push(`Unique channels: ${summary.channels.length}`);

    return lines;
}
