// src/network/alias.ts

import { parseIntegerText } from "../utils/integers.js";
import type { UniqueNode } from "./types.js";

const UNSIGNED_INT = /^\d+$/;

/**
 * Canonical decimal form of a numeric alias (" 007 " -> "7", "1_000" -> "1000").
 * Anything that is not an integer string is unset.
 */
export function normalizeAlias(alias: unknown): string | null {
    if (typeof alias !== "string") return null;

    const value = parseIntegerText(alias);
    return value === null ? null : value.toString();
}

/** One more than the largest non-negative numeric alias, "1" when there is none. */
export function nextAttackerAlias(nodes: Iterable<UniqueNode>): string {
    let max: bigint | null = null;

    for (const n of nodes) {
        if (n.alias === null || !UNSIGNED_INT.test(n.alias)) continue;
        const v = BigInt(n.alias);
        if (max === null || v > max) max = v;
    }

    return max === null ? "1" : (max + 1n).toString();
}
