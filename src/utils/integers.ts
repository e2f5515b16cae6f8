// src/utils/integers.ts

// Optional sign, decimal digits, single underscores allowed between digits ("1_000")
const INTEGER_TEXT = /^[+-]?\d+(?:_\d+)*$/;

/** Parse a base-10 integer written the way the simulator's tooling writes them; null when it is not one. */
export function parseIntegerText(text: string): bigint | null {
    const s = text.trim();
    if (!INTEGER_TEXT.test(s)) return null;
    return BigInt(s.replace(/_/g, ""));
}
