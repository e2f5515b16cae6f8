// src/forwards/parseForwards.ts
//
// Reads a forwarding-history CSV (header row, comma separated). Only
// outgoing_amt and channel_out_id are consumed; every other column is ignored.

import * as fs from "node:fs";
import Papa from "papaparse";
import { z } from "zod";

import { ToolErrorKind, describeError, fail, ok, type ToolResult } from "../utils/errors.js";
import { parseIntegerText } from "../utils/integers.js";
import type { ForwardRecord } from "./types.js";

const ForwardRowSchema = z.object({
    outgoing_amt: z
        .string()
        .transform((s, ctx) => {
            const amt = parseIntegerText(s);
            if (amt === null) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not an integer" });
                return z.NEVER;
            }
            return amt;
        }),
    channel_out_id: z.string(),
});

export function parseForwardsCsv(csvText: string): ToolResult<ForwardRecord[]> {
    const parsed = Papa.parse<Record<string, string>>(csvText, {
        header: true,
        delimiter: ",",
        skipEmptyLines: true,
        dynamicTyping: false,
    });

    // Field-count mismatches are tolerated, a row only has to carry the two columns we read
    const quoteError = parsed.errors.find(e => e.type === "Quotes");
    if (quoteError) {
        const where = quoteError.row === undefined ? "" : `Row ${quoteError.row + 2}: `;
        return fail(ToolErrorKind.MalformedInput, `${where}${quoteError.message}`);
    }

    const records: ForwardRecord[] = [];
    for (let i = 0; i < parsed.data.length; i++) {
        const res = ForwardRowSchema.safeParse(parsed.data[i]);
        if (!res.success) {
            const issue = res.error.issues[0];
            const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid row";
            return fail(ToolErrorKind.MalformedInput, `Row ${i + 2}: ${detail}`);
        }

        records.push({
            channelOutId: res.data.channel_out_id,
            outgoingAmt: res.data.outgoing_amt,
        });
    }

    return ok(records);
}

export function readForwardsFile(filePath: string): ToolResult<ForwardRecord[]> {
    if (!fs.existsSync(filePath)) {
        return fail(ToolErrorKind.MissingFile, `Error: File '${filePath}' not found`, filePath);
    }

    let text: string;
    try {
        text = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
        return fail(ToolErrorKind.MalformedInput, `Error reading file: ${describeError(err)}`, filePath);
    }

    const parsed = parseForwardsCsv(text);
    if (!parsed.success) {
        return fail(parsed.error.kind, `Error reading file: ${parsed.error.message}`, filePath);
    }
    return parsed;
}
