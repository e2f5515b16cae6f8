// src/network/networkFiles.ts
// Reading and writing the files of a network directory.

import * as fs from "node:fs";
import { z } from "zod";

import { ToolErrorKind, describeError, fail, ok, type ToolResult } from "../utils/errors.js";
import { NETWORK_FILES, type NetworkPaths } from "../utils/runConfig.js";
import { losslessJson } from "./losslessJson.js";
import { ChannelRecordSchema, type InjectionResult, type NetworkGraph } from "./types.js";

const RawGraphSchema = z.record(z.unknown());

export function parseNetworkGraph(jsonText: string, source: string = NETWORK_FILES.PEACETIME): ToolResult<NetworkGraph> {
    let json: unknown;
    try {
        json = losslessJson.parse(jsonText);
    } catch (err) {
        return fail(ToolErrorKind.MalformedInput, `Invalid JSON in ${source}: ${describeError(err)}`);
    }

    const graph = RawGraphSchema.safeParse(json);
    if (!graph.success) {
        return fail(ToolErrorKind.MalformedInput, `${source} must contain a JSON object`);
    }

    const rawChannels = graph.data.sim_network ?? [];
    if (!Array.isArray(rawChannels)) {
        return fail(ToolErrorKind.MalformedInput, `sim_network in ${source} is not an array`);
    }
    if (rawChannels.length === 0) {
        return fail(ToolErrorKind.MalformedInput, `No channels found in ${source}`);
    }

    const channels = z.array(ChannelRecordSchema).safeParse(rawChannels);
    if (!channels.success) {
        const issue = channels.error.issues[0];
        const where = issue ? `sim_network.${issue.path.join(".")}: ${issue.message}` : "sim_network";
        return fail(ToolErrorKind.MalformedInput, `Invalid channel in ${source}: ${where}`);
    }

    return ok({ raw: graph.data, rawChannels: [...rawChannels], channels: channels.data });
}

export interface NetworkInputs {
    network: NetworkGraph;
    targetAliasText: string;
}

export function readNetworkInputs(paths: NetworkPaths): ToolResult<NetworkInputs> {
    for (const required of [paths.peacetime, paths.target]) {
        if (!fs.existsSync(required)) {
            return fail(ToolErrorKind.MissingFile, `Missing: ${required}`, required);
        }
    }

    const targetAliasText = fs.readFileSync(paths.target, "utf-8");
    const network = parseNetworkGraph(fs.readFileSync(paths.peacetime, "utf-8"));
    if (!network.success) {
        return fail(network.error.kind, network.error.message, paths.peacetime);
    }

    return ok({ network: network.value, targetAliasText });
}

/**
 * Network file first, then attacker.csv (a bare alias, no header). If the
 * second write fails the first is removed again, so a failed run leaves
 * neither file behind.
 */
export function writeInjection(paths: NetworkPaths, result: InjectionResult): ToolResult<void> {
    try {
        fs.writeFileSync(paths.attacktime, losslessJson.stringify(result.graph, null, 2));
    } catch (err) {
        return fail(ToolErrorKind.WriteFailed, `Could not write ${paths.attacktime}: ${describeError(err)}`, paths.attacktime);
    }

    try {
        fs.writeFileSync(paths.attacker, result.attackerAlias);
    } catch (err) {
        fs.rmSync(paths.attacktime, { force: true });
        return fail(ToolErrorKind.WriteFailed, `Could not write ${paths.attacker}: ${describeError(err)}`, paths.attacker);
    }

    return ok(undefined);
}
