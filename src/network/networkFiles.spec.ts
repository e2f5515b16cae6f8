import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { injectAttacker } from './inject.js';
import { parseNetworkGraph, readNetworkInputs, writeInjection } from './networkFiles.js';
import { ToolErrorKind } from '../utils/errors.js';
import { DEFAULT_ATTACKER_PUBKEY, getNetworkPaths, type AttackConfig } from '../utils/runConfig.js';

const CONFIG: AttackConfig = {
    attackerPubkey: DEFAULT_ATTACKER_PUBKEY,
    channelCapacityMsat: 10_000_000,
    channelFraction: 0.1,
    baseScid: 10_000_000n,
    targetScid: 9_999_999n,
};

function endpoint(i: number) {
    return { pubkey: `03${String(i).padStart(64, '0')}`, alias: String(i), cltv_expiry_delta: 40 };
}

/** Path of `size` nodes: 1 - 2 - ... - size */
function pathNetwork(size: number) {
    const sim_network = Array.from({ length: size - 1 }, (_, k) => ({
        scid: k + 1,
        capacity_msat: (k + 1) * 1_000,
        node_1: endpoint(k + 1),
        node_2: endpoint(k + 2),
    }));
    return { nodes: [], sim_network, simulation: { seed: 7 } };
}

function withTempDir(fn: (dir: string) => void): void {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ln-sim-network-'));
    try {
        fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

test('parseNetworkGraph rejects invalid JSON', () => {
    const r = parseNetworkGraph('{"sim_network": [');
    assert.ok(!r.success);
    assert.equal(r.error.kind, ToolErrorKind.MalformedInput);
    assert.ok(r.error.message.startsWith('Invalid JSON in peacetime_network.json: '));
});

test('parseNetworkGraph requires an object with channels', () => {
    const notObject = parseNetworkGraph('[]');
    assert.ok(!notObject.success);
    assert.equal(notObject.error.message, 'peacetime_network.json must contain a JSON object');

    for (const text of ['{}', '{"sim_network": []}']) {
        const r = parseNetworkGraph(text);
        assert.ok(!r.success);
        assert.equal(r.error.message, 'No channels found in peacetime_network.json');
    }

    const notArray = parseNetworkGraph('{"sim_network": {"a": 1}}');
    assert.ok(!notArray.success);
    assert.equal(notArray.error.message, 'sim_network in peacetime_network.json is not an array');
});

test('parseNetworkGraph reports the first invalid channel field', () => {
    const r = parseNetworkGraph(JSON.stringify({
        sim_network: [{ scid: 1, capacity_msat: 10, node_1: endpoint(1) }],
    }));
    assert.ok(!r.success);
    assert.ok(r.error.message.startsWith('Invalid channel in peacetime_network.json: sim_network.0.node_2'));
});

test('readNetworkInputs reports missing inputs in order', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);

        const noNetwork = readNetworkInputs(paths);
        assert.ok(!noNetwork.success);
        assert.equal(noNetwork.error.kind, ToolErrorKind.MissingFile);
        assert.equal(noNetwork.error.message, `Missing: ${paths.peacetime}`);

        fs.writeFileSync(paths.peacetime, JSON.stringify(pathNetwork(3)));
        const noTarget = readNetworkInputs(paths);
        assert.ok(!noTarget.success);
        assert.equal(noTarget.error.message, `Missing: ${paths.target}`);
    });
});

test('network directory round trip writes attacker alias and augmented graph', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);
        const input = pathNetwork(20);
        fs.writeFileSync(paths.peacetime, JSON.stringify(input));
        fs.writeFileSync(paths.target, '5\n');

        const inputs = readNetworkInputs(paths);
        assert.ok(inputs.success);
        const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, CONFIG);
        assert.ok(result.success);
        assert.ok(writeInjection(paths, result.value).success);

        assert.equal(fs.readFileSync(paths.attacker, 'utf-8'), '21');

        const written = fs.readFileSync(paths.attacktime, 'utf-8');
        const out = JSON.parse(written);
        assert.deepEqual(Object.keys(out), ['nodes', 'sim_network', 'simulation']);
        assert.equal(out.sim_network.length, input.sim_network.length + 3);
        assert.deepEqual(out.sim_network.slice(3), input.sim_network);
        assert.deepEqual(out.simulation, { seed: 7 });
        assert.equal(written, JSON.stringify(out, null, 2));
    });
});

test('a failed injection leaves the network directory untouched', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);
        fs.writeFileSync(paths.peacetime, JSON.stringify(pathNetwork(20)));
        fs.writeFileSync(paths.target, '77');

        const inputs = readNetworkInputs(paths);
        assert.ok(inputs.success);
        const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, CONFIG);
        assert.ok(!result.success);
        assert.equal(result.error.message, "No node with alias '77' found.");

        assert.equal(fs.existsSync(paths.attacker), false);
        assert.equal(fs.existsSync(paths.attacktime), false);
    });
});

/** Network text with u64 scids written as bare JSON integers. */
function bigScidNetworkText(size: number, firstScid: bigint): string {
    const sim_network = Array.from({ length: size - 1 }, (_, k) => ({
        scid: (firstScid + BigInt(k)).toString(),
        capacity_msat: (k + 1) * 1_000,
        node_1: endpoint(k + 1),
        node_2: endpoint(k + 2),
    }));
    return JSON.stringify({ sim_network }, null, 2).replace(/"scid": "(\d+)"/g, '"scid": $1');
}

test('short channel ids above 2^53 survive the round trip exactly', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);
        fs.writeFileSync(paths.peacetime, bigScidNetworkText(20, 880000123456789010n));
        fs.writeFileSync(paths.target, '5');

        const inputs = readNetworkInputs(paths);
        assert.ok(inputs.success);
        assert.equal(inputs.value.network.channels[2]?.scid, 880000123456789012n);

        const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, CONFIG);
        assert.ok(result.success);
        assert.ok(writeInjection(paths, result.value).success);

        const written = fs.readFileSync(paths.attacktime, 'utf-8');
        for (let k = 0n; k < 19n; k++) {
            assert.ok(written.includes(`"scid": ${880000123456789010n + k},`), `scid ${k}`);
        }
        assert.ok(written.includes('"scid": 10000000,'));
    });
});

test('generated scids are checked against u64 scids exactly', () => {
    const net = parseNetworkGraph(bigScidNetworkText(20, 880000123456789010n));
    assert.ok(net.success);

    const r = injectAttacker(net.value, '5', { ...CONFIG, baseScid: 880000123456789028n });
    assert.ok(!r.success);
    assert.equal(r.error.kind, ToolErrorKind.Conflict);
    assert.equal(r.error.message, 'Short channel id 880000123456789028 already used by an existing channel');

    const clear = injectAttacker(net.value, '5', { ...CONFIG, baseScid: 880000123456789029n });
    assert.ok(clear.success);
});

test('writeInjection reports a failed network write and leaves no attacker file', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);
        fs.writeFileSync(paths.peacetime, JSON.stringify(pathNetwork(20)));
        fs.writeFileSync(paths.target, '5');
        fs.mkdirSync(paths.attacktime);

        const inputs = readNetworkInputs(paths);
        assert.ok(inputs.success);
        const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, CONFIG);
        assert.ok(result.success);

        const written = writeInjection(paths, result.value);
        assert.ok(!written.success);
        assert.equal(written.error.kind, ToolErrorKind.WriteFailed);
        assert.equal(written.error.path, paths.attacktime);
        assert.equal(fs.existsSync(paths.attacker), false);
    });
});

test('writeInjection removes the network file when attacker.csv cannot be written', () => {
    withTempDir(dir => {
        const paths = getNetworkPaths(dir);
        fs.writeFileSync(paths.peacetime, JSON.stringify(pathNetwork(20)));
        fs.writeFileSync(paths.target, '5');
        fs.mkdirSync(paths.attacker);

        const inputs = readNetworkInputs(paths);
        assert.ok(inputs.success);
        const result = injectAttacker(inputs.value.network, inputs.value.targetAliasText, CONFIG);
        assert.ok(result.success);

        const written = writeInjection(paths, result.value);
        assert.ok(!written.success);
        assert.equal(written.error.path, paths.attacker);
        assert.equal(fs.existsSync(paths.attacktime), false);
    });
});
