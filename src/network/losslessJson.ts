// src/network/losslessJson.ts
// Short channel ids and msat amounts are u64. Integers too long for a double
// come back as bigint and are written back digit for digit.

import JSONbig from "json-bigint";

export const losslessJson = JSONbig({ useNativeBigInt: true });
