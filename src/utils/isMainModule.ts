// src/utils/isMainModule.ts

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";

/** True when the module at `moduleUrl` is the script node was started with (bin symlinks resolved). */
export function isMainModule(moduleUrl: string): boolean {
    const entry = process.argv[1];
    if (!entry || !fs.existsSync(entry)) return false;
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(moduleUrl));
}
