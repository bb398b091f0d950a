#!/usr/bin/env node
import path from 'path';
import { ConfigError, loadConfig, type IpcalcConfig } from '@ipcalc/core';
import { loadEnvFile } from './env';
import { run } from './program';

// Load .env manually if present
loadEnvFile(path.resolve(process.cwd(), '.env'));

async function main(): Promise<number> {
    let config: IpcalcConfig;
    try {
        config = loadConfig();
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(`ipcalc: ${e.message}`);
            return 1;
        }
        throw e;
    }

    return run(process.argv.slice(2), {
        config,
        io: {
            out: text => process.stdout.write(text),
            err: text => process.stderr.write(text),
        },
        interactive: Boolean(process.stdout.isTTY && process.stderr.isTTY),
    });
}

main().then(
    code => {
        process.exitCode = code;
    },
    (e: unknown) => {
        console.error('ipcalc: unexpected failure:', e);
        process.exitCode = 1;
    },
);
