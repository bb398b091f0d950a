import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
    return env.IPCALC_CONFIG_DIR || path.join(os.homedir(), '.ipcalc');
}

export function configFile(env: NodeJS.ProcessEnv = process.env): string {
    return path.join(configDir(env), 'config.json');
}

/** Nameservers must be IP addresses; the resolver refuses hostnames */
export const DnsServersSchema = z.array(z.string().ip());

export const ColorModeSchema = z.enum(['auto', 'always', 'never']);

export const IpcalcConfigSchema = z.object({
    silent: z.boolean().default(false),
    color: ColorModeSchema.default('auto'),
    // Default IPv4 prefix from the address class when none is given
    classful: z.boolean().default(false),
    dnsServers: DnsServersSchema.default([]),
}).strict();

export type IpcalcConfig = z.infer<typeof IpcalcConfigSchema>;
export type ColorMode = z.infer<typeof ColorModeSchema>;

export class ConfigError extends Error {
    constructor(message: string, public readonly source: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const BooleanEnv = z.enum(['1', 'true', '0', 'false']).transform(v => v === '1' || v === 'true');

// Comma-separated list, blanks dropped
const DnsServersEnv = z.string()
    .transform(v => v.split(',').map(s => s.trim()).filter(s => s.length > 0))
    .pipe(DnsServersSchema);

function fromEnv<T>(env: NodeJS.ProcessEnv, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`invalid value for ${name}: ${raw}`, name);
    }
    return parsed.data;
}

function readConfigFile(file: string): unknown {
    if (!fs.existsSync(file)) return {};
    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (e) {
        throw new ConfigError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`, file);
    }
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`invalid JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`, file);
    }
}

export interface LoadConfigOptions {
    file?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Load config.json (if present) and apply IPCALC_* environment overrides.
 * Throws ConfigError on unreadable or invalid settings.
 */
export function loadConfig(options: LoadConfigOptions = {}): IpcalcConfig {
    const env = options.env ?? process.env;
    // Resolved per call so a .env loaded after import still applies
    const file = options.file ?? configFile(env);

    const parsed = IpcalcConfigSchema.safeParse(readConfigFile(file));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
        throw new ConfigError(`invalid config in ${file}: ${where}: ${issue.message}`, file);
    }

    const config = parsed.data;
    const dnsServers = fromEnv(env, 'IPCALC_DNS_SERVERS', DnsServersEnv);

    return {
        silent: fromEnv(env, 'IPCALC_SILENT', BooleanEnv) ?? config.silent,
        color: fromEnv(env, 'IPCALC_COLOR', ColorModeSchema) ?? config.color,
        classful: fromEnv(env, 'IPCALC_CLASSFUL', BooleanEnv) ?? config.classful,
        dnsServers: dnsServers && dnsServers.length > 0 ? dnsServers : config.dnsServers,
    };
}
