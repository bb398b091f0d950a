import fs from 'fs';

/**
 * Load KEY=VALUE lines from a .env file into `env`. Variables already set win.
 */
export function loadEnvFile(envPath: string, env: NodeJS.ProcessEnv = process.env): void {
    if (!fs.existsSync(envPath)) return;
    const envConfig = fs.readFileSync(envPath, 'utf8');
    envConfig.split('\n').forEach(line => {
        if (line.trim().startsWith('#')) return;
        const match = line.match(/^([^=]+)=(.*)$/);
        if (match) {
            const key = match[1].trim();
            const value = match[2].trim().replace(/^"(.*)"$/, '$1');
            if (!env[key]) {
                env[key] = value;
            }
        }
    });
}
