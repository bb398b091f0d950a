/**
 * Diagnostics go to stderr and only when IPCALC_DEBUG is set; stdout is
 * reserved for results that scripts parse.
 */
export function log(message: string): void {
    if (!process.env.IPCALC_DEBUG) return;
    console.error(`[ipcalc] ${message}`);
}
