import chalk from 'chalk';
import type { AddressInfo, InfoField } from '@ipcalc/core';

export type Painter = chalk.Chalk;

export function createPainter(color: boolean): Painter {
    return new chalk.Instance({ level: color ? 1 : 0 });
}

const plain = createPainter(false);

function isSingleHost(info: AddressInfo): boolean {
    return info.prefix === (info.family === 'v6' ? 128 : 32);
}

/** The human-readable block printed by --info (and by default) */
export function formatInfo(info: AddressInfo, paint: Painter = plain): string[] {
    const line = (label: string, value: string) => `${paint.bold(`${label}:`)}\t${value}`;
    const lines: string[] = [];

    if (info.expandedAddress) lines.push(line('Full Address', info.expandedAddress));
    lines.push(line('Address', info.address));
    if (info.hostname) lines.push(line('Hostname', info.hostname));

    if (isSingleHost(info)) {
        lines.push(line('Address space', info.addressSpace));
        return lines;
    }

    lines.push(line('Netmask', `${info.netmask} = ${info.prefix}`));
    if (info.expandedNetwork) lines.push(line('Full Network', info.expandedNetwork));
    lines.push(line('Network', `${info.network}/${info.prefix}`));
    lines.push(line('Address space', info.addressSpace));
    if (info.broadcast) lines.push(line('Broadcast', info.broadcast));
    lines.push('');
    lines.push(line('HostMin', info.hostMin));
    lines.push(line('HostMax', info.hostMax));
    lines.push(line('Hosts/Net', info.hostCount));
    return lines;
}

/** Shell-friendly KEY=VALUE lines, one per requested field */
export function formatFields(info: AddressInfo, fields: readonly InfoField[]): string[] {
    const wanted = new Set(fields);
    const lines: string[] = [];

    if (wanted.has('netmask')) lines.push(`NETMASK=${info.netmask}`);
    if (wanted.has('prefix')) lines.push(`PREFIX=${info.prefix}`);
    if (wanted.has('broadcast') && info.broadcast) lines.push(`BROADCAST=${info.broadcast}`);
    if (wanted.has('network')) lines.push(`NETWORK=${info.network}`);
    if (wanted.has('hostMin')) lines.push(`MINADDR=${info.hostMin}`);
    if (wanted.has('hostMax')) lines.push(`MAXADDR=${info.hostMax}`);
    if (wanted.has('addressSpace')) lines.push(`ADDRSPACE="${info.addressSpace}"`);
    if (wanted.has('hostname') && info.hostname) lines.push(`HOSTNAME=${info.hostname}`);
    return lines;
}
