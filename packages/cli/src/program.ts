import { Command, CommanderError } from 'commander';
import ora from 'ora';
import {
    CORE_VERSION,
    ambiguousInput,
    configFile,
    createDnsLookup,
    detectFamily,
    getAddressInfo,
    splitCidr,
    type AddressQuery,
    type Family,
    type HostnameLookup,
    type InfoField,
    type IpcalcConfig,
} from '@ipcalc/core';
import { createPainter, formatFields, formatInfo, type Painter } from './format';

export interface CliIO {
    out(text: string): void;
    err(text: string): void;
}

export interface CliDeps {
    config: IpcalcConfig;
    io: CliIO;
    lookup?: HostnameLookup;
    /** stdout/stderr are a terminal: enables color (auto) and the spinner */
    interactive?: boolean;
}

type CliOptions = {
    check?: boolean;
    info?: boolean;
    ipv4?: boolean;
    ipv6?: boolean;
    broadcast?: boolean;
    hostname?: boolean;
    netmask?: boolean;
    network?: boolean;
    prefix?: boolean;
    minaddr?: boolean;
    maxaddr?: boolean;
    addrspace?: boolean;
    classful?: boolean;
    silent?: boolean;
};

// Output order of KEY=VALUE lines follows this table
const FIELD_FLAGS: ReadonlyArray<[keyof CliOptions, InfoField]> = [
    ['netmask', 'netmask'],
    ['prefix', 'prefix'],
    ['broadcast', 'broadcast'],
    ['network', 'network'],
    ['minaddr', 'hostMin'],
    ['maxaddr', 'hostMax'],
    ['addrspace', 'addressSpace'],
    ['hostname', 'hostname'],
];

export function createProgram(): Command {
    return new Command()
        .name('ipcalc')
        .description('Calculate netmask, network, broadcast and host range of an IPv4 or IPv6 address')
        .version(CORE_VERSION, '-V, --version')
        .helpOption('-?, --help', 'Show this help message')
        .argument('[address]', 'address, optionally followed by /prefix or /netmask')
        .argument('[args...]', 'IPv4 netmask (with -b, -n or -p)')
        .option('-c, --check', 'Validate IP address')
        .option('-i, --info', 'Print information on the provided IP address')
        .option('-4, --ipv4', 'Treat the address as IPv4')
        .option('-6, --ipv6', 'Treat the address as IPv6')
        .option('-b, --broadcast', 'Display calculated broadcast address')
        .option('-h, --hostname', 'Show hostname determined via DNS')
        .option('-m, --netmask', 'Display netmask for IP')
        .option('-n, --network', 'Display network address')
        .option('-p, --prefix', 'Display network prefix')
        .option('--minaddr', 'Display the minimum address in the network')
        .option('--maxaddr', 'Display the maximum address in the network')
        .option('--addrspace', 'Display the address space the network resides on')
        .option('--classful', 'Default an IPv4 prefix from the address class (A, B or C)')
        .option('-s, --silent', "Don't ever display error messages")
        .addHelpText('after', `\nDefaults are read from ${configFile()} and IPCALC_* environment variables.`)
        .exitOverride();
}

function silentRequested(argv: string[]): boolean {
    return argv.some(a => a === '--silent' || /^-[^-]*s/.test(a));
}

function withSpinner(lookup: HostnameLookup): HostnameLookup {
    return async (family, address) => {
        const spinner = ora({ text: 'Resolving hostname...', stream: process.stderr }).start();
        try {
            return await lookup(family, address);
        } finally {
            spinner.stop();
        }
    };
}

/**
 * Run one ipcalc invocation. `argv` holds the user arguments only.
 * Resolves the process exit code.
 */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
    const { config, io } = deps;
    const interactive = deps.interactive ?? false;
    const paint: Painter = createPainter(config.color === 'always' || (config.color === 'auto' && interactive));
    let silent = config.silent || silentRequested(argv);

    const program = createProgram().configureOutput({
        writeOut: str => io.out(str),
        writeErr: str => {
            if (!silent) io.err(str);
        },
        outputError: (str, write) => write(paint.red(str)),
    });

    const fail = (message: string, showHelp = false): number => {
        if (!silent) {
            io.err(`${paint.red('ipcalc:')} ${message}\n`);
            if (showHelp) io.err(program.helpInformation());
        }
        return 1;
    };

    try {
        program.parse(argv, { from: 'user' });
    } catch (e) {
        if (e instanceof CommanderError) return e.exitCode;
        throw e;
    }

    const opts = program.opts<CliOptions>();
    silent = silent || opts.silent === true;

    const [addressArg, ...rest] = program.args;
    if (!addressArg) return fail('ip address expected', true);
    if (opts.ipv4 && opts.ipv6) return fail('cannot combine --ipv4 and --ipv6');

    const family: Family = opts.ipv6 ? 'v6' : opts.ipv4 ? 'v4' : detectFamily(addressArg);
    const parts = splitCidr(addressArg, family);
    if (!parts.ok) return fail(parts.error.message);

    let netmask = parts.value.netmask;
    if (family === 'v4' && (opts.broadcast || opts.network || opts.prefix) && rest.length > 0) {
        const positional = rest.shift();
        if (netmask !== undefined) return fail(ambiguousInput().message, true);
        netmask = positional;
    }
    if (rest.length > 0) return fail(`unexpected argument: ${rest[0]}`, true);

    const fields = FIELD_FLAGS.filter(([flag]) => opts[flag]).map(([, field]) => field);
    const query: AddressQuery = {
        address: parts.value.address,
        family,
        prefix: parts.value.prefix,
        netmask,
        fields,
        classful: opts.classful || config.classful,
        silent,
    };

    // The resolver is only built when a hostname is wanted
    let lookup: HostnameLookup | undefined;
    if (fields.includes('hostname')) {
        lookup = deps.lookup ?? createDnsLookup({ servers: config.dnsServers });
        if (interactive && !silent) lookup = withSpinner(lookup);
    }
    const result = await getAddressInfo(query, lookup);
    if (!result.ok) return fail(result.error.message);

    if (opts.check) return 0;

    const lines = opts.info || fields.length === 0
        ? formatInfo(result.value, paint)
        : formatFields(result.value, fields);
    if (lines.length > 0) io.out(lines.join('\n') + '\n');
    return 0;
}
