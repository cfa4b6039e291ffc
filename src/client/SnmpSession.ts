import * as fs from 'fs';
import { MibLookupService, MibStore } from '../features/MibStore';
import { TransportTarget } from '../core/UdpClient';
import { NotConfiguredError, PathNotFoundError, ValueFormatError, ValueRangeError } from '../core/SnmpError';
import { Logger, SnmpVersion } from '../types';

export const DEFAULT_PORT = 161;
export const DEFAULT_COMMUNITY = 'public';
export const DEFAULT_TIMEOUT = 1000;
export const DEFAULT_RETRIES = 5;

export interface SnmpSessionOptions {
    /** Agent address. Requests fail with NotConfiguredError until one is set. */
    host?: string;
    /** Agent UDP port (default: 161) */
    port?: number;
    /** Community string (default: 'public') */
    community?: string;
    /** Protocol version (default: 'v2c') */
    version?: SnmpVersion;
    /** Milliseconds to wait per try (default: 1000) */
    timeout?: number;
    /** Retransmissions after the first try (default: 5) */
    retries?: number;
    /** MIB lookup service. A fresh `MibStore` over the bundled modules when omitted. */
    mibs?: MibLookupService;
    /** Extra MIB directories appended to the search path, in order */
    mibSearchPath?: string[];
    /** Defaults to `console` */
    logger?: Logger;
    /** Environment to read SNMP_* variables from (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

/**
 * Everything one exchange needs to know about its destination.
 */
export interface SessionTarget extends TransportTarget {
    community: string;
    version: SnmpVersion;
}

function parseVersion(raw: string): SnmpVersion {
    const normalized = raw.trim().toLowerCase().replace(/^v/, '');
    if (normalized === '1') return 'v1';
    if (normalized === '2c' || normalized === '2') return 'v2c';
    throw new ValueFormatError('version', raw, "expected 'v1' or 'v2c'");
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ValueFormatError(name, raw, 'not a number');
    }
    return value;
}

/**
 * SnmpSession
 * * Connection parameters and MIB context for one client.
 * * Host, port and community may be changed between requests. Not safe for
 * concurrent mutation; use one session per logical caller.
 *
 * **Configuration Priority:**
 * 1. **Environment Variables:** `SNMP_HOST`, `SNMP_PORT`, `SNMP_COMMUNITY`, `SNMP_VERSION`,
 *    `SNMP_TIMEOUT`, `SNMP_RETRIES`, `SNMP_MIB_PATH` (colon separated). Empty values are ignored.
 * 2. **Constructor Options.**
 * 3. Defaults.
 */
export class SnmpSession {
    public readonly mibs: MibLookupService;

    private host: string | null = null;
    private port: number = DEFAULT_PORT;
    private community: string = DEFAULT_COMMUNITY;
    private version: SnmpVersion = 'v2c';
    private timeout: number = DEFAULT_TIMEOUT;
    private retries: number = DEFAULT_RETRIES;

    private readonly logger: Logger;

    constructor(options: SnmpSessionOptions = {}) {
        const env = options.env ?? process.env;
        this.logger = options.logger ?? console;
        this.mibs = options.mibs ?? new MibStore();

        const host = env.SNMP_HOST || options.host;
        const port = parseNumber('port', env.SNMP_PORT) ?? options.port ?? DEFAULT_PORT;
        if (host) {
            this.setHost(host, port);
        } else {
            this.port = this.checkPort(port);
        }

        const community = env.SNMP_COMMUNITY || options.community;
        if (community !== undefined) this.setCommunityString(community);

        const version = env.SNMP_VERSION ? parseVersion(env.SNMP_VERSION) : options.version;
        if (version) this.setVersion(version);

        const timeout = parseNumber('timeout', env.SNMP_TIMEOUT) ?? options.timeout;
        if (timeout !== undefined) this.setTimeout(timeout);

        const retries = parseNumber('retries', env.SNMP_RETRIES) ?? options.retries;
        if (retries !== undefined) this.setRetries(retries);

        const extraPaths = [
            ...(options.mibSearchPath ?? []),
            ...(env.SNMP_MIB_PATH ? env.SNMP_MIB_PATH.split(':').filter(Boolean) : []),
        ];
        for (const dir of extraPaths) {
            this.addMibSearchPath(dir);
        }
    }

    public get isConfigured(): boolean {
        return this.host !== null;
    }

    public setHost(host: string, port: number = DEFAULT_PORT): void {
        if (host.trim() === '') {
            throw new ValueFormatError('host', host, 'host must not be empty');
        }
        const checkedPort = this.checkPort(port);
        this.host = host.trim();
        this.port = checkedPort;
    }

    public setCommunityString(community: string): void {
        this.community = community;
    }

    public setVersion(version: SnmpVersion | string): void {
        this.version = parseVersion(version);
    }

    public setTimeout(ms: number): void {
        if (!Number.isInteger(ms) || ms <= 0) {
            throw new ValueRangeError('timeout', String(ms), 'a positive number of milliseconds');
        }
        this.timeout = ms;
    }

    public setRetries(retries: number): void {
        if (!Number.isInteger(retries) || retries < 0) {
            throw new ValueRangeError('retries', String(retries), 'a non-negative integer');
        }
        this.retries = retries;
    }

    /**
     * Adds a directory to the end of the MIB search path.
     *
     * @example
     * session.addMibSearchPath('/usr/share/mibs/compiled');
     *
     * @throws PathNotFoundError when `dir` is not an existing, readable directory.
     * The search path is left untouched in that case.
     */
    public addMibSearchPath(dir: string): void {
        this.logger.info(`[SnmpSession] Adding MIB path ${dir}`);

        const stats = fs.statSync(dir, { throwIfNoEntry: false });
        if (!stats || !stats.isDirectory()) {
            throw new PathNotFoundError(dir);
        }
        try {
            fs.accessSync(dir, fs.constants.R_OK);
        } catch {
            throw new PathNotFoundError(dir);
        }

        const paths = [...this.mibs.getSearchPath(), dir];
        this.logger.debug(`[SnmpSession] New paths: ${paths.join(' ')}`);
        this.mibs.setSearchPath(paths);
    }

    public getMibSearchPath(): string[] {
        return this.mibs.getSearchPath();
    }

    /**
     * Loads MIB modules ahead of the first request that needs them.
     *
     * `names` can be a list of module names, or empty to load every module found on
     * the search path (which can take a while with large MIB collections).
     * Optional: resolution loads what it needs, this only moves the cost up front.
     */
    public async preloadMibs(...names: string[]): Promise<void> {
        if (names.length > 0) {
            this.logger.info(`[SnmpSession] Preloading MIBs ${names.join(' ')}`);
        } else {
            this.logger.info('[SnmpSession] Preloading all available MIBs');
        }
        await this.mibs.loadModules(...names);
    }

    /**
     * Snapshot of the destination for one exchange.
     * @throws NotConfiguredError before `setHost()`.
     */
    public target(): SessionTarget {
        if (this.host === null) {
            throw new NotConfiguredError();
        }
        return {
            host: this.host,
            port: this.port,
            community: this.community,
            version: this.version,
            timeout: this.timeout,
            retries: this.retries,
        };
    }

    private checkPort(port: number): number {
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
            throw new ValueRangeError('port', String(port), '1..65535');
        }
        return port;
    }
}
