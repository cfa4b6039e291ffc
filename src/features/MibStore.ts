import * as fs from 'fs';
import * as path from 'path';
import { UnknownSymbolError, ValueFormatError } from '../core/SnmpError';
import { SnmpType, isSnmpType } from '../core/ValueCodec';
import { oidToString, parseNumericOid, startsWith } from '../utils/Helpers';

/**
 * Directory of compiled modules shipped with the package.
 */
export const BUNDLED_MIB_DIR = path.resolve(__dirname, '..', '..', 'mibs');

const MODULE_EXTENSION = '.json';

/**
 * One named node of a MIB module.
 */
export interface MibSymbol {
    module: string;
    name: string;
    oid: number[];
    /** Value type of a scalar/columnar object, when the module declares one */
    syntax?: SnmpType;
    access?: string;
}

/**
 * The MIB lookup contract the resolver and session depend on.
 * Implementations are append-only caches: modules are loaded, never unloaded.
 */
export interface MibLookupService {
    /**
     * Finds `symbol` in `module` (loaded on demand), or in any module when `module` is ''.
     * A bare symbol missing from the loaded modules loads the whole search path first.
     * @throws UnknownSymbolError
     */
    resolve(module: string, symbol: string): Promise<MibSymbol>;

    /**
     * Finds a node called `name` whose OID is `parent` plus one arc.
     * Falls back to the whole search path like a bare `resolve`.
     * @throws UnknownSymbolError
     */
    resolveChild(parent: readonly number[], name: string): Promise<MibSymbol>;

    /**
     * Longest-prefix match of `arcs` against loaded symbols.
     */
    describe(arcs: readonly number[]): { symbol: MibSymbol; suffix: number[] } | undefined;

    /**
     * Loads modules by name (and their imports). With no names, loads every module on the search path.
     */
    loadModules(...names: string[]): Promise<void>;

    getSearchPath(): string[];
    setSearchPath(paths: readonly string[]): void;
}

export interface MibModule {
    name: string;
    imports: string[];
    symbols: Map<string, MibSymbol>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * MibStore
 * * File-backed `MibLookupService`.
 * * Reads pre-compiled modules (`<MODULE>.json`) from an ordered list of
 * directories. The first directory holding a module wins.
 *
 * @example
 * const mibs = new MibStore();
 * mibs.setSearchPath([...mibs.getSearchPath(), '/usr/share/snmp/compiled']);
 * await mibs.loadModules('SNMPv2-MIB');
 * (await mibs.resolve('SNMPv2-MIB', 'sysDescr')).oid; // [1, 3, 6, 1, 2, 1, 1, 1]
 */
export class MibStore implements MibLookupService {
    private searchPath: string[];

    /** Load order is kept so that a bare symbol resolves to the first module that defines it. */
    private readonly modules = new Map<string, MibModule>();
    private readonly byOid = new Map<string, MibSymbol>();
    /** Tail of the load chain; never rejects. */
    private loading: Promise<void> = Promise.resolve();

    constructor(searchPath: readonly string[] = [BUNDLED_MIB_DIR]) {
        this.searchPath = [...searchPath];
    }

    public getSearchPath(): string[] {
        return [...this.searchPath];
    }

    public setSearchPath(paths: readonly string[]): void {
        this.searchPath = [...paths];
    }

    public isLoaded(module: string): boolean {
        return this.modules.has(module);
    }

    public loadedModules(): string[] {
        return [...this.modules.keys()];
    }

    public loadModules(...names: string[]): Promise<void> {
        return this.exclusive(async () => {
            const targets = names.length > 0 ? names : await this.availableModules();
            for (const name of targets) {
                await this.loadModule(name, []);
            }
        });
    }

    public async resolve(module: string, symbol: string): Promise<MibSymbol> {
        if (module) {
            const mib = this.modules.get(module) ?? await this.exclusive(() => this.loadModule(module, []));
            const found = this.findInModule(mib, symbol, new Set());
            if (!found) throw new UnknownSymbolError(module, symbol);
            return found;
        }

        const found = await this.withSearchPathFallback(() => this.findLoaded(symbol));
        if (!found) {
            throw new UnknownSymbolError('', symbol, 'not defined by any MIB on the search path');
        }
        return found;
    }

    public async resolveChild(parent: readonly number[], name: string): Promise<MibSymbol> {
        const found = await this.withSearchPathFallback(() => this.findLoaded(name, parent));
        if (!found) {
            throw new UnknownSymbolError('', name, `no MIB on the search path defines it under ${oidToString(parent)}`);
        }
        return found;
    }

    public describe(arcs: readonly number[]): { symbol: MibSymbol; suffix: number[] } | undefined {
        for (let length = arcs.length; length > 0; length--) {
            const symbol = this.byOid.get(oidToString(arcs.slice(0, length)));
            if (symbol) {
                return { symbol, suffix: arcs.slice(length) };
            }
        }
        return undefined;
    }

    /**
     * Runs a lookup against the loaded modules; on a miss, loads everything on the
     * search path and runs it once more.
     */
    private async withSearchPathFallback(lookup: () => MibSymbol | undefined): Promise<MibSymbol | undefined> {
        const found = lookup();
        if (found) return found;

        await this.loadModules();
        return lookup();
    }

    /**
     * First loaded module (in load order) defining `name`, optionally as a direct child of `parent`.
     */
    private findLoaded(name: string, parent?: readonly number[]): MibSymbol | undefined {
        for (const mib of this.modules.values()) {
            const found = mib.symbols.get(name);
            if (!found) continue;
            if (!parent || (found.oid.length === parent.length + 1 && startsWith(found.oid, parent))) {
                return found;
            }
        }
        return undefined;
    }

    /**
     * Looks in a module, then in what it imports.
     */
    private findInModule(mib: MibModule, symbol: string, seen: Set<string>): MibSymbol | undefined {
        if (seen.has(mib.name)) return undefined;
        seen.add(mib.name);

        const own = mib.symbols.get(symbol);
        if (own) return own;

        for (const imported of mib.imports) {
            const dependency = this.modules.get(imported);
            const found = dependency && this.findInModule(dependency, symbol, seen);
            if (found) return found;
        }
        return undefined;
    }

    /**
     * Runs `task` after every previously queued load has settled.
     * Loads never overlap, so `chain` alone is enough to break import cycles.
     */
    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.loading.then(task);
        this.loading = run.then(() => undefined, () => undefined);
        return run;
    }

    /** Only called from inside `exclusive()`. */
    private async loadModule(name: string, chain: string[]): Promise<MibModule> {
        const loaded = this.modules.get(name);
        if (loaded) return loaded;

        const file = await this.locate(name);
        if (!file) {
            throw new UnknownSymbolError(name, '', 'not found on the search path');
        }

        const text = await fs.promises.readFile(file, 'utf8');
        const mib = MibStore.parseModule(name, file, text);
        const lineage = [...chain, name];

        for (const dependency of mib.imports) {
            if (!lineage.includes(dependency)) {
                await this.loadModule(dependency, lineage);
            }
        }

        this.modules.set(name, mib);
        for (const symbol of mib.symbols.values()) {
            const key = oidToString(symbol.oid);
            if (!this.byOid.has(key)) {
                this.byOid.set(key, symbol);
            }
        }
        return mib;
    }

    private async locate(name: string): Promise<string | undefined> {
        for (const dir of this.searchPath) {
            const candidate = path.join(dir, `${name}${MODULE_EXTENSION}`);
            const readable = await fs.promises.access(candidate, fs.constants.R_OK).then(() => true, () => false);
            if (readable) return candidate;
        }
        return undefined;
    }

    private async availableModules(): Promise<string[]> {
        const names: string[] = [];
        for (const dir of this.searchPath) {
            const entries = await fs.promises.readdir(dir);
            for (const entry of entries.sort()) {
                if (!entry.endsWith(MODULE_EXTENSION)) continue;
                const name = entry.slice(0, -MODULE_EXTENSION.length);
                if (!names.includes(name)) names.push(name);
            }
        }
        return names;
    }

    /**
     * Validates a compiled module document.
     * @throws ValueFormatError when the document does not have the expected shape.
     */
    public static parseModule(name: string, file: string, text: string): MibModule {
        const invalid = (reason: string) => new ValueFormatError('MIB module', file, reason);

        let document: unknown;
        try {
            document = JSON.parse(text);
        } catch (error) {
            throw invalid(error instanceof Error ? error.message : String(error));
        }

        if (!isRecord(document)) throw invalid('expected a JSON object');
        const moduleName = document.module ?? name;
        if (typeof moduleName !== 'string') throw invalid('"module" must be a string');

        const imports = document.imports ?? [];
        if (!Array.isArray(imports) || !imports.every((entry): entry is string => typeof entry === 'string')) {
            throw invalid('"imports" must be a list of module names');
        }

        if (!isRecord(document.symbols)) throw invalid('"symbols" must be an object');

        const symbols = new Map<string, MibSymbol>();
        for (const [symbolName, definition] of Object.entries(document.symbols)) {
            if (!isRecord(definition) || typeof definition.oid !== 'string') {
                throw invalid(`symbol "${symbolName}" needs a string "oid"`);
            }

            const oid = parseNumericOid(definition.oid);
            if (!oid) throw invalid(`symbol "${symbolName}" has a non-numeric oid`);

            const symbol: MibSymbol = { module: moduleName, name: symbolName, oid };

            if (definition.syntax !== undefined) {
                if (typeof definition.syntax !== 'string' || !isSnmpType(definition.syntax)) {
                    throw invalid(`symbol "${symbolName}" has an unknown syntax`);
                }
                symbol.syntax = definition.syntax;
            }
            if (typeof definition.access === 'string') {
                symbol.access = definition.access;
            }

            symbols.set(symbolName, symbol);
        }

        return { name: moduleName, imports, symbols };
    }
}
