import { MibLookupService } from '../features/MibStore';
import { ValueFormatError } from '../core/SnmpError';
import { ObjectIdentifier, OidSegment } from '../types';
import { parseSegment } from '../utils/Helpers';

/**
 * An OID expression split into its parts, before any MIB lookup.
 *
 * - `symbolic`: `MODULE::symbol.1.2` or `symbol.1.2` (module '' = any MIB).
 * - `path`: `.1.3.6.1.2.1.1.1.0` or a mixed form like `.iso.org.6.internet.2.1.1.1.0`.
 */
export type ParsedOid =
    | { kind: 'symbolic'; module: string; symbol: string; suffix: OidSegment[] }
    | { kind: 'path'; segments: OidSegment[] };

function splitSegments(body: string, expression: string): string[] {
    const segments = body.split('.');
    if (segments.some(segment => segment === '')) {
        throw new ValueFormatError('OID', expression, 'empty component');
    }
    return segments;
}

function parseSymbolic(module: string, rest: string, expression: string): ParsedOid {
    const [symbol, ...suffix] = splitSegments(rest, expression);
    return { kind: 'symbolic', module, symbol, suffix: suffix.map(parseSegment) };
}

/**
 * Splits an OID expression without touching the MIBs.
 *
 * The notation is picked in this order: `::` means module-qualified, a leading
 * dot means a numeric (or mixed) path, anything else is a bare symbol.
 *
 * @throws ValueFormatError for empty expressions or empty components (`..`).
 */
export function parseOid(expression: string): ParsedOid {
    const text = expression.trim();
    if (text === '') {
        throw new ValueFormatError('OID', expression, 'empty expression');
    }

    const separator = text.indexOf('::');
    if (separator !== -1) {
        return parseSymbolic(text.slice(0, separator), text.slice(separator + 2), expression);
    }

    if (text.startsWith('.')) {
        return { kind: 'path', segments: splitSegments(text.slice(1), expression).map(parseSegment) };
    }

    return parseSymbolic('', text, expression);
}

/**
 * OidResolver
 * * Turns user-facing OID expressions into canonical numeric OIDs.
 * * Names are looked up through the injected `MibLookupService`, so the MIBs
 * they refer to must be loadable from its search path. Bare names try the
 * loaded modules first and load the rest of the search path on a miss.
 */
export class OidResolver {

    constructor(private readonly mibs: MibLookupService) {}

    /**
     * @example
     * await resolver.resolve('SNMPv2-MIB::sysDescr.0');  // { arcs: [1,3,6,1,2,1,1,1,0], label: {...} }
     * await resolver.resolve('.1.3.6.1.2.1.1.1.0');      // { arcs: [1,3,6,1,2,1,1,1,0] }
     *
     * @throws UnknownSymbolError when no MIB on the search path defines a name.
     */
    public async resolve(expression: string): Promise<ObjectIdentifier> {
        const parsed = parseOid(expression);

        if (parsed.kind === 'symbolic') {
            const base = await this.mibs.resolve(parsed.module, parsed.symbol);
            return {
                arcs: await this.extend([...base.oid], parsed.suffix),
                label: { module: base.module, symbol: base.name },
            };
        }

        const [first, ...rest] = parsed.segments;
        const start = typeof first === 'number'
            ? [first]
            : [...(await this.mibs.resolve('', first)).oid];

        return { arcs: await this.extend(start, rest) };
    }

    /**
     * Appends numbers verbatim; names must be direct children of the OID so far.
     */
    private async extend(arcs: number[], segments: OidSegment[]): Promise<number[]> {
        let current = arcs;
        for (const segment of segments) {
            if (typeof segment === 'number') {
                current.push(segment);
            } else {
                current = [...(await this.mibs.resolveChild(current, segment)).oid];
            }
        }
        return current;
    }
}
