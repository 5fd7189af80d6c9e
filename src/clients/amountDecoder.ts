/**
 * Every numeric representation observed for on-chain amounts, tagged.
 */
export type RawAmount =
    | { kind: 'bigint'; value: bigint }
    | { kind: 'integer'; value: number }
    | { kind: 'decimal'; value: string }
    | { kind: 'hex'; value: string }
    | { kind: 'balance'; rao: RawAmount };

const DECIMAL_PATTERN = /^\d+$/;
const HEX_PATTERN = /^0x[0-9a-fA-F]+$/;

export class AmountDecodeError extends Error {
    public readonly name = 'AmountDecodeError';
}

/**
 * Tags a value coming out of the chain client. Returns null for shapes that
 * are not amounts at all.
 */
export function classifyAmount(input: unknown): RawAmount | null {
    switch (typeof input) {
        case 'bigint':
            return { kind: 'bigint', value: input };
        case 'number':
            return Number.isSafeInteger(input) ? { kind: 'integer', value: input } : null;
        case 'string': {
            const trimmed = input.trim().replace(/,/g, '');
            if (DECIMAL_PATTERN.test(trimmed)) {
                return { kind: 'decimal', value: trimmed };
            }
            if (HEX_PATTERN.test(trimmed)) {
                return { kind: 'hex', value: trimmed };
            }
            return null;
        }
        case 'object': {
            if (input === null || !('rao' in input)) {
                return null;
            }
            const rao = classifyAmount(input.rao);
            return rao ? { kind: 'balance', rao } : null;
        }
        default:
            return null;
    }
}

function describe(input: unknown): string {
    try {
        return JSON.stringify(input) ?? String(input);
    } catch {
        return String(input);
    }
}

export function decodeAmount(raw: RawAmount): bigint {
    switch (raw.kind) {
        case 'bigint':
            return raw.value;
        case 'integer':
            return BigInt(raw.value);
        case 'decimal':
        case 'hex':
            return BigInt(raw.value);
        case 'balance':
            return decodeAmount(raw.rao);
        default: {
            const unreachable: never = raw;
            throw new AmountDecodeError(`Unsupported amount representation: ${describe(unreachable)}`);
        }
    }
}

/**
 * Converts any supported representation into smallest units, rejecting the rest.
 */
export function toAmount(input: unknown): bigint {
    const raw = classifyAmount(input);
    if (!raw) {
        throw new AmountDecodeError(`Value is not an amount: ${describe(input)}`);
    }
    return decodeAmount(raw);
}

export function isAmount(input: unknown): boolean {
    return classifyAmount(input) !== null;
}
