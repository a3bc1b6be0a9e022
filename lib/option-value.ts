import {
    MAX_BLOCK_SIZE_EXPONENT,
    OPTION_ACCEPT, OPTION_BLOCK1, OPTION_BLOCK2, OPTION_CONTENT_FORMAT,
    OPTION_MAX_AGE, OPTION_OBSERVE, OPTION_SIZE2, OPTION_URI_PORT,
} from './constants';
import { MalformedMessageError, ValueOutOfRangeError } from './error';

export interface BlockDescriptor {
    blockNumber: number;
    more: boolean;
    sizeExponent: number;
}

export type OptionFormat = 'opaque' | 'uint' | 'block';

export type OptionValue =
    | { format: 'opaque'; value: Buffer }
    | { format: 'uint'; value: number }
    | { format: 'block'; value: BlockDescriptor };

// Options not listed here are opaque/string
const OPTION_FORMATS = new Map<number, OptionFormat>([
    [OPTION_OBSERVE, 'uint'],
    [OPTION_URI_PORT, 'uint'],
    [OPTION_CONTENT_FORMAT, 'uint'],
    [OPTION_MAX_AGE, 'uint'],
    [OPTION_ACCEPT, 'uint'],
    [OPTION_BLOCK2, 'block'],
    [OPTION_BLOCK1, 'block'],
    [OPTION_SIZE2, 'uint'],
]);

export function optionFormat(optNum: number): OptionFormat {
    return OPTION_FORMATS.get(optNum) ?? 'opaque';
}

export function opaque(value: Buffer | string): OptionValue {
    return { format: 'opaque', value: typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value) };
}

export function uint(value: number): OptionValue {
    return { format: 'uint', value };
}

export function block(value: BlockDescriptor): OptionValue {
    return { format: 'block', value: { ...value } };
}

export function packBlock(desc: BlockDescriptor): number {
    const { blockNumber, more, sizeExponent } = desc;
    if (!Number.isSafeInteger(blockNumber) || blockNumber < 0) {
        throw new ValueOutOfRangeError(`Invalid block number ${blockNumber}`);
    }
    if (!Number.isInteger(sizeExponent) || sizeExponent < 0 || sizeExponent > MAX_BLOCK_SIZE_EXPONENT) {
        throw new ValueOutOfRangeError(`Invalid block size exponent ${sizeExponent}`);
    }
    return blockNumber * 16 + (more ? 0x08 : 0) + sizeExponent;
}

export function unpackBlock(packed: number): BlockDescriptor {
    return {
        blockNumber: Math.floor(packed / 16),
        more: (packed & 0x08) !== 0,
        sizeExponent: packed & 0x07,
    };
}

/**
 * Canonical unsigned integer encoding: big-endian with leading zero bytes
 * stripped, so 0 encodes as an empty buffer.
 */
export function encodeUint(value: number): Buffer {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new ValueOutOfRangeError(`Invalid unsigned integer ${value}`);
    }
    const bytes: number[] = [];
    let rest = value;
    while (rest > 0) {
        bytes.unshift(rest % 256);
        rest = Math.floor(rest / 256);
    }
    return Buffer.from(bytes);
}

export function decodeUint(buf: Buffer): number {
    let value = 0;
    for (const byte of buf) {
        value = value * 256 + byte;
    }
    // Rounding is monotone, so any true value above 2^53-1 lands at 2^53 or higher
    if (!Number.isSafeInteger(value)) {
        throw new MalformedMessageError(`Unsigned option value 0x${buf.toString('hex')} exceeds ${Number.MAX_SAFE_INTEGER}`);
    }
    return value;
}

export function encodeOptionValue(opt: OptionValue): Buffer {
    switch (opt.format) {
        case 'opaque':
            return opt.value;
        case 'uint':
            return encodeUint(opt.value);
        case 'block':
            return encodeUint(packBlock(opt.value));
    }
}

export function decodeOptionValue(format: OptionFormat, buf: Buffer): OptionValue {
    switch (format) {
        case 'opaque':
            return { format, value: Buffer.from(buf) };
        case 'uint':
            return { format, value: decodeUint(buf) };
        case 'block':
            return { format, value: unpackBlock(decodeUint(buf)) };
    }
}

export function optionValueLength(opt: OptionValue): number {
    return encodeOptionValue(opt).length;
}

export function cloneOptionValue(opt: OptionValue): OptionValue {
    switch (opt.format) {
        case 'opaque':
            return { format: 'opaque', value: Buffer.from(opt.value) };
        case 'uint':
            return { format: 'uint', value: opt.value };
        case 'block':
            return { format: 'block', value: { ...opt.value } };
    }
}
