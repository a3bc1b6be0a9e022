import {
    FIELD_EXT8, FIELD_EXT16, FIELD_EXT8_BASE, FIELD_EXT16_BASE, FIELD_LIMIT,
} from './constants';
import { MalformedMessageError, ValueOutOfRangeError } from './error';

export interface EncodedField {
    nibble: number;
    extension: Buffer;
}

export interface DecodedField {
    value: number;
    consumed: number;
}

/**
 * Encodes an option delta or option length as a 4-bit nibble plus
 * zero, one or two extension bytes.
 */
export function encodeField(value: number): EncodedField {
    if (!Number.isInteger(value) || value < 0) {
        throw new ValueOutOfRangeError(`Field value must be a non-negative integer, got ${value}`);
    }

    if (value < FIELD_EXT8_BASE) {
        return { nibble: value, extension: Buffer.alloc(0) };
    }
    if (value < FIELD_EXT16_BASE) {
        return { nibble: FIELD_EXT8, extension: Buffer.from([value - FIELD_EXT8_BASE]) };
    }
    if (value < FIELD_LIMIT) {
        const extension = Buffer.alloc(2);
        extension.writeUInt16BE(value - FIELD_EXT16_BASE, 0);
        return { nibble: FIELD_EXT16, extension };
    }
    throw new ValueOutOfRangeError(`Field value ${value} exceeds ${FIELD_LIMIT - 1}`);
}

/**
 * Decodes a nibble and its extension bytes starting at `offset`.
 * Nibble 15 is reserved for the payload marker and never valid here.
 */
export function decodeField(nibble: number, buf: Buffer, offset = 0): DecodedField {
    if (nibble < FIELD_EXT8) {
        return { value: nibble, consumed: 0 };
    }
    if (nibble === FIELD_EXT8) {
        if (offset >= buf.length) throw new MalformedMessageError('Extended field truncated');
        return { value: buf[offset] + FIELD_EXT8_BASE, consumed: 1 };
    }
    if (nibble === FIELD_EXT16) {
        if (offset + 2 > buf.length) throw new MalformedMessageError('Extended field truncated');
        return { value: buf.readUInt16BE(offset) + FIELD_EXT16_BASE, consumed: 2 };
    }
    throw new MalformedMessageError(`Invalid field nibble ${nibble}`);
}
