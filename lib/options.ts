import { getLogger } from '@logtape/logtape';
import {
    PAYLOAD_MARKER,
    OPTION_ACCEPT, OPTION_BLOCK1, OPTION_BLOCK2, OPTION_CONTENT_FORMAT, OPTION_ETAG,
    OPTION_LOCATION_PATH, OPTION_LOCATION_QUERY, OPTION_MAX_AGE, OPTION_OBSERVE,
    OPTION_SIZE1, OPTION_SIZE2, OPTION_URI_HOST, OPTION_URI_PATH, OPTION_URI_PORT, OPTION_URI_QUERY,
} from './constants';
import { InvalidOperationError, MalformedMessageError } from './error';
import { decodeField, encodeField } from './field';
import {
    BlockDescriptor, OptionValue,
    block, cloneOptionValue, decodeOptionValue, encodeOptionValue, opaque, optionFormat, uint,
} from './option-value';

const logger = getLogger(['coap-blockwise', 'options']);

/**
 * Ordered multi-map of option number to option values.
 *
 * Values for the same number keep insertion order; serialization always
 * visits numbers in ascending order so every emitted delta is non-negative.
 * Mutation goes through the typed setters, each of which clears the option
 * group before writing it.
 */
export class Options {
    private readonly entries = new Map<number, OptionValue[]>();

    /**
     * Decodes the option sequence from `buf` into this container and returns
     * the bytes following the payload marker (empty when there is none).
     */
    decode(buf: Buffer): Buffer {
        let offset = 0;
        let optNum = 0;

        while (offset < buf.length) {
            const byte = buf[offset];
            if (byte === PAYLOAD_MARKER) {
                return Buffer.from(buf.subarray(offset + 1));
            }
            offset++;

            const delta = decodeField(byte >> 4, buf, offset);
            offset += delta.consumed;
            const length = decodeField(byte & 0x0F, buf, offset);
            offset += length.consumed;

            if (offset + length.value > buf.length) {
                throw new MalformedMessageError(
                    `Option value truncated: declared ${length.value} bytes, ${buf.length - offset} remain`,
                );
            }

            optNum += delta.value;
            const value = decodeOptionValue(optionFormat(optNum), buf.subarray(offset, offset + length.value));
            logger.trace('decoded option {optNum} ({format}, {length} bytes)', {
                optNum, format: value.format, length: length.value,
            });
            this.append(optNum, value);
            offset += length.value;
        }

        return Buffer.alloc(0);
    }

    encode(): Buffer {
        const parts: Buffer[] = [];
        let prevOptNum = 0;

        for (const optNum of this.numbers()) {
            for (const opt of this.entries.get(optNum) ?? []) {
                const value = encodeOptionValue(opt);
                const delta = encodeField(optNum - prevOptNum);
                const length = encodeField(value.length);
                parts.push(Buffer.from([(delta.nibble << 4) | length.nibble]));
                parts.push(delta.extension, length.extension, value);
                prevOptNum = optNum;
            }
        }

        return Buffer.concat(parts);
    }

    /** Option numbers present, ascending. */
    numbers(): number[] {
        return [...this.entries.keys()].sort((a, b) => a - b);
    }

    has(optNum: number): boolean {
        return this.entries.has(optNum);
    }

    get(optNum: number): OptionValue[] {
        return (this.entries.get(optNum) ?? []).map(cloneOptionValue);
    }

    clone(): Options {
        const copy = new Options();
        for (const [optNum, values] of this.entries) {
            copy.entries.set(optNum, values.map(cloneOptionValue));
        }
        return copy;
    }

    getUriPath(): string[] {
        return this.getStrings(OPTION_URI_PATH);
    }

    setUriPath(segments: Iterable<string | Buffer>): void {
        this.setSegments(OPTION_URI_PATH, 'Uri-Path', segments);
    }

    getUriQuery(): string[] {
        return this.getStrings(OPTION_URI_QUERY);
    }

    setUriQuery(segments: Iterable<string | Buffer>): void {
        this.setSegments(OPTION_URI_QUERY, 'Uri-Query', segments);
    }

    getLocationPath(): string[] {
        return this.getStrings(OPTION_LOCATION_PATH);
    }

    setLocationPath(segments: Iterable<string | Buffer>): void {
        this.setSegments(OPTION_LOCATION_PATH, 'Location-Path', segments);
    }

    getLocationQuery(): string[] {
        return this.getStrings(OPTION_LOCATION_QUERY);
    }

    setLocationQuery(segments: Iterable<string | Buffer>): void {
        this.setSegments(OPTION_LOCATION_QUERY, 'Location-Query', segments);
    }

    getUriHost(): string | undefined {
        const opt = this.first(OPTION_URI_HOST);
        return opt?.format === 'opaque' ? opt.value.toString('utf8') : undefined;
    }

    setUriHost(host: string | undefined): void {
        this.setSingle(OPTION_URI_HOST, host === undefined ? undefined : opaque(host));
    }

    getUriPort(): number | undefined {
        return this.getUint(OPTION_URI_PORT);
    }

    setUriPort(port: number | undefined): void {
        this.setSingle(OPTION_URI_PORT, port === undefined ? undefined : uint(port));
    }

    getBlock1(): BlockDescriptor | undefined {
        return this.getBlock(OPTION_BLOCK1);
    }

    setBlock1(desc: BlockDescriptor | undefined): void {
        this.setSingle(OPTION_BLOCK1, desc === undefined ? undefined : block(desc));
    }

    getBlock2(): BlockDescriptor | undefined {
        return this.getBlock(OPTION_BLOCK2);
    }

    setBlock2(desc: BlockDescriptor | undefined): void {
        this.setSingle(OPTION_BLOCK2, desc === undefined ? undefined : block(desc));
    }

    getContentFormat(): number | undefined {
        return this.getUint(OPTION_CONTENT_FORMAT);
    }

    setContentFormat(contentFormat: number | undefined): void {
        this.setSingle(OPTION_CONTENT_FORMAT, contentFormat === undefined ? undefined : uint(contentFormat));
    }

    /** Single ETag, as carried by a response. */
    getETag(): Buffer | undefined {
        const opt = this.first(OPTION_ETAG);
        return opt?.format === 'opaque' ? Buffer.from(opt.value) : undefined;
    }

    setETag(etag: Buffer | undefined): void {
        this.setSingle(OPTION_ETAG, etag === undefined ? undefined : opaque(etag));
    }

    /** All ETags, as carried by a request. */
    getETags(): Buffer[] {
        return this.get(OPTION_ETAG).flatMap(opt => opt.format === 'opaque' ? [opt.value] : []);
    }

    setETags(etags: Iterable<Buffer>): void {
        this.entries.delete(OPTION_ETAG);
        for (const etag of etags) {
            this.append(OPTION_ETAG, opaque(etag));
        }
    }

    getObserve(): number | undefined {
        return this.getUint(OPTION_OBSERVE);
    }

    setObserve(observe: number | undefined): void {
        this.setSingle(OPTION_OBSERVE, observe === undefined ? undefined : uint(observe));
    }

    getAccept(): number | undefined {
        return this.getUint(OPTION_ACCEPT);
    }

    setAccept(accept: number | undefined): void {
        this.setSingle(OPTION_ACCEPT, accept === undefined ? undefined : uint(accept));
    }

    getMaxAge(): number | undefined {
        return this.getUint(OPTION_MAX_AGE);
    }

    setMaxAge(maxAge: number | undefined): void {
        this.setSingle(OPTION_MAX_AGE, maxAge === undefined ? undefined : uint(maxAge));
    }

    getSize2(): number | undefined {
        return this.getUint(OPTION_SIZE2);
    }

    setSize2(size: number | undefined): void {
        this.setSingle(OPTION_SIZE2, size === undefined ? undefined : uint(size));
    }

    /** Registered opaque, so the raw bytes are returned as sent. */
    getSize1(): Buffer | undefined {
        const opt = this.first(OPTION_SIZE1);
        return opt?.format === 'opaque' ? Buffer.from(opt.value) : undefined;
    }

    setSize1(size: Buffer | undefined): void {
        this.setSingle(OPTION_SIZE1, size === undefined ? undefined : opaque(size));
    }

    private append(optNum: number, value: OptionValue): void {
        const values = this.entries.get(optNum);
        if (values) {
            values.push(value);
        } else {
            this.entries.set(optNum, [value]);
        }
    }

    private first(optNum: number): OptionValue | undefined {
        return this.entries.get(optNum)?.[0];
    }

    private setSingle(optNum: number, value: OptionValue | undefined): void {
        this.entries.delete(optNum);
        if (value !== undefined) {
            this.append(optNum, value);
        }
    }

    private getUint(optNum: number): number | undefined {
        const opt = this.first(optNum);
        return opt?.format === 'uint' ? opt.value : undefined;
    }

    private getBlock(optNum: number): BlockDescriptor | undefined {
        const opt = this.first(optNum);
        return opt?.format === 'block' ? { ...opt.value } : undefined;
    }

    private getStrings(optNum: number): string[] {
        return (this.entries.get(optNum) ?? [])
            .flatMap(opt => opt.format === 'opaque' ? [opt.value.toString('utf8')] : []);
    }

    private setSegments(optNum: number, name: string, segments: Iterable<string | Buffer>): void {
        // A bare string is iterable too and would be split per character
        if (typeof segments === 'string' || Buffer.isBuffer(segments)) {
            throw new InvalidOperationError(`${name} must be passed as a list of segments`);
        }
        this.entries.delete(optNum);
        for (const segment of segments) {
            this.append(optNum, opaque(segment));
        }
    }
}
