import { getLogger } from '@logtape/logtape';
import {
    CODE_EMPTY, MAX_TOKEN_LENGTH, MessageType, PAYLOAD_MARKER, PROTOCOL_VERSION,
    REQUEST_NAMES, RESPONSE_NAMES,
} from './constants';
import {
    FatalVersionError, IncompleteMessageError, MalformedMessageError, ValueOutOfRangeError,
} from './error';
import { Options } from './options';

const logger = getLogger(['coap-blockwise', 'message']);

/**
 * Peer address as reported by the transport. The codec only carries it
 * from a decoded request to the messages generated in reply.
 */
export interface RemoteEndpoint {
    address: string;
    port: number;
    family?: string;
}

export interface MessageInit {
    type?: MessageType;
    messageId?: number;
    code?: number;
    token?: Buffer;
    payload?: Buffer;
}

export function isRequest(code: number): boolean {
    return code >= 1 && code < 32;
}

export function isResponse(code: number): boolean {
    return code >= 64 && code < 192;
}

export function isSuccessful(code: number): boolean {
    return code >= 64 && code < 96;
}

/** `69` → `"2.05"` */
export function formatCode(code: number): string {
    const detail = code & 0x1F;
    return `${code >> 5}.${detail < 10 ? '0' : ''}${detail}`;
}

export function codeName(code: number): string | undefined {
    return REQUEST_NAMES.get(code) ?? RESPONSE_NAMES.get(code);
}

export function uriPathAsString(segments: readonly string[]): string {
    return '/' + segments.join('/');
}

export class Message {
    readonly version = PROTOCOL_VERSION;
    type: MessageType | undefined;
    messageId: number | undefined;
    code: number;
    token: Buffer;
    payload: Buffer;
    options: Options;

    // Transport-owned state, not part of the wire format
    remote: RemoteEndpoint | undefined;
    responseType: MessageType | undefined;

    constructor(init: MessageInit = {}) {
        this.type = init.type;
        this.messageId = init.messageId;
        this.code = init.code ?? CODE_EMPTY;
        this.token = init.token ? Buffer.from(init.token) : Buffer.alloc(0);
        this.payload = init.payload ? Buffer.from(init.payload) : Buffer.alloc(0);
        this.options = new Options();
    }

    static decode(buf: Buffer, remote?: RemoteEndpoint): Message {
        if (buf.length < 4) {
            throw new MalformedMessageError('CoAP message too short');
        }

        const byte0 = buf[0];
        const version = (byte0 >> 6) & 0x03;
        if (version !== PROTOCOL_VERSION) {
            throw new FatalVersionError(version);
        }
        const type: MessageType = (byte0 >> 4) & 0x03;
        const tokenLength = byte0 & 0x0F;

        if (tokenLength > MAX_TOKEN_LENGTH) {
            throw new MalformedMessageError(`Invalid token length ${tokenLength}`);
        }
        if (buf.length < 4 + tokenLength) {
            throw new MalformedMessageError('CoAP message truncated at token');
        }

        const msg = new Message({
            type,
            code: buf[1],
            messageId: buf.readUInt16BE(2),
            token: buf.subarray(4, 4 + tokenLength),
        });
        msg.payload = msg.options.decode(buf.subarray(4 + tokenLength));
        msg.remote = remote;

        logger.debug('decoded {type} {code} mid={messageId} payload={length}', {
            type: MessageType[type], code: formatCode(msg.code), messageId: msg.messageId, length: msg.payload.length,
        });
        return msg;
    }

    encode(): Buffer {
        if (this.type === undefined || this.messageId === undefined) {
            throw new IncompleteMessageError();
        }
        if (this.token.length > MAX_TOKEN_LENGTH) {
            throw new ValueOutOfRangeError(`Token length ${this.token.length} exceeds ${MAX_TOKEN_LENGTH}`);
        }
        if (!Number.isInteger(this.messageId) || this.messageId < 0 || this.messageId > 0xFFFF) {
            throw new ValueOutOfRangeError(`Invalid message ID ${this.messageId}`);
        }
        if (!Number.isInteger(this.code) || this.code < 0 || this.code > 0xFF) {
            throw new ValueOutOfRangeError(`Invalid code ${this.code}`);
        }

        const header = Buffer.alloc(4);
        header[0] = (this.version << 6) | ((this.type & 0x03) << 4) | this.token.length;
        header[1] = this.code;
        header.writeUInt16BE(this.messageId, 2);

        const parts = [header, this.token, this.options.encode()];
        if (this.payload.length > 0) {
            parts.push(Buffer.from([PAYLOAD_MARKER]), this.payload);
        }

        logger.debug('encoded {type} {code} mid={messageId} payload={length}', {
            type: MessageType[this.type], code: formatCode(this.code), messageId: this.messageId, length: this.payload.length,
        });
        return Buffer.concat(parts);
    }

    isRequest(): boolean {
        return isRequest(this.code);
    }

    isResponse(): boolean {
        return isResponse(this.code);
    }

    isSuccessful(): boolean {
        return isSuccessful(this.code);
    }

    clone(): Message {
        const copy = new Message({
            type: this.type,
            messageId: this.messageId,
            code: this.code,
            token: this.token,
            payload: this.payload,
        });
        copy.options = this.options.clone();
        copy.remote = this.remote ? { ...this.remote } : undefined;
        copy.responseType = this.responseType;
        return copy;
    }
}
