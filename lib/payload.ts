import { decodeFirstSync, encode as cborEncode } from 'cbor';
import { MEDIA_CBOR } from './constants';
import { InvalidOperationError, MalformedMessageError } from './error';
import { Message } from './message';

export function setCborPayload(message: Message, value: unknown): void {
    message.payload = Buffer.from(cborEncode(value));
    message.options.setContentFormat(MEDIA_CBOR);
}

export function getCborPayload(message: Message): unknown {
    const contentFormat = message.options.getContentFormat();
    if (contentFormat !== MEDIA_CBOR) {
        throw new InvalidOperationError(`Payload is not application/cbor (Content-Format ${contentFormat ?? 'unset'})`);
    }
    try {
        const value: unknown = decodeFirstSync(message.payload);
        return value;
    } catch (err) {
        throw new MalformedMessageError('Invalid CBOR payload', { cause: err });
    }
}
