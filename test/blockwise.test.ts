import { expect, describe, it } from '@jest/globals';
import {
  appendRequestBlock, appendResponseBlock, blockSize, extractBlock,
  generateNextBlock1Response, generateNextBlock2Request,
} from '../lib/blockwise';
import { Message } from '../lib/message';
import { CODE_CHANGED, CODE_CONTENT, CODE_GET, CODE_POST, MessageType } from '../lib/constants';
import {
  BlockSequenceError, InvalidOperationError, ResourceChangedError, ValueOutOfRangeError,
} from '../lib/error';

function payloadOf(length: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => i % 256));
}

function requestBlock(blockNumber: number, more: boolean, sizeExponent: number, length: number, messageId: number): Message {
  const msg = new Message({
    type: MessageType.Confirmable,
    messageId,
    code: CODE_POST,
    token: Buffer.from([messageId]),
    payload: Buffer.alloc(length, blockNumber),
  });
  msg.options.setBlock1({ blockNumber, more, sizeExponent });
  return msg;
}

function responseBlock(blockNumber: number, more: boolean, length: number, etag: Buffer | undefined): Message {
  const msg = new Message({
    type: MessageType.Acknowledgement,
    messageId: 100 + blockNumber,
    code: CODE_CONTENT,
    payload: Buffer.alloc(length, blockNumber),
  });
  msg.options.setBlock2({ blockNumber, more, sizeExponent: 0 });
  msg.options.setETag(etag);
  return msg;
}

describe('blockSize', () => {
  it('should map exponents 0..7 to 16..2048 bytes', () => {
    expect(blockSize(0)).toBe(16);
    expect(blockSize(2)).toBe(64);
    expect(blockSize(7)).toBe(2048);
    expect(() => blockSize(8)).toThrow(ValueOutOfRangeError);
  });
});

describe('extractBlock', () => {
  const request = new Message({ type: MessageType.Confirmable, messageId: 9, code: CODE_POST, payload: payloadOf(84) });
  request.options.setUriPath(['upload']);

  it('should split 84 bytes into five full 16-byte blocks and a 4-byte tail', () => {
    for (let n = 0; n < 5; n++) {
      const blk = extractBlock(request, n, 0);
      expect(blk?.payload).toEqual(payloadOf(84).subarray(n * 16, n * 16 + 16));
      expect(blk?.options.getBlock1()).toEqual({ blockNumber: n, more: true, sizeExponent: 0 });
    }

    const last = extractBlock(request, 5, 0);
    expect(last?.payload).toEqual(payloadOf(84).subarray(80));
    expect(last?.options.getBlock1()).toEqual({ blockNumber: 5, more: false, sizeExponent: 0 });
  });

  it('should return undefined past the end of the payload', () => {
    expect(extractBlock(request, 6, 0)).toBeUndefined();
  });

  it('should clear the message ID and keep the other options', () => {
    const blk = extractBlock(request, 0, 2);
    expect(blk?.messageId).toBeUndefined();
    expect(blk?.options.getUriPath()).toEqual(['upload']);
    expect(blk?.options.getBlock2()).toBeUndefined();
    expect(blk?.options.getBlock1()).toEqual({ blockNumber: 0, more: true, sizeExponent: 2 });
    expect(request.messageId).toBe(9);
    expect(request.payload.length).toBe(84);
  });

  it('should use Block2 for responses', () => {
    const response = new Message({ type: MessageType.Acknowledgement, messageId: 1, code: CODE_CONTENT, payload: payloadOf(64) });
    const blk = extractBlock(response, 0, 2);
    expect(blk?.options.getBlock2()).toEqual({ blockNumber: 0, more: false, sizeExponent: 2 });
    expect(blk?.options.getBlock1()).toBeUndefined();
  });
});

describe('appendRequestBlock', () => {
  it('should reassemble blocks received in order', () => {
    const accumulator = requestBlock(0, true, 0, 16, 1);
    accumulator.responseType = MessageType.Acknowledgement;

    appendRequestBlock(accumulator, requestBlock(1, true, 0, 16, 2));
    const result = appendRequestBlock(accumulator, requestBlock(2, false, 0, 8, 3));

    expect(result).toBe(accumulator);
    expect(accumulator.payload.length).toBe(40);
    expect(accumulator.payload.subarray(32)).toEqual(Buffer.alloc(8, 2));
    expect(accumulator.options.getBlock1()).toEqual({ blockNumber: 2, more: false, sizeExponent: 0 });
    expect(accumulator.messageId).toBe(3);
    expect(accumulator.token).toEqual(Buffer.from([3]));
    expect(accumulator.responseType).toBeUndefined();
  });

  it('should reject a gap', () => {
    const accumulator = requestBlock(0, true, 0, 16, 1);
    const err = (() => {
      try {
        appendRequestBlock(accumulator, requestBlock(2, false, 0, 8, 3));
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(BlockSequenceError);
    expect(err).toMatchObject({ expectedOffset: 16, actualOffset: 32 });
    expect(accumulator.payload.length).toBe(16);
  });

  it('should reject a duplicate block', () => {
    const accumulator = requestBlock(0, true, 0, 16, 1);
    expect(() => appendRequestBlock(accumulator, requestBlock(0, true, 0, 16, 2))).toThrow(BlockSequenceError);
  });

  it('should only accept a request accumulator', () => {
    const accumulator = responseBlock(0, true, 16, undefined);
    expect(() => appendRequestBlock(accumulator, requestBlock(1, true, 0, 16, 2))).toThrow(InvalidOperationError);
  });
});

describe('appendResponseBlock', () => {
  const etag = Buffer.from([0xE1]);

  it('should reassemble blocks with a stable ETag', () => {
    const accumulator = responseBlock(0, true, 16, etag);
    appendResponseBlock(accumulator, responseBlock(1, false, 5, etag));

    expect(accumulator.payload.length).toBe(21);
    expect(accumulator.options.getBlock2()).toEqual({ blockNumber: 1, more: false, sizeExponent: 0 });
    expect(accumulator.messageId).toBe(101);
  });

  it('should fail with ResourceChanged on an ETag mismatch', () => {
    const accumulator = responseBlock(0, true, 16, etag);
    expect(() => appendResponseBlock(accumulator, responseBlock(1, false, 5, Buffer.from([0xE2]))))
      .toThrow(ResourceChangedError);
    expect(() => appendResponseBlock(accumulator, responseBlock(1, false, 5, undefined)))
      .toThrow(ResourceChangedError);
    expect(accumulator.payload.length).toBe(16);
  });

  it('should check contiguity before the ETag', () => {
    const accumulator = responseBlock(0, true, 16, etag);
    expect(() => appendResponseBlock(accumulator, responseBlock(2, false, 5, Buffer.from([0xE2]))))
      .toThrow(BlockSequenceError);
  });

  it('should only accept a response accumulator', () => {
    const accumulator = requestBlock(0, true, 0, 16, 1);
    expect(() => appendResponseBlock(accumulator, responseBlock(1, false, 5, etag))).toThrow(InvalidOperationError);
  });
});

describe('generateNextBlock2Request', () => {
  function originalRequest(): Message {
    const req = new Message({ type: MessageType.Confirmable, messageId: 7, code: CODE_GET, token: Buffer.from([0x42]), payload: Buffer.from('q') });
    req.options.setUriPath(['big']);
    req.options.setObserve(0);
    req.options.setBlock1({ blockNumber: 0, more: false, sizeExponent: 2 });
    return req;
  }

  function responseWith(blockNumber: number, sizeExponent: number): Message {
    const res = new Message({ type: MessageType.Acknowledgement, messageId: 7, code: CODE_CONTENT });
    res.options.setBlock2({ blockNumber, more: true, sizeExponent });
    return res;
  }

  it('should negotiate a larger first block down to the default size', () => {
    const next = generateNextBlock2Request(originalRequest(), responseWith(0, 6));
    expect(next.options.getBlock2()).toEqual({ blockNumber: 16, more: false, sizeExponent: 2 });
  });

  it('should negotiate down to a caller-supplied default', () => {
    const next = generateNextBlock2Request(originalRequest(), responseWith(0, 6), 4);
    expect(next.options.getBlock2()).toEqual({ blockNumber: 4, more: false, sizeExponent: 4 });
  });

  it('should ask for the following block at the same size', () => {
    expect(generateNextBlock2Request(originalRequest(), responseWith(3, 2)).options.getBlock2())
      .toEqual({ blockNumber: 4, more: false, sizeExponent: 2 });
    expect(generateNextBlock2Request(originalRequest(), responseWith(0, 2)).options.getBlock2())
      .toEqual({ blockNumber: 1, more: false, sizeExponent: 2 });
    expect(generateNextBlock2Request(originalRequest(), responseWith(2, 6)).options.getBlock2())
      .toEqual({ blockNumber: 3, more: false, sizeExponent: 6 });
  });

  it('should drop payload, message ID, Block1 and Observe', () => {
    const original = originalRequest();
    const next = generateNextBlock2Request(original, responseWith(1, 2));

    expect(next.payload.length).toBe(0);
    expect(next.messageId).toBeUndefined();
    expect(next.options.getBlock1()).toBeUndefined();
    expect(next.options.getObserve()).toBeUndefined();
    expect(next.options.getUriPath()).toEqual(['big']);
    expect(next.token).toEqual(Buffer.from([0x42]));
    expect(original.options.getObserve()).toBe(0);
  });

  it('should require a Block2 option on the response', () => {
    const res = new Message({ type: MessageType.Acknowledgement, messageId: 7, code: CODE_CONTENT });
    expect(() => generateNextBlock2Request(originalRequest(), res)).toThrow(InvalidOperationError);
  });
});

describe('generateNextBlock1Response', () => {
  it('should acknowledge with 2.04 Changed and echo the block size', () => {
    const received = requestBlock(3, true, 2, 64, 0x21);
    received.remote = { address: '198.51.100.4', port: 61616 };

    const ack = generateNextBlock1Response(received);
    expect(ack.code).toBe(CODE_CHANGED);
    expect(ack.type).toBe(MessageType.Acknowledgement);
    expect(ack.messageId).toBe(0x21);
    expect(ack.token).toEqual(Buffer.from([0x21]));
    expect(ack.remote).toBe(received.remote);
    expect(ack.payload.length).toBe(0);
    expect(ack.options.getBlock1()).toEqual({ blockNumber: 3, more: true, sizeExponent: 2 });
  });

  it('should negotiate a larger first block down to the default size', () => {
    const ack = generateNextBlock1Response(requestBlock(0, true, 6, 1024, 1));
    expect(ack.options.getBlock1()).toEqual({ blockNumber: 0, more: true, sizeExponent: 2 });
  });

  it('should reply to a NonConfirmable block with a NonConfirmable message and no message ID', () => {
    const received = requestBlock(1, true, 2, 64, 0x33);
    received.type = MessageType.NonConfirmable;

    const reply = generateNextBlock1Response(received);
    expect(reply.type).toBe(MessageType.NonConfirmable);
    expect(reply.messageId).toBeUndefined();
    expect(reply.code).toBe(CODE_CHANGED);
    expect(reply.token).toEqual(Buffer.from([0x33]));
    expect(reply.options.getBlock1()).toEqual({ blockNumber: 1, more: true, sizeExponent: 2 });
  });

  it('should require a Block1 option on the request', () => {
    const received = new Message({ type: MessageType.Confirmable, messageId: 1, code: CODE_POST });
    expect(() => generateNextBlock1Response(received)).toThrow(InvalidOperationError);
  });
});

describe('blockwise transfer over the wire', () => {
  it('should rebuild a request split into 64-byte blocks', () => {
    const original = new Message({ type: MessageType.Confirmable, messageId: 1, code: CODE_POST, payload: payloadOf(150) });
    original.options.setUriPath(['firmware']);

    const received: Message[] = [];
    for (let n = 0; ; n++) {
      const blk = extractBlock(original, n, 2);
      if (!blk) break;
      blk.messageId = 0x100 + n;
      received.push(Message.decode(blk.encode()));
    }
    expect(received.map(m => m.payload.length)).toEqual([64, 64, 22]);

    const [first, ...rest] = received;
    const accumulator = first.clone();
    for (const blk of rest) {
      appendRequestBlock(accumulator, blk);
    }

    expect(accumulator.payload).toEqual(original.payload);
    expect(accumulator.options.getUriPath()).toEqual(['firmware']);
    expect(accumulator.options.getBlock1()).toEqual({ blockNumber: 2, more: false, sizeExponent: 2 });
    expect(accumulator.messageId).toBe(0x102);
  });
});
