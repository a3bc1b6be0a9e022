import { getLogger } from '@logtape/logtape';
import {
    CODE_CHANGED, DEFAULT_BLOCK_SIZE_EXPONENT, MAX_BLOCK_SIZE_EXPONENT, MessageType,
} from './constants';
import {
    BlockSequenceError, InvalidOperationError, ResourceChangedError, ValueOutOfRangeError,
} from './error';
import { Message, formatCode } from './message';
import { BlockDescriptor } from './option-value';

const logger = getLogger(['coap-blockwise', 'blockwise']);

export function blockSize(sizeExponent: number): number {
    if (!Number.isInteger(sizeExponent) || sizeExponent < 0 || sizeExponent > MAX_BLOCK_SIZE_EXPONENT) {
        throw new ValueOutOfRangeError(`Invalid block size exponent ${sizeExponent}`);
    }
    return 2 ** (sizeExponent + 4);
}

function blockOffset(desc: BlockDescriptor): number {
    return desc.blockNumber * blockSize(desc.sizeExponent);
}

/**
 * Cuts block `blockNumber` of size 2^(sizeExponent+4) out of the message
 * payload. The copy has its message ID cleared and carries Block1 when the
 * message is a request, Block2 otherwise. Returns undefined past the end.
 */
export function extractBlock(message: Message, blockNumber: number, sizeExponent: number): Message | undefined {
    if (!Number.isSafeInteger(blockNumber) || blockNumber < 0) {
        throw new ValueOutOfRangeError(`Invalid block number ${blockNumber}`);
    }
    const size = blockSize(sizeExponent);
    const start = blockNumber * size;
    if (start >= message.payload.length) {
        return undefined;
    }
    const end = Math.min(start + size, message.payload.length);
    const more = end < message.payload.length;

    const blk = message.clone();
    blk.payload = Buffer.from(message.payload.subarray(start, end));
    blk.messageId = undefined;

    const desc: BlockDescriptor = { blockNumber, more, sizeExponent };
    if (message.isRequest()) {
        blk.options.setBlock1(desc);
    } else {
        blk.options.setBlock2(desc);
    }

    logger.debug('extracted block {blockNumber} ({start}-{end} of {total}), more={more}', {
        blockNumber, start, end, total: message.payload.length, more,
    });
    return blk;
}

/**
 * Appends an incoming request block to the accumulated request in place.
 * The block must start exactly where the accumulated payload ends.
 */
export function appendRequestBlock(accumulator: Message, next: Message): Message {
    if (!accumulator.isRequest()) {
        throw new InvalidOperationError(`appendRequestBlock called on non-request ${formatCode(accumulator.code)}`);
    }
    const block1 = next.options.getBlock1();
    if (block1 === undefined) {
        throw new InvalidOperationError('Request block carries no Block1 option');
    }
    checkOffset(block1, accumulator.payload.length);

    accumulator.payload = Buffer.concat([accumulator.payload, next.payload]);
    accumulator.options.setBlock1(block1);
    accumulator.token = Buffer.from(next.token);
    accumulator.messageId = next.messageId;
    accumulator.responseType = undefined;

    logger.debug('appended request block {blockNumber}, {length} bytes accumulated', {
        blockNumber: block1.blockNumber, length: accumulator.payload.length,
    });
    return accumulator;
}

/**
 * Appends an incoming response block to the accumulated response in place.
 * Besides contiguity, the block's ETag must match the accumulated one.
 */
export function appendResponseBlock(accumulator: Message, next: Message): Message {
    if (!accumulator.isResponse()) {
        throw new InvalidOperationError(`appendResponseBlock called on non-response ${formatCode(accumulator.code)}`);
    }
    const block2 = next.options.getBlock2();
    if (block2 === undefined) {
        throw new InvalidOperationError('Response block carries no Block2 option');
    }
    checkOffset(block2, accumulator.payload.length);

    if (!sameETag(accumulator.options.getETag(), next.options.getETag())) {
        logger.warn('ETag changed at block {blockNumber}', { blockNumber: block2.blockNumber });
        throw new ResourceChangedError();
    }

    accumulator.payload = Buffer.concat([accumulator.payload, next.payload]);
    accumulator.options.setBlock2(block2);
    accumulator.token = Buffer.from(next.token);
    accumulator.messageId = next.messageId;

    logger.debug('appended response block {blockNumber}, {length} bytes accumulated', {
        blockNumber: block2.blockNumber, length: accumulator.payload.length,
    });
    return accumulator;
}

/**
 * Builds the request for the next Block2 block of `response`. A first block
 * larger than the default size is renegotiated down to the default.
 */
export function generateNextBlock2Request(
    request: Message,
    response: Message,
    defaultSizeExponent = DEFAULT_BLOCK_SIZE_EXPONENT,
): Message {
    const block2 = response.options.getBlock2();
    if (block2 === undefined) {
        throw new InvalidOperationError('Response carries no Block2 option');
    }

    const next = request.clone();
    next.payload = Buffer.alloc(0);
    next.messageId = undefined;

    let requested: BlockDescriptor;
    if (block2.blockNumber === 0 && block2.sizeExponent > defaultSizeExponent) {
        logger.debug('renegotiating Block2 size exponent {from} -> {to}', {
            from: block2.sizeExponent, to: defaultSizeExponent,
        });
        requested = {
            blockNumber: 2 ** (block2.sizeExponent - defaultSizeExponent),
            more: false,
            sizeExponent: defaultSizeExponent,
        };
    } else {
        requested = { blockNumber: block2.blockNumber + 1, more: false, sizeExponent: block2.sizeExponent };
    }
    next.options.setBlock2(requested);
    next.options.setBlock1(undefined);
    next.options.setObserve(undefined);

    logger.debug('next Block2 request: block {blockNumber}, size exponent {sizeExponent}', {
        blockNumber: requested.blockNumber, sizeExponent: requested.sizeExponent,
    });
    return next;
}

/**
 * Builds the 2.04 Changed reply to a received Block1 request block, asking
 * the client for the next block. A Confirmable block gets a piggybacked
 * Acknowledgement echoing its message ID; any other block gets a
 * NonConfirmable reply whose message ID is left to the transport.
 */
export function generateNextBlock1Response(
    received: Message,
    defaultSizeExponent = DEFAULT_BLOCK_SIZE_EXPONENT,
): Message {
    const block1 = received.options.getBlock1();
    if (block1 === undefined) {
        throw new InvalidOperationError('Request carries no Block1 option');
    }

    const confirmable = received.type === MessageType.Confirmable;
    const response = new Message({
        type: confirmable ? MessageType.Acknowledgement : MessageType.NonConfirmable,
        messageId: confirmable ? received.messageId : undefined,
        code: CODE_CHANGED,
        token: received.token,
    });
    response.remote = received.remote;

    let acked: BlockDescriptor;
    if (block1.blockNumber === 0 && block1.sizeExponent > defaultSizeExponent) {
        logger.debug('renegotiating Block1 size exponent {from} -> {to}', {
            from: block1.sizeExponent, to: defaultSizeExponent,
        });
        acked = { blockNumber: 0, more: true, sizeExponent: defaultSizeExponent };
    } else {
        acked = { blockNumber: block1.blockNumber, more: true, sizeExponent: block1.sizeExponent };
    }
    response.options.setBlock1(acked);

    logger.debug('next Block1 reply: block {blockNumber}, size exponent {sizeExponent}', {
        blockNumber: acked.blockNumber, sizeExponent: acked.sizeExponent,
    });
    return response;
}

function checkOffset(desc: BlockDescriptor, accumulated: number): void {
    const offset = blockOffset(desc);
    if (offset !== accumulated) {
        logger.warn('block {blockNumber} out of sequence: offset {offset}, accumulated {accumulated}', {
            blockNumber: desc.blockNumber, offset, accumulated,
        });
        throw new BlockSequenceError(accumulated, offset);
    }
}

function sameETag(a: Buffer | undefined, b: Buffer | undefined): boolean {
    if (a === undefined || b === undefined) {
        return a === b;
    }
    return a.equals(b);
}
