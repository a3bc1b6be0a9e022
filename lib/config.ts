import { z } from 'zod';
import {
    ACK_RANDOM_FACTOR, ACK_TIMEOUT, DEFAULT_BLOCK_SIZE_EXPONENT, DEFAULT_LEISURE,
    EMPTY_ACK_DELAY, MAX_BLOCK_SIZE_EXPONENT, MAX_LATENCY, MAX_RETRANSMIT, NSTART,
} from './constants';
import { InvalidConfigurationError } from './error';

const overridesSchema = z.object({
    ackTimeout: z.number().positive(),
    ackRandomFactor: z.number().min(1),
    maxRetransmit: z.number().int().nonnegative(),
    nstart: z.number().int().positive(),
    defaultLeisure: z.number().nonnegative(),
    maxLatency: z.number().positive(),
    emptyAckDelay: z.number().nonnegative(),
    defaultBlockSizeExponent: z.number().int().min(0).max(MAX_BLOCK_SIZE_EXPONENT),
}).strict().partial();

export type TransmissionOverrides = z.infer<typeof overridesSchema>;

/**
 * Timing values consumed by a transport layer, all in seconds.
 */
export interface TransmissionParameters {
    ackTimeout: number;
    ackRandomFactor: number;
    maxRetransmit: number;
    nstart: number;
    defaultLeisure: number;
    maxLatency: number;
    emptyAckDelay: number;
    defaultBlockSizeExponent: number;

    /** First transmission of a CON to its last retransmission */
    maxTransmitSpan: number;
    /** First transmission of a CON to giving up on an ACK or RST */
    maxTransmitWait: number;
    processingDelay: number;
    maxRtt: number;
    /** How long message-layer state for an exchange must be kept */
    exchangeLifetime: number;
    nonLifetime: number;
    requestTimeout: number;
}

export function transmissionParameters(overrides: unknown = {}): TransmissionParameters {
    const parsed = overridesSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new InvalidConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }

    const base = {
        ackTimeout: ACK_TIMEOUT,
        ackRandomFactor: ACK_RANDOM_FACTOR,
        maxRetransmit: MAX_RETRANSMIT,
        nstart: NSTART,
        defaultLeisure: DEFAULT_LEISURE,
        maxLatency: MAX_LATENCY,
        emptyAckDelay: EMPTY_ACK_DELAY,
        defaultBlockSizeExponent: DEFAULT_BLOCK_SIZE_EXPONENT,
        ...parsed.data,
    };

    const maxTransmitSpan = base.ackTimeout * (2 ** base.maxRetransmit - 1) * base.ackRandomFactor;
    const maxTransmitWait = base.ackTimeout * (2 ** (base.maxRetransmit + 1) - 1) * base.ackRandomFactor;
    const processingDelay = base.ackTimeout;
    const maxRtt = 2 * base.maxLatency + processingDelay;

    return {
        ...base,
        maxTransmitSpan,
        maxTransmitWait,
        processingDelay,
        maxRtt,
        exchangeLifetime: maxTransmitSpan + maxRtt,
        nonLifetime: maxTransmitSpan + base.maxLatency,
        requestTimeout: maxTransmitWait,
    };
}
