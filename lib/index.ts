export * from './constants';
export * from './error';
export { encodeField, decodeField, EncodedField, DecodedField } from './field';
export {
    BlockDescriptor, OptionFormat, OptionValue,
    optionFormat, encodeOptionValue, decodeOptionValue, optionValueLength,
    encodeUint, decodeUint, packBlock, unpackBlock,
} from './option-value';
export { Options } from './options';
export {
    Message, MessageInit, RemoteEndpoint,
    isRequest, isResponse, isSuccessful, formatCode, codeName, uriPathAsString,
} from './message';
export {
    blockSize, extractBlock, appendRequestBlock, appendResponseBlock,
    generateNextBlock2Request, generateNextBlock1Response,
} from './blockwise';
export { transmissionParameters, TransmissionParameters, TransmissionOverrides } from './config';
export { setCborPayload, getCborPayload } from './payload';
