// IANA-assigned CoAP port
export const COAP_PORT = 5683;

// Message types
export enum MessageType {
    Confirmable = 0,
    NonConfirmable = 1,
    Acknowledgement = 2,
    Reset = 3,
}

export const PROTOCOL_VERSION = 1;
export const MAX_TOKEN_LENGTH = 8;

// Payload marker
export const PAYLOAD_MARKER = 0xFF;

// Transmission parameters (seconds unless noted)
export const ACK_TIMEOUT = 2.0;
export const ACK_RANDOM_FACTOR = 1.5;
export const MAX_RETRANSMIT = 4;
export const NSTART = 1;
export const DEFAULT_LEISURE = 5.0;
export const MAX_LATENCY = 100.0;
export const EMPTY_ACK_DELAY = 0.1;

// Block size 64
export const DEFAULT_BLOCK_SIZE_EXPONENT = 2;
export const MAX_BLOCK_SIZE_EXPONENT = 7;

// Option delta/length nibble thresholds
export const FIELD_EXT8 = 13;
export const FIELD_EXT16 = 14;
export const FIELD_EXT8_BASE = 13;
export const FIELD_EXT16_BASE = 269;
export const FIELD_LIMIT = 65804;

// Codes
export const CODE_EMPTY = 0;

export const CODE_GET = 1;
export const CODE_POST = 2;
export const CODE_PUT = 3;
export const CODE_DELETE = 4;

export const CODE_CREATED = 65;
export const CODE_DELETED = 66;
export const CODE_VALID = 67;
export const CODE_CHANGED = 68;
export const CODE_CONTENT = 69;
export const CODE_CONTINUE = 95;
export const CODE_BAD_REQUEST = 128;
export const CODE_UNAUTHORIZED = 129;
export const CODE_BAD_OPTION = 130;
export const CODE_FORBIDDEN = 131;
export const CODE_NOT_FOUND = 132;
export const CODE_METHOD_NOT_ALLOWED = 133;
export const CODE_NOT_ACCEPTABLE = 134;
export const CODE_REQUEST_ENTITY_INCOMPLETE = 136;
export const CODE_PRECONDITION_FAILED = 140;
export const CODE_REQUEST_ENTITY_TOO_LARGE = 141;
export const CODE_UNSUPPORTED_MEDIA_TYPE = 143;
export const CODE_INTERNAL_SERVER_ERROR = 160;
export const CODE_NOT_IMPLEMENTED = 161;
export const CODE_BAD_GATEWAY = 162;
export const CODE_SERVICE_UNAVAILABLE = 163;
export const CODE_GATEWAY_TIMEOUT = 164;
export const CODE_PROXYING_NOT_SUPPORTED = 165;

export const REQUEST_NAMES: ReadonlyMap<number, string> = new Map([
    [CODE_GET, 'GET'],
    [CODE_POST, 'POST'],
    [CODE_PUT, 'PUT'],
    [CODE_DELETE, 'DELETE'],
]);

export const RESPONSE_NAMES: ReadonlyMap<number, string> = new Map([
    [CODE_CREATED, '2.01 Created'],
    [CODE_DELETED, '2.02 Deleted'],
    [CODE_VALID, '2.03 Valid'],
    [CODE_CHANGED, '2.04 Changed'],
    [CODE_CONTENT, '2.05 Content'],
    [CODE_CONTINUE, '2.31 Continue'],
    [CODE_BAD_REQUEST, '4.00 Bad Request'],
    [CODE_UNAUTHORIZED, '4.01 Unauthorized'],
    [CODE_BAD_OPTION, '4.02 Bad Option'],
    [CODE_FORBIDDEN, '4.03 Forbidden'],
    [CODE_NOT_FOUND, '4.04 Not Found'],
    [CODE_METHOD_NOT_ALLOWED, '4.05 Method Not Allowed'],
    [CODE_NOT_ACCEPTABLE, '4.06 Not Acceptable'],
    [CODE_REQUEST_ENTITY_INCOMPLETE, '4.08 Request Entity Incomplete'],
    [CODE_PRECONDITION_FAILED, '4.12 Precondition Failed'],
    [CODE_REQUEST_ENTITY_TOO_LARGE, '4.13 Request Entity Too Large'],
    [CODE_UNSUPPORTED_MEDIA_TYPE, '4.15 Unsupported Media Type'],
    [CODE_INTERNAL_SERVER_ERROR, '5.00 Internal Server Error'],
    [CODE_NOT_IMPLEMENTED, '5.01 Not Implemented'],
    [CODE_BAD_GATEWAY, '5.02 Bad Gateway'],
    [CODE_SERVICE_UNAVAILABLE, '5.03 Service Unavailable'],
    [CODE_GATEWAY_TIMEOUT, '5.04 Gateway Timeout'],
    [CODE_PROXYING_NOT_SUPPORTED, '5.05 Proxying Not Supported'],
]);

// CoAP option numbers
export const OPTION_IF_MATCH = 1;
export const OPTION_URI_HOST = 3;
export const OPTION_ETAG = 4;
export const OPTION_IF_NONE_MATCH = 5;
export const OPTION_OBSERVE = 6;
export const OPTION_URI_PORT = 7;
export const OPTION_LOCATION_PATH = 8;
export const OPTION_URI_PATH = 11;
export const OPTION_CONTENT_FORMAT = 12;
export const OPTION_MAX_AGE = 14;
export const OPTION_URI_QUERY = 15;
export const OPTION_ACCEPT = 17;
export const OPTION_LOCATION_QUERY = 20;
export const OPTION_BLOCK2 = 23;
export const OPTION_BLOCK1 = 27;
export const OPTION_SIZE2 = 28;
export const OPTION_PROXY_URI = 35;
export const OPTION_PROXY_SCHEME = 39;
export const OPTION_SIZE1 = 60;

export const OPTION_NAMES: ReadonlyMap<number, string> = new Map([
    [OPTION_IF_MATCH, 'If-Match'],
    [OPTION_URI_HOST, 'Uri-Host'],
    [OPTION_ETAG, 'ETag'],
    [OPTION_IF_NONE_MATCH, 'If-None-Match'],
    [OPTION_OBSERVE, 'Observe'],
    [OPTION_URI_PORT, 'Uri-Port'],
    [OPTION_LOCATION_PATH, 'Location-Path'],
    [OPTION_URI_PATH, 'Uri-Path'],
    [OPTION_CONTENT_FORMAT, 'Content-Format'],
    [OPTION_MAX_AGE, 'Max-Age'],
    [OPTION_URI_QUERY, 'Uri-Query'],
    [OPTION_ACCEPT, 'Accept'],
    [OPTION_LOCATION_QUERY, 'Location-Query'],
    [OPTION_BLOCK2, 'Block2'],
    [OPTION_BLOCK1, 'Block1'],
    [OPTION_SIZE2, 'Size2'],
    [OPTION_PROXY_URI, 'Proxy-Uri'],
    [OPTION_PROXY_SCHEME, 'Proxy-Scheme'],
    [OPTION_SIZE1, 'Size1'],
]);

// Content-Format / Accept media types
export const MEDIA_TEXT_PLAIN = 0;
export const MEDIA_LINK_FORMAT = 40;
export const MEDIA_XML = 41;
export const MEDIA_OCTET_STREAM = 42;
export const MEDIA_EXI = 47;
export const MEDIA_JSON = 50;
export const MEDIA_CBOR = 60;

export const MEDIA_TYPES: ReadonlyMap<number, string> = new Map([
    [MEDIA_TEXT_PLAIN, 'text/plain'],
    [MEDIA_LINK_FORMAT, 'application/link-format'],
    [MEDIA_XML, 'application/xml'],
    [MEDIA_OCTET_STREAM, 'application/octet-stream'],
    [MEDIA_EXI, 'application/exi'],
    [MEDIA_JSON, 'application/json'],
    [MEDIA_CBOR, 'application/cbor'],
]);
