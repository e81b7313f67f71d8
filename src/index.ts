export { parse, tryParse } from './parse/index';
export { PduDecoder } from './Decoder';
export { PduError, isPduError } from './utils/errors';
export * as types from './types';

// the codecs the decoder is built from
export * as utils from './utils/export';
