export * from './ByteCursor';
export * from './DCS';
export * from './Gsm7';
export * from './Helper';
export * from './SemiOctet';
export * from './Ucs2';
export { parseTypeOfAddress, type TypeOfAddress } from './Address/AddressType';
export { parseAddress, default as parseSCA } from '../parse/parseUtils/parseSCA';
export { default as parseSCTS, toIsoString } from '../parse/parseUtils/parseSCTS';
export { default as parseVP, relativeValiditySeconds } from '../parse/parseUtils/parseVP';
export { default as parseData, parseHeader } from '../parse/parseUtils/parseData';
