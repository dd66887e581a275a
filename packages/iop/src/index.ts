// src/index.ts
// Main entry point for @vtpool/iop

export { parseIop, decodeIop, encodeIop, iopCodec } from './codec.js';
export { LAYOUTS, type Layout, type Field, type ValueSpec } from './layouts.js';
export { decodeVtString, encodeVtString, EncodingError } from './bytes.js';
