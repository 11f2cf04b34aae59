export { normalizeAddress, deriveAddress, isAddressLiteral } from './address.js';
export { parseU64, parseUnsigned } from './uint.js';
export type { UnsignedIntegerType } from './uint.js';
