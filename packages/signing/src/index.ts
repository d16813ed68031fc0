export { isPresent, toSignableFields, type FieldValue, type RawFields, type SignableFields } from './fields.js';
export { cryptoRandomIndex, generateNonce, NONCE_ALPHABET, NONCE_LENGTH, type RandomIndexSource } from './nonce.js';
export { requireAnyParam, requireExactlyOneParam, requireParams } from './params.js';
export {
  canonicalString,
  createCanonicalSignature,
  createPushSignature,
  signFields,
  verifyCanonicalSignature,
  verifyPushSignature
} from './signature.js';
