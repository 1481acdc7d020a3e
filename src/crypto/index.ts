/**
 * Crypto module - primitives, authenticated tokens, armor and key identity
 */

export {
  BLOCK_SIZE,
  IV_LENGTH,
  PBKDF2_ITERATIONS,
  RSA_PUBLIC_EXPONENT,
  SYMMETRIC_KEY_LENGTH,
  PaddingError,
  type RsaKeyPair,
  aesCbcDecrypt,
  aesCbcEncrypt,
  generateIv,
  generateRsaKeyPair,
  generateSymmetricKey,
  pbkdf2Sha256,
  pkcs7Pad,
  pkcs7Unpad,
  rsaOaepUnwrap,
  rsaOaepWrap,
  zeroizeKey
} from './primitives.js';
export { TOKEN_KEY_LENGTH, TokenError, decryptToken, encryptToken } from './token.js';
export { type ArmorBlock, type ArmorType, createArmor, parseArmor } from './armor.js';
export { computeFingerprint, keyIdFromFingerprint, normalizeFingerprint } from './fingerprint.js';
export {
  classifyPrivateKeyPayload,
  loadPrivateKey,
  recoverPrivateKeyPem,
  unwrapPrivateKey,
  wrapPrivateKey
} from './key-wrap.js';
