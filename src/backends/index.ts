/**
 * @module backends
 * @description Signing backend implementations for the TacNet core.
 */

export { WebCryptoSigner, KeyDirectory } from "./webcrypto-signer.js";
export * from "./crypto-utils.js";
