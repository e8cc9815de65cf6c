export * from './types';
export { hashContent, hashFile } from './hasher';
export { FingerprintStore, FINGERPRINT_FILENAME, type FingerprintStoreOptions } from './store';
