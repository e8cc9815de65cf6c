export const name = '@cyforge/repo';

export * from './matcher';
export * from './fingerprint';
export * from './scanner';
