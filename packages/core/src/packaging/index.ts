export * from './python';
export * from './packager';
export * from './installer';
export * from './locator';
