export * from './utils';
export * from './secret-key';
export * from './key-derivation';
export * from './cipher-codec';
export * from './passphrase-hash';
export * from './passphrase-policy';
export * from './password-generator';
