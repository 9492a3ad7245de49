export * from './crypto';
export * from './credential';
export * from './vault';
export * from './session';
export * from './share';
export * from './audit';
