// 导出所有类型
export * from './types';

// 导出错误类型
export * from './errors/vault-errors';

// 导出配置与日志
export * from './config/engine-config';
export { createLogger, setLogLevel, getLogLevel, redact } from './logging/logger';
export type { Logger } from './logging/logger';

// 导出加密模块
export * from './crypto';

// 导出保险库模块
export { VaultStore, UnlockedVault } from './vault/vault-store';
export type { VaultStoreOptions } from './vault/vault-store';
export { FORMAT_VERSION, HEADER_LENGTH, decodeContainer } from './vault/container-format';
export { buildSearchPredicate, sortCredentials } from './vault/credential-search';
export { parseCredentialFields, parseCredentialUpdate, normalizeTags } from './vault/record-schema';

// 导出认证模块
export { AuthSessionManager } from './auth/session-manager';
export type { AuthSessionManagerOptions, SessionEndReason } from './auth/session-manager';
export { LockoutTracker } from './auth/lockout-tracker';
export type { LockoutPolicy, LockoutCheck } from './auth/lockout-tracker';

// 导出共享模块
export { ShareTokenService, rejectionError } from './sharing/share-token-service';
export type {
  ShareTokenServiceOptions,
  IssueShareOptions,
  ShareRejection,
  RedeemOutcome,
} from './sharing/share-token-service';

// 导出审计模块
export * from './audit';

// 导出引擎
export { VaultEngine } from './engine/vault-engine';
export type { VaultEngineOptions, ImportResult, IntegrityReport } from './engine/vault-engine';
