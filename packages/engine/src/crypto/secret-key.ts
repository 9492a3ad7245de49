/**
 * 内存中的密钥缓冲区
 * 持有派生密钥的原始字节，dispose() 时立即清零，不依赖垃圾回收时机
 */

import { wipe } from './utils';

export class SecretKey {
  private readonly material: Uint8Array;
  private disposed = false;

  constructor(material: Uint8Array) {
    this.material = material;
  }

  /** 密钥长度（字节） */
  get length(): number {
    return this.material.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * 返回原始字节（同一缓冲区，不复制）
   * @throws Error 密钥已销毁
   */
  bytes(): Uint8Array {
    if (this.disposed) {
      throw new Error('SecretKey used after dispose');
    }
    return this.material;
  }

  /** 清零并标记为已销毁，可重复调用 */
  dispose(): void {
    if (this.disposed) return;
    wipe(this.material);
    this.disposed = true;
  }
}

/**
 * 在回调结束后（无论成功与否）销毁密钥
 */
export async function withSecretKey<T>(
  key: SecretKey,
  fn: (key: SecretKey) => Promise<T>
): Promise<T> {
  try {
    return await fn(key);
  } finally {
    key.dispose();
  }
}
