/**
 * 凭据记录相关类型定义
 */

/** 凭据记录 */
export interface CredentialRecord {
  /** 记录ID（创建时分配，不可变） */
  id: string;
  /** 服务名称 */
  serviceName: string;
  /** 用户名或邮箱 */
  username: string;
  /** 受保护的秘密值（密码、API 密钥等） */
  secret: string;
  /** 服务地址 */
  url: string | null;
  /** 备注 */
  notes: string | null;
  /** 标签列表（去重） */
  tags: string[];
  /** 创建时间 */
  createdAt: number;
  /** 更新时间 */
  updatedAt: number;
}

/** 新建凭据时提供的字段 */
export interface CredentialFields {
  serviceName: string;
  username: string;
  secret: string;
  url?: string | null;
  notes?: string | null;
  tags?: string[];
}

/** 更新凭据时提供的字段 */
export type CredentialUpdate = Partial<CredentialFields>;

/** 凭据搜索条件 */
export interface CredentialQuery {
  /** 关键字（不区分大小写） */
  query?: string;
  /** 标签（匹配任意一个） */
  tags?: string[];
}

/** 记录筛选谓词 */
export type CredentialPredicate = (record: Readonly<CredentialRecord>) => boolean;
