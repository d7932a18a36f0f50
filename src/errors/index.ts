// 网关错误：cli 捕获后决定退出码；DuplicateItemError 只是信息，不算失败


export class FeedUnavailableError extends Error {
  constructor(message = "信源不可用", options?: ErrorOptions) {
    super(message, options);
    this.name = "FeedUnavailableError";
  }
}


export class PublishFailedError extends Error {
  readonly itemId: string;
  /** WordPress 返回的 HTTP 状态码，网络错误时为空 */
  readonly status?: number;
  readonly responseBody?: string;

  constructor(itemId: string, message = "发布失败", extra: { status?: number; responseBody?: string; cause?: unknown } = {}) {
    super(message, { cause: extra.cause });
    this.name = "PublishFailedError";
    this.itemId = itemId;
    this.status = extra.status;
    this.responseBody = extra.responseBody;
  }
}


export class DuplicateItemError extends Error {
  readonly itemId: string;

  constructor(itemId: string) {
    super(`条目已存在: ${itemId}`);
    this.name = "DuplicateItemError";
    this.itemId = itemId;
  }
}


export class StoreUnavailableError extends Error {
  constructor(message = "存储不可用", options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}


export class AuthFailedError extends Error {
  constructor(message = "WordPress 认证失败") {
    super(message);
    this.name = "AuthFailedError";
  }
}


export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`配置无效: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}


/** 把任意抛出值转成日志里用的 message */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
