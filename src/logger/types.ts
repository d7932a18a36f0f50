// 日志类型与结构化条目
// 设计原则：控制台由 LOG_LEVEL 过滤（默认 info），cron 输出保持简短

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "feed"     // Pinboard 拉取与解析
  | "publish"  // WordPress 发布
  | "store"    // 已发布记录读写
  | "gateway"  // 对账主循环
  | "config"   // 配置加载
  | "cli";     // 命令行入口

/** payload 常用字段约定（非强制） */
export interface LogPayloadConvention {
  /** 错误对象 message，避免序列化整个 Error */
  err?: string;
  /** 条目去重键 */
  item_id?: string;
  /** WordPress 文章 ID */
  post_id?: number;
  [k: string]: unknown;
}

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  payload?: Record<string, unknown>;
  created_at: string;
}
