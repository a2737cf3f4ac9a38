// 路径配置：集中管理运行时路径

import { join } from "node:path";


/** 用户数据根目录：.feedmerge/（不纳入版本管理） */
export const USER_DIR = join(process.cwd(), ".feedmerge");


/** 默认管道配置文件：.feedmerge/pipeline.json */
export const DEFAULT_SETTINGS_PATH = join(USER_DIR, "pipeline.json");


/** 配置文件路径：显式参数 > FEEDMERGE_CONFIG > 默认路径 */
export function resolveSettingsPath(explicit?: string): string {
  return explicit ?? process.env.FEEDMERGE_CONFIG ?? DEFAULT_SETTINGS_PATH;
}
