// CLI 主流程：加载配置 → 生成规则过滤器 → 执行管道

import { parseArgs } from "node:util";
import { resolveSettingsPath } from "../config/paths.js";
import { loadSettings } from "../config/settings.js";
import { buildFilters } from "../filter/rules.js";
import { createPipelineEvaluator } from "../pipeline/evaluator.js";
import type { PipelineEvaluatorOptions } from "../pipeline/types.js";
import { logger } from "../logger/index.js";


const USAGE = "用法: feedmerge [配置文件路径]";


/** 返回进程退出码；不直接调用 process.exit，便于测试 */
export async function run(argv: string[], options: PipelineEvaluatorOptions = {}): Promise<number> {
  let configArg: string | undefined;
  try {
    const { positionals, values } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: { help: { type: "boolean", short: "h" } },
    });
    if (values.help) {
      console.log(USAGE);
      return 0;
    }
    configArg = positionals[0];
  } catch (err) {
    logger.error("cli", err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  try {
    const { settings, rules } = await loadSettings(resolveSettingsPath(configArg));
    const evaluator = createPipelineEvaluator(options);
    await evaluator.execute(buildFilters(rules, options.now), settings);
    return 0;
  } catch (err) {
    logger.error("cli", "运行失败", {
      name: err instanceof Error ? err.name : undefined,
      err: err instanceof Error ? err.message : String(err),
    });
    return 1;
  }
}
