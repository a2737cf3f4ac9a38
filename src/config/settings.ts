// 管道配置加载：读取 JSON 配置文件并用 zod 校验，相对的 output 路径按配置文件所在目录解析

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { filterRuleSchema } from "../filter/rules.js";
import type { FilterRule } from "../filter/rules.js";
import type { PipelineSettings } from "../pipeline/types.js";
import { SettingsError } from "../pipeline/errors.js";
import { logger } from "../logger/index.js";


const httpUrl = z.string().url().refine((u) => /^https?:\/\//i.test(u), { message: "仅支持 http/https URL" });


export const settingsFileSchema = z.object({
  inputs: z.array(httpUrl).optional(),
  output: z.string().min(1).optional(),
  title: z.string(),
  description: z.string().default(""),
  link: z.string().url().optional(),
  filters: z.array(filterRuleSchema).default([]),
});


export type SettingsFile = z.infer<typeof settingsFileSchema>;


export interface LoadedSettings {
  settings: PipelineSettings;
  rules: FilterRule[];
}


/** 校验已解析的 JSON；baseDir 用于解析相对 output */
export function parseSettings(raw: unknown, path: string, baseDir: string = dirname(path)): LoadedSettings {
  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new SettingsError(path, issues);
  }
  const file = result.data;
  return {
    settings: {
      inputs: file.inputs,
      output: file.output != null ? resolve(baseDir, file.output) : undefined,
      title: file.title,
      description: file.description,
      link: file.link,
    },
    rules: file.filters,
  };
}


export async function loadSettings(path: string): Promise<LoadedSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new SettingsError(path, [`无法读取: ${err instanceof Error ? err.message : String(err)}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SettingsError(path, [`不是合法 JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const loaded = parseSettings(raw, path);
  logger.info("config", "配置已加载", {
    path,
    inputs: loaded.settings.inputs?.length ?? 0,
    filters: loaded.rules.length,
    output: typeof loaded.settings.output === "string" ? loaded.settings.output : undefined,
  });
  return loaded;
}
