// Pipeline：编排入口与错误类型

export { createPipelineEvaluator } from "./evaluator.js";
export { SourceFetchError, FilterExecutionError, OutputWriteError, SettingsError } from "./errors.js";
export type { PipelineEvaluator, PipelineEvaluatorOptions, PipelineSettings, OutputTarget } from "./types.js";
