export {
  ConfigValidationError,
  loadPipelineConfig,
  loadPipelineConfigWithOverrides,
  resolveConfigEnvironment,
} from "./loader";
export {
  IndicatorConfigSchema,
  type IndicatorConfig,
  type IndicatorConfigInput,
  type IndicatorName,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  TimeframeSchema,
  validatePipelineConfig,
  type ValidationResult,
} from "./schema";
