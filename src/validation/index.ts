export { ValidationErrorCodes, ValidationHelpers, FieldReader } from './validator'
export type { ValidationError, ValidationResult, ValidationErrorCode } from './validator'
export {
  DEFAULT_GENERATION_CONFIG,
  RECOMMENDED_DENSITY_RANGE,
  MAX_RECOMMENDED_ASPECT_RATIO,
  validateGenerationConfig,
  inspectGenerationConfig,
  invalidConfigError,
  parseGenerationConfig,
  toSceneRequest
} from './generation-config'
export type { GridGenerationConfig, ConfigInspection } from './generation-config'
