// Validation framework for untyped configuration input

import type { Vector3 } from '../utils/vec3'

export interface ValidationError {
  code: string
  message: string
  field?: string
  severity: 'error' | 'warning'
}

export interface ValidationResult {
  isValid: boolean
  errors: ValidationError[]
  warnings: ValidationError[]
  summary: string
}

// Validation error codes
export const ValidationErrorCodes = {
  // Shape
  INVALID_INPUT: 'INVALID_INPUT',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  INVALID_FIELD_TYPE: 'INVALID_FIELD_TYPE',
  INVALID_FIELD_VALUE: 'INVALID_FIELD_VALUE',

  // Enumerations
  UNKNOWN_LAYOUT_KIND: 'UNKNOWN_LAYOUT_KIND',
  UNKNOWN_PROJECTION_MODE: 'UNKNOWN_PROJECTION_MODE',

  // Advisory
  DENSITY_OUTSIDE_RECOMMENDED_RANGE: 'DENSITY_OUTSIDE_RECOMMENDED_RANGE',
  EXTREME_ASPECT_RATIO: 'EXTREME_ASPECT_RATIO'
} as const

export type ValidationErrorCode = typeof ValidationErrorCodes[keyof typeof ValidationErrorCodes]

// Helper functions for common validations
export class ValidationHelpers {
  static createError(code: ValidationErrorCode, message: string, field?: string): ValidationError {
    return {
      code,
      message,
      field,
      severity: 'error'
    }
  }

  static createWarning(code: ValidationErrorCode, message: string, field?: string): ValidationError {
    return {
      code,
      message,
      field,
      severity: 'warning'
    }
  }

  static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
  }

  static isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value)
  }

  static isVector3(value: unknown): value is Vector3 {
    return Array.isArray(value) && value.length === 3 && value.every(v => ValidationHelpers.isFiniteNumber(v))
  }

  static createResult(errors: ValidationError[], warnings: ValidationError[]): ValidationResult {
    return {
      isValid: errors.length === 0,
      errors,
      warnings,
      summary: this.createSummary(errors, warnings)
    }
  }

  static createSummary(errors: ValidationError[], warnings: ValidationError[]): string {
    if (errors.length === 0 && warnings.length === 0) {
      return 'Configuration validation passed'
    }

    const parts: string[] = []
    if (errors.length > 0) {
      parts.push(`${errors.length} error${errors.length === 1 ? '' : 's'}`)
    }
    if (warnings.length > 0) {
      parts.push(`${warnings.length} warning${warnings.length === 1 ? '' : 's'}`)
    }

    return errors.length > 0
      ? `Configuration validation failed: ${parts.join(', ')}`
      : `Configuration validation passed with ${parts.join(', ')}`
  }
}

/**
 * Reads typed fields out of an untyped record, collecting an error for every
 * missing or mistyped field. Accessors return a placeholder after recording
 * an error, so one pass reports every problem.
 */
export class FieldReader {
  readonly errors: ValidationError[] = []

  constructor(private readonly record: Record<string, unknown>, private readonly prefix: string = '') {}

  private path(field: string): string {
    return this.prefix ? `${this.prefix}.${field}` : field
  }

  has(field: string): boolean {
    return this.record[field] !== undefined
  }

  number(field: string): number {
    const value = this.record[field]
    if (value === undefined) {
      this.missing(field)
      return NaN
    }
    if (!ValidationHelpers.isFiniteNumber(value)) {
      this.errors.push(ValidationHelpers.createError(
        ValidationErrorCodes.INVALID_FIELD_TYPE,
        `Field '${this.path(field)}' must be a finite number`,
        this.path(field)
      ))
      return NaN
    }
    return value
  }

  optionalNumber(field: string): number | undefined {
    return this.has(field) ? this.number(field) : undefined
  }

  vector(field: string): Vector3 {
    const value = this.record[field]
    if (value === undefined) {
      this.missing(field)
      return [NaN, NaN, NaN]
    }
    if (!ValidationHelpers.isVector3(value)) {
      this.errors.push(ValidationHelpers.createError(
        ValidationErrorCodes.INVALID_FIELD_TYPE,
        `Field '${this.path(field)}' must be an array of 3 finite numbers`,
        this.path(field)
      ))
      return [NaN, NaN, NaN]
    }
    return [value[0], value[1], value[2]]
  }

  optionalVector(field: string): Vector3 | undefined {
    return this.has(field) ? this.vector(field) : undefined
  }

  optionalBoolean(field: string): boolean | undefined {
    const value = this.record[field]
    if (value === undefined) {
      return undefined
    }
    if (typeof value !== 'boolean') {
      this.errors.push(ValidationHelpers.createError(
        ValidationErrorCodes.INVALID_FIELD_TYPE,
        `Field '${this.path(field)}' must be a boolean`,
        this.path(field)
      ))
      return undefined
    }
    return value
  }

  /**
   * A string from a closed set. Returns null when it is missing or unknown.
   */
  oneOf<T extends string>(
    field: string,
    allowed: readonly T[],
    unknownCode: ValidationErrorCode
  ): T | null {
    const value = this.record[field]
    if (value === undefined) {
      this.missing(field)
      return null
    }
    const match = allowed.find(option => option === value)
    if (match === undefined) {
      this.errors.push(ValidationHelpers.createError(
        unknownCode,
        `Field '${this.path(field)}' must be one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`,
        this.path(field)
      ))
      return null
    }
    return match
  }

  /**
   * A nested object, or undefined when absent. Records an error when present
   * but not an object.
   */
  optionalRecord(field: string): Record<string, unknown> | undefined {
    const value = this.record[field]
    if (value === undefined) {
      return undefined
    }
    if (!ValidationHelpers.isRecord(value)) {
      this.errors.push(ValidationHelpers.createError(
        ValidationErrorCodes.INVALID_FIELD_TYPE,
        `Field '${this.path(field)}' must be an object`,
        this.path(field)
      ))
      return undefined
    }
    return value
  }

  nested(field: string, record: Record<string, unknown>): FieldReader {
    return new FieldReader(record, this.path(field))
  }

  /**
   * Record a range error unless the value passes. NaN placeholders were
   * already reported when read and are skipped.
   */
  check(value: number, valid: (value: number) => boolean, field: string, message: string): void {
    if (Number.isNaN(value)) {
      return
    }
    if (!valid(value)) {
      this.reject(field, message)
    }
  }

  reject(field: string, message: string): void {
    this.errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_VALUE,
      `Field '${this.path(field)}' ${message}`,
      this.path(field)
    ))
  }

  private missing(field: string): void {
    this.errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.MISSING_REQUIRED_FIELD,
      `Required field '${this.path(field)}' is missing`,
      this.path(field)
    ))
  }
}
