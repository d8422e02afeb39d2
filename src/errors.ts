// Typed failures surfaced by the geometry core and the generation service

export type PerspectiveGridErrorKind =
  | 'InvalidCameraConfig'
  | 'DegenerateBasis'
  | 'InvalidLayoutDimensions'
  | 'InvalidDensity'
  | 'SingularMatrix'
  | 'InvalidCanvasSize'
  | 'InvalidConfig'

export class PerspectiveGridError extends Error {
  readonly kind: PerspectiveGridErrorKind
  readonly parameter?: string
  readonly value?: unknown

  constructor(kind: PerspectiveGridErrorKind, message: string, parameter?: string, value?: unknown) {
    super(parameter ? `${kind} (${parameter}): ${message}` : `${kind}: ${message}`)
    this.name = 'PerspectiveGridError'
    this.kind = kind
    this.parameter = parameter
    this.value = value
  }
}

export function isPerspectiveGridError(
  error: unknown,
  kind?: PerspectiveGridErrorKind
): error is PerspectiveGridError {
  if (!(error instanceof PerspectiveGridError)) {
    return false
  }
  return kind === undefined || error.kind === kind
}
