export type ArgumentErrorCode =
  | 'InvalidLocatorFormat'
  | 'MissingOrInvalidPrefix'
  | 'PrefixNotAllowedForSingleArgument'
  | 'TooManyArguments'
  | 'UnsupportedFlagCombination'
  | 'MissingEnvironment'
  | 'InvalidDiffStrategy'
  | 'InvalidExtEntry'

export type ExpansionErrorCode =
  | 'AppNotFound'
  | 'InvalidAppConfig'
  | 'EnvironmentNotFound'
  | 'ComponentNotFound'
  | 'DuplicateComponent'
  | 'TemplateEvaluationError'
  | 'InvalidObject'

export type ConnectionErrorCode = 'ClientConfigError' | 'ConnectionError'

export type DiffErrorCode =
  | ArgumentErrorCode
  | ExpansionErrorCode
  | ConnectionErrorCode

export const USAGE = `Usage: environments: <env> | <local|remote>:<env1> <local|remote>:<env2>

  dev                               local rendering of 'dev' against its cluster
  local:us-west/dev remote:us-west/prod
  remote:us-west/dev remote:us-west/prod
  local:dev local:prod`

/**
 * Base class for every failure that aborts a diff before it is reported.
 */
export abstract class DiffError extends Error {
  abstract readonly code: DiffErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Invalid invocation. Raised before any file or network access.
 */
export class ArgumentError extends DiffError {
  constructor(
    readonly code: ArgumentErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}\n\n${USAGE}`, options)
  }
}

/**
 * The app could not be expanded into objects.
 */
export class ExpansionError extends DiffError {
  constructor(
    readonly code: ExpansionErrorCode,
    message: string,
    /** Evaluator output, when the evaluator produced one */
    readonly diagnostic?: string,
    options?: { cause?: unknown }
  ) {
    super(diagnostic ? `${message}:\n${diagnostic}` : message, options)
  }
}

/**
 * The cluster configuration is unusable or the server is unreachable.
 */
export class ClusterError extends DiffError {
  constructor(
    readonly code: ConnectionErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/**
 * Renders an unknown thrown value for log output.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
