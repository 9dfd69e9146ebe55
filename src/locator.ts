import { LOCATOR } from './constants.js'
import { ArgumentError } from './errors.js'
import { EnvironmentLocator, LocatorKind } from './types.js'

function toLocatorKind(prefix: string): LocatorKind | undefined {
  switch (prefix) {
    case LOCATOR.LOCAL:
      return 'local'
    case LOCATOR.REMOTE:
      return 'remote'
    default:
      return undefined
  }
}

/**
 * Parses `local:<env>`, `remote:<env>` or a bare `<env>`.
 *
 * Only the first separator splits, so `local:a:b` names environment `a:b`.
 *
 * @throws ArgumentError `InvalidLocatorFormat` for an unknown prefix or an empty name
 */
export function parseLocator(raw: string): EnvironmentLocator {
  const trimmed = raw.trim()
  if (!trimmed) {
    throw new ArgumentError(
      'InvalidLocatorFormat',
      'environment locator must not be empty'
    )
  }

  const separator = trimmed.indexOf(LOCATOR.SEPARATOR)
  if (separator < 0) {
    return { name: trimmed }
  }

  const prefix = trimmed.slice(0, separator)
  const name = trimmed.slice(separator + 1)
  const kind = toLocatorKind(prefix)
  if (!kind) {
    throw new ArgumentError(
      'InvalidLocatorFormat',
      `invalid locator '${trimmed}': prefix must be '${LOCATOR.LOCAL}' or '${LOCATOR.REMOTE}'`
    )
  }
  if (!name) {
    throw new ArgumentError(
      'InvalidLocatorFormat',
      `invalid locator '${trimmed}': missing environment name`
    )
  }

  return { kind, name }
}

export function formatLocator(locator: EnvironmentLocator): string {
  return locator.kind
    ? `${locator.kind}${LOCATOR.SEPARATOR}${locator.name}`
    : locator.name
}
