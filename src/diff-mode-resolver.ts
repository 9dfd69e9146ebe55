import * as core from '@actions/core'
import { DIFF, LOCATOR } from './constants.js'
import { ArgumentError, DiffError } from './errors.js'
import { formatLocator, parseLocator } from './locator.js'
import {
  ClusterConnector,
  DiffCommand,
  DiffStrategy,
  EnvironmentLocator,
  LocalEnvironment,
  LocatorKind,
  ManifestSource,
  RemoteEnvironment
} from './types.js'

/**
 * Everything the resolver reads from the invocation.
 */
export interface DiffOptions {
  /** One or two raw locators */
  environments: string[]
  /** Component filter; empty means every component */
  components: string[]
  diffStrategy: string
}

export interface DiffServices {
  manifests: ManifestSource
  clusters: ClusterConnector
}

type QualifiedLocator = EnvironmentLocator & { kind: LocatorKind }

function parseDiffStrategy(value: string): DiffStrategy {
  switch (value) {
    case 'all':
    case 'subset':
      return value
    default:
      throw new ArgumentError(
        'InvalidDiffStrategy',
        `diff strategy must be one of ${DIFF.STRATEGIES.join(', ')}, got '${value}'`
      )
  }
}

function parseQualified(raw: string): QualifiedLocator {
  const invalid = (cause?: unknown): ArgumentError =>
    new ArgumentError(
      'MissingOrInvalidPrefix',
      `<env> must be prefaced by ${LOCATOR.LOCAL}: or ${LOCATOR.REMOTE}:, ex: ${LOCATOR.REMOTE}:us-west/prod (got '${raw}')`,
      { cause }
    )

  let locator: EnvironmentLocator
  try {
    locator = parseLocator(raw)
  } catch (error) {
    if (error instanceof DiffError && error.code === 'InvalidLocatorFormat') {
      throw invalid(error)
    }
    throw error
  }

  const { kind, name } = locator
  if (!kind) {
    throw invalid()
  }
  return { kind, name }
}

async function expandLocal(
  name: string,
  components: string[],
  services: DiffServices
): Promise<LocalEnvironment> {
  return { name, objects: await services.manifests.expand(name, components) }
}

async function connectRemote(
  local: LocalEnvironment,
  name: string,
  services: DiffServices
): Promise<RemoteEnvironment> {
  return {
    name,
    client: await services.clusters.connect(name),
    objects: local.objects
  }
}

/**
 * The comparison the locators ask for, before anything is expanded or
 * connected.
 */
export type DiffPlan =
  | {
      mode: 'single-environment'
      strategy: DiffStrategy
      environment: string
      components: string[]
    }
  | {
      mode: 'two-local' | 'two-remote'
      strategy: DiffStrategy
      first: string
      second: string
    }
  | {
      mode: 'local-versus-remote'
      strategy: DiffStrategy
      local: string
      remote: string
    }

function planSingle(
  raw: string,
  components: string[],
  strategy: DiffStrategy
): DiffPlan {
  const locator = parseLocator(raw)
  if (locator.kind) {
    throw new ArgumentError(
      'PrefixNotAllowedForSingleArgument',
      `single <env> argument with prefix '${LOCATOR.LOCAL}:' or '${LOCATOR.REMOTE}:' not allowed (got '${formatLocator(locator)}')`
    )
  }
  return {
    mode: 'single-environment',
    strategy,
    environment: locator.name,
    components
  }
}

function planPair(
  first: QualifiedLocator,
  second: QualifiedLocator,
  strategy: DiffStrategy
): DiffPlan {
  if (first.kind === second.kind) {
    return {
      mode: first.kind === 'local' ? 'two-local' : 'two-remote',
      strategy,
      first: first.name,
      second: second.name
    }
  }

  const [local, remote] =
    first.kind === 'local' ? [first, second] : [second, first]
  return {
    mode: 'local-versus-remote',
    strategy,
    local: local.name,
    remote: remote.name
  }
}

/**
 * Validates the invocation and decides which comparison it asks for.
 * Performs no I/O.
 *
 * One bare locator diffs an environment's rendering against its own cluster.
 * Two prefixed locators select two-local, two-remote or local-versus-remote;
 * the `local:` locator always supplies the manifests and the `remote:` one
 * the cluster, whatever their order.
 *
 * @throws ArgumentError
 */
export function planDiff(options: DiffOptions): DiffPlan {
  const { environments, components } = options

  if (environments.length === 0) {
    throw new ArgumentError(
      'MissingEnvironment',
      "'diff' requires at least one argument, that is the name of the environment"
    )
  }
  if (environments.length > 2) {
    throw new ArgumentError(
      'TooManyArguments',
      "'diff' takes at most two arguments, that are the name of the environments"
    )
  }
  const strategy = parseDiffStrategy(options.diffStrategy)

  if (environments.length === 1) {
    return planSingle(environments[0], components, strategy)
  }

  const first = parseQualified(environments[0])
  const second = parseQualified(environments[1])
  if (components.length > 0) {
    throw new ArgumentError(
      'UnsupportedFlagCombination',
      'a component filter is not supported when diffing two environments'
    )
  }
  return planPair(first, second, strategy)
}

/**
 * Expands and connects everything a plan needs, one step after another:
 * expansions first, then connections. The first failure aborts the rest.
 */
export async function populateDiff(
  plan: DiffPlan,
  services: DiffServices
): Promise<DiffCommand> {
  switch (plan.mode) {
    case 'single-environment': {
      const local = await expandLocal(
        plan.environment,
        plan.components,
        services
      )
      const remote = await connectRemote(local, plan.environment, services)
      return {
        mode: 'single-environment',
        strategy: plan.strategy,
        environment: plan.environment,
        local,
        remote
      }
    }
    case 'two-local': {
      const a = await expandLocal(plan.first, [], services)
      const b = await expandLocal(plan.second, [], services)
      return { mode: 'two-local', strategy: plan.strategy, a, b }
    }
    case 'two-remote': {
      const expandedA = await expandLocal(plan.first, [], services)
      const expandedB = await expandLocal(plan.second, [], services)
      const a = await connectRemote(expandedA, plan.first, services)
      const b = await connectRemote(expandedB, plan.second, services)
      return { mode: 'two-remote', strategy: plan.strategy, a, b }
    }
    case 'local-versus-remote': {
      const local = await expandLocal(plan.local, [], services)
      const remote = await connectRemote(local, plan.remote, services)
      return {
        mode: 'local-versus-remote',
        strategy: plan.strategy,
        local,
        remote
      }
    }
  }
}

/**
 * Plans the diff and populates it.
 */
export async function resolveDiffCommand(
  options: DiffOptions,
  services: DiffServices
): Promise<DiffCommand> {
  const plan = planDiff(options)
  core.info(`Resolved ${plan.mode} diff (strategy ${plan.strategy})`)
  return populateDiff(plan, services)
}
