import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { AppLayout } from './app-layout.js'
import { KUBERNETES } from './constants.js'
import { ClusterError, describeError } from './errors.js'
import { getObjectKey, isKubernetesObject, isRecord } from './objects.js'
import {
  ClientContext,
  ClusterConnector,
  Discovery,
  KubernetesObject,
  ObjectAccess
} from './types.js'

/**
 * Connection overrides, the equivalent of `--kubeconfig`, `--context` and
 * `--namespace`.
 */
export interface ClientOptions {
  kubeconfig?: string
  context?: string
  namespace?: string
}

export type KubeClientFactory = (
  config: k8s.KubeConfig,
  namespace: string
) => Pick<ClientContext, 'objects' | 'discovery'>

function statusCode(error: unknown): number | undefined {
  return isRecord(error) && typeof error.statusCode === 'number'
    ? error.statusCode
    : undefined
}

/**
 * Reads live objects through the generic object API.
 */
export class KubeObjectAccess implements ObjectAccess {
  constructor(
    private readonly api: k8s.KubernetesObjectApi,
    private readonly namespace: string
  ) {}

  async read(object: KubernetesObject): Promise<KubernetesObject | undefined> {
    let body: k8s.KubernetesObject
    try {
      ;({ body } = await this.api.read<k8s.KubernetesObject>({
        apiVersion: object.apiVersion,
        kind: object.kind,
        metadata: {
          name: object.metadata.name,
          namespace: object.metadata.namespace || this.namespace
        }
      }))
    } catch (error) {
      if (statusCode(error) === 404) {
        return undefined
      }
      throw new ClusterError(
        'ConnectionError',
        `failed to read ${getObjectKey(object)}: ${describeError(error)}`,
        { cause: error }
      )
    }

    // typed models carry undefined fields and Date values
    const live: unknown = JSON.parse(JSON.stringify(body))
    if (!isKubernetesObject(live)) {
      throw new ClusterError(
        'ConnectionError',
        `server returned a malformed object for ${getObjectKey(object)}`
      )
    }
    return live
  }
}

/**
 * Lists the group/versions served by the core and named API groups.
 */
export class KubeDiscovery implements Discovery {
  constructor(
    private readonly coreApi: k8s.CoreApi,
    private readonly apisApi: k8s.ApisApi
  ) {}

  async serverGroupVersions(): Promise<string[]> {
    const { body: coreVersions } = await this.coreApi.getAPIVersions()
    const { body: groupList } = await this.apisApi.getAPIVersions()
    return [
      ...coreVersions.versions,
      ...groupList.groups.flatMap((group) =>
        group.versions.map((version) => version.groupVersion)
      )
    ]
  }
}

export const createKubeClients: KubeClientFactory = (config, namespace) => ({
  objects: new KubeObjectAccess(
    k8s.KubernetesObjectApi.makeApiClient(config),
    namespace
  ),
  discovery: new KubeDiscovery(
    config.makeApiClient(k8s.CoreApi),
    config.makeApiClient(k8s.ApisApi)
  )
})

/**
 * Namespace precedence: explicit override, then the context's namespace,
 * then `default`.
 */
export function resolveNamespace(
  override: string | undefined,
  contextNamespace: string | undefined
): string {
  return override || contextNamespace || KUBERNETES.DEFAULT_NAMESPACE
}

/**
 * Whether any source of the default loading rules exists. Without one,
 * `loadFromDefault` falls back to an unauthenticated http://localhost:8080.
 */
function hasDefaultKubeConfig(): boolean {
  if (process.env.KUBECONFIG) return true
  if (fs.existsSync(path.join(os.homedir(), '.kube', 'config'))) return true
  return (
    Boolean(process.env.KUBERNETES_SERVICE_HOST) &&
    fs.existsSync(KUBERNETES.SERVICE_ACCOUNT_TOKEN_PATH)
  )
}

function loadKubeConfig(kubeconfig: string | undefined): k8s.KubeConfig {
  if (!kubeconfig && !hasDefaultKubeConfig()) {
    throw new ClusterError(
      'ClientConfigError',
      "no kubeconfig found: set 'kubeconfig' or KUBECONFIG, or provide ~/.kube/config"
    )
  }

  const config = new k8s.KubeConfig()
  try {
    if (kubeconfig) {
      config.loadFromFile(kubeconfig)
    } else {
      config.loadFromDefault()
    }
  } catch (error) {
    throw new ClusterError(
      'ClientConfigError',
      `failed to load kubeconfig${kubeconfig ? ` ${kubeconfig}` : ''}: ${describeError(error)}`,
      { cause: error }
    )
  }
  return config
}

/**
 * Picks the context serving `server`. The current context wins a tie.
 */
function contextForServer(config: k8s.KubeConfig, server: string): string {
  const matching = config
    .getContexts()
    .filter((ctx) => config.getCluster(ctx.cluster)?.server === server)
    .map((ctx) => ctx.name)

  if (matching.length === 0) {
    throw new ClusterError(
      'ClientConfigError',
      `no kubeconfig context points at server ${server}`
    )
  }
  if (matching.length === 1) {
    return matching[0]
  }
  const current = config.getCurrentContext()
  if (matching.includes(current)) {
    return current
  }
  throw new ClusterError(
    'ClientConfigError',
    `several kubeconfig contexts point at server ${server} (${matching.join(', ')}); set 'context' to choose one`
  )
}

/**
 * Builds client contexts from kubeconfig, one per remote environment.
 */
export class ClientContextBuilder implements ClusterConnector {
  constructor(
    private readonly options: ClientOptions = {},
    private readonly layout?: AppLayout,
    private readonly createClients: KubeClientFactory = createKubeClients
  ) {}

  /**
   * Resolves the kubeconfig context and namespace for an environment.
   *
   * @throws ClusterError `ClientConfigError`
   */
  resolveConfig(environment: string): {
    config: k8s.KubeConfig
    namespace: string
  } {
    const config = loadKubeConfig(this.options.kubeconfig)
    const server = this.layout?.environment(environment).server

    let contextName: string
    if (this.options.context) {
      contextName = this.options.context
    } else if (server) {
      contextName = contextForServer(config, server)
    } else {
      contextName = config.getCurrentContext()
    }

    const context = contextName ? config.getContextObject(contextName) : null
    if (!context) {
      throw new ClusterError(
        'ClientConfigError',
        contextName
          ? `context '${contextName}' not found in kubeconfig`
          : 'kubeconfig has no current context'
      )
    }
    if (!config.getCluster(context.cluster)) {
      throw new ClusterError(
        'ClientConfigError',
        `context '${context.name}' refers to unknown cluster '${context.cluster}'`
      )
    }
    config.setCurrentContext(context.name)

    return {
      config,
      namespace: resolveNamespace(this.options.namespace, context.namespace)
    }
  }

  async connect(environment: string): Promise<ClientContext> {
    const { config, namespace } = this.resolveConfig(environment)
    const { objects, discovery } = this.createClients(config, namespace)
    const server = config.getCurrentCluster()?.server ?? 'unknown server'

    let groupVersions: string[]
    try {
      groupVersions = await discovery.serverGroupVersions()
    } catch (error) {
      throw new ClusterError(
        'ConnectionError',
        `failed to reach ${server} for environment '${environment}': ${describeError(error)}`,
        { cause: error }
      )
    }

    core.info(
      `Connected to ${server} for environment '${environment}' (context ${config.getCurrentContext()}, namespace ${namespace}, ${groupVersions.length} API versions)`
    )
    return { objects, discovery, namespace }
  }
}
