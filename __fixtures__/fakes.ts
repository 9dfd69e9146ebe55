import {
  ClientContext,
  ClusterConnector,
  KubernetesObject,
  ManifestDiff,
  DiffReporter,
  DiffSides,
  ManifestSource
} from '../src/types.js'

export function configMap(
  name: string,
  data: Record<string, string> = {},
  namespace?: string
): KubernetesObject {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: namespace ? { name, namespace } : { name },
    data
  }
}

/**
 * Returns canned objects per environment and records every call.
 */
export class FakeManifestSource implements ManifestSource {
  readonly calls: Array<{ environment: string; components: string[] }> = []

  constructor(
    private readonly objects: Record<string, KubernetesObject[]> = {}
  ) {}

  async expand(
    environment: string,
    components: string[]
  ): Promise<KubernetesObject[]> {
    this.calls.push({ environment, components })
    const objects = this.objects[environment]
    if (!objects) {
      throw new Error(`no fixture for environment ${environment}`)
    }
    return objects
  }
}

/**
 * Serves live objects from an in-memory cluster per environment.
 */
export class FakeClusterConnector implements ClusterConnector {
  readonly calls: string[] = []

  constructor(
    private readonly live: Record<string, KubernetesObject[]> = {},
    private readonly namespace = 'default'
  ) {}

  async connect(environment: string): Promise<ClientContext> {
    this.calls.push(environment)
    const objects = this.live[environment] ?? []
    return {
      namespace: this.namespace,
      discovery: {
        serverGroupVersions: async () => ['v1', 'apps/v1']
      },
      objects: {
        read: async (requested) =>
          objects.find(
            (o) =>
              o.kind === requested.kind &&
              o.metadata.name === requested.metadata.name
          )
      }
    }
  }
}

export class RecordingReporter implements DiffReporter {
  readonly reports: Array<{ diffs: ManifestDiff[]; sides: DiffSides }> = []

  async report(diffs: ManifestDiff[], sides: DiffSides): Promise<void> {
    this.reports.push({ diffs, sides })
  }
}
