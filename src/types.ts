/**
 * Represents a Kubernetes object with basic metadata
 */
export interface KubernetesObject {
  /** The API version of the Kubernetes object */
  apiVersion: string
  /** The kind/type of the Kubernetes object */
  kind: string
  /** Metadata containing object identification information */
  metadata: {
    /** The name of the Kubernetes object */
    name: string
    /** The namespace where the object is located (optional) */
    namespace?: string
    [field: string]: unknown
  }
  [field: string]: unknown
}

/**
 * Where a locator points: the app's own rendering, or a cluster's live state.
 */
export type LocatorKind = 'local' | 'remote'

/**
 * A parsed environment locator. `kind` is absent for the bare single-argument
 * form, which means "this environment's rendering against its own cluster".
 */
export interface EnvironmentLocator {
  kind?: LocatorKind
  name: string
}

/**
 * Comparison granularity. `subset` ignores fields the cluster sets that the
 * manifest does not mention; `all` compares whole objects.
 */
export type DiffStrategy = 'all' | 'subset'

/**
 * Reads live objects from a cluster.
 */
export interface ObjectAccess {
  /**
   * Fetches the live counterpart of `object`.
   *
   * @returns The live object, or undefined when the server answers 404
   */
  read(object: KubernetesObject): Promise<KubernetesObject | undefined>
}

/**
 * Queries which API group/versions a server serves.
 */
export interface Discovery {
  serverGroupVersions(): Promise<string[]>
}

/**
 * Connection to one cluster for the duration of a single invocation.
 */
export interface ClientContext {
  objects: ObjectAccess
  discovery: Discovery
  /** Namespace applied to objects that do not name one */
  namespace: string
}

export interface LocalEnvironment {
  name: string
  objects: KubernetesObject[]
}

export interface RemoteEnvironment {
  name: string
  client: ClientContext
  /** Expanded objects whose live counterparts are read from the cluster */
  objects: KubernetesObject[]
}

/**
 * A fully populated comparison. Exactly one mode is active per invocation.
 */
export type DiffCommand =
  | {
      mode: 'single-environment'
      strategy: DiffStrategy
      environment: string
      local: LocalEnvironment
      remote: RemoteEnvironment
    }
  | {
      mode: 'two-local'
      strategy: DiffStrategy
      a: LocalEnvironment
      b: LocalEnvironment
    }
  | {
      mode: 'two-remote'
      strategy: DiffStrategy
      a: RemoteEnvironment
      b: RemoteEnvironment
    }
  | {
      mode: 'local-versus-remote'
      strategy: DiffStrategy
      local: LocalEnvironment
      remote: RemoteEnvironment
    }

/**
 * Expands an environment of the app into resource objects.
 */
export interface ManifestSource {
  expand(environment: string, components: string[]): Promise<KubernetesObject[]>
}

/**
 * Opens a client context for an environment's cluster.
 */
export interface ClusterConnector {
  connect(environment: string): Promise<ClientContext>
}

/**
 * Represents the difference between current and target Kubernetes manifests
 */
export interface ManifestDiff {
  /** Unique identifier for the Kubernetes object being compared */
  objectKey: string
  /** The type of change detected in the manifest */
  status: 'added' | 'removed' | 'modified'
  /** The current state of the Kubernetes object (if it exists) */
  currentObject?: KubernetesObject
  /** The target state of the Kubernetes object (if it exists) */
  targetObject?: KubernetesObject
  /** Human-readable diff string showing the changes */
  diff?: string
}

/**
 * Receives the result of a comparison.
 */
export interface DiffReporter {
  report(diffs: ManifestDiff[], sides: DiffSides): Promise<void>
}

/**
 * Labels of the two sides being compared, e.g. `local:dev` and `remote:dev`.
 */
export interface DiffSides {
  current: string
  target: string
}
