import * as fs from 'fs'
import * as path from 'path'
import * as yaml from 'js-yaml'
import { APP } from './constants.js'
import { describeError, ExpansionError } from './errors.js'
import { isRecord } from './objects.js'

/**
 * An environment as declared in `app.yaml`.
 */
export interface EnvironmentSpec {
  /** Directory under `environments/`, defaults to the environment name */
  path: string
  /** API server the environment deploys to */
  server?: string
}

/**
 * Paths the template evaluator needs for one environment.
 */
export interface EnvironmentPaths {
  libPath: string
  vendorPath: string
  envLibPath: string
  envComponentPath: string
  envParamsPath: string
}

/**
 * A component file under `components/`.
 */
export interface ComponentFile {
  name: string
  path: string
}

function parseEnvironmentSpecs(
  content: string,
  file: string
): Map<string, EnvironmentSpec> {
  let parsed: unknown
  try {
    parsed = yaml.load(content)
  } catch (error) {
    throw new ExpansionError(
      'InvalidAppConfig',
      `failed to parse ${file}`,
      describeError(error),
      { cause: error }
    )
  }

  const specs = new Map<string, EnvironmentSpec>()
  if (!isRecord(parsed) || !isRecord(parsed.environments)) {
    return specs
  }

  for (const [name, entry] of Object.entries(parsed.environments)) {
    if (!isRecord(entry)) continue
    const destination = isRecord(entry.destination) ? entry.destination : {}
    specs.set(name, {
      path: typeof entry.path === 'string' && entry.path ? entry.path : name,
      server:
        typeof destination.server === 'string' ? destination.server : undefined
    })
  }
  return specs
}

/**
 * A jsonnet app on disk: `app.yaml`, `components/`, `environments/<env>/`,
 * `lib/` and `vendor/`.
 */
export class AppLayout {
  private constructor(
    readonly root: string,
    private readonly environments: Map<string, EnvironmentSpec>
  ) {}

  /**
   * Finds the app containing `dir` by walking up to the nearest `app.yaml`.
   */
  static async find(dir: string): Promise<AppLayout> {
    let current = path.resolve(dir)
    for (;;) {
      const appFile = path.join(current, APP.APP_FILE)
      if (fs.existsSync(appFile)) {
        const content = await fs.promises.readFile(appFile, 'utf8')
        return new AppLayout(current, parseEnvironmentSpecs(content, appFile))
      }
      const parent = path.dirname(current)
      if (parent === current) {
        throw new ExpansionError(
          'AppNotFound',
          `no ${APP.APP_FILE} found in ${path.resolve(dir)} or any parent directory`
        )
      }
      current = parent
    }
  }

  environment(name: string): EnvironmentSpec {
    return this.environments.get(name) ?? { path: name }
  }

  /**
   * @throws ExpansionError `EnvironmentNotFound` when the environment has no directory
   */
  libPaths(environment: string): EnvironmentPaths {
    const envDir = path.join(
      this.root,
      APP.ENVIRONMENTS_DIR,
      this.environment(environment).path
    )
    if (!fs.existsSync(envDir)) {
      throw new ExpansionError(
        'EnvironmentNotFound',
        `environment '${environment}' does not exist in ${this.root}`
      )
    }

    return {
      libPath: path.join(this.root, APP.LIB_DIR),
      vendorPath: path.join(this.root, APP.VENDOR_DIR),
      envLibPath: path.join(envDir, APP.ENV_METADATA_DIR),
      envComponentPath: path.join(envDir, APP.ENV_ENTRY_FILE),
      envParamsPath: path.join(envDir, APP.ENV_PARAMS_FILE)
    }
  }

  /**
   * Component files directly under `components/`, sorted by file name.
   *
   * @throws ExpansionError `DuplicateComponent` when two files share a name
   */
  async componentFiles(): Promise<ComponentFile[]> {
    const dir = path.join(this.root, APP.COMPONENTS_DIR)
    if (!fs.existsSync(dir)) return []

    const entries = await fs.promises.readdir(dir, { withFileTypes: true })
    const extensions: readonly string[] = APP.COMPONENT_EXTENSIONS
    const files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((file) => extensions.includes(path.extname(file)))
      .sort()

    const components = new Map<string, ComponentFile>()
    for (const file of files) {
      const name = path.basename(file, path.extname(file))
      const existing = components.get(name)
      if (existing) {
        throw new ExpansionError(
          'DuplicateComponent',
          `component '${name}' is defined by both ${path.basename(existing.path)} and ${file}`
        )
      }
      components.set(name, { name, path: path.join(dir, file) })
    }
    return [...components.values()]
  }
}
