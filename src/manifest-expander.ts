import * as core from '@actions/core'
import { AppLayout, ComponentFile } from './app-layout.js'
import { JSONNET } from './constants.js'
import { ArgumentError, ExpansionError } from './errors.js'
import { ExtEntry, TemplateEvaluator } from './template-evaluator.js'
import { KubernetesObject, ManifestSource } from './types.js'

/**
 * Caller-supplied evaluator settings, applied after the app's own.
 */
export interface ExpanderOptions {
  jpaths: string[]
  extCodes: ExtEntry[]
  extVars: ExtEntry[]
}

/**
 * Parses `key=value` lines into ext entries.
 */
export function parseExtEntries(lines: string[]): ExtEntry[] {
  return lines.map((line) => {
    const separator = line.indexOf('=')
    if (separator <= 0) {
      throw new ArgumentError(
        'InvalidExtEntry',
        `expected key=value, got '${line}'`
      )
    }
    return { key: line.slice(0, separator), value: line.slice(separator + 1) }
  })
}

/**
 * Selects the component files to include. An empty filter selects all.
 *
 * @throws ExpansionError `ComponentNotFound` for a filter name with no file
 */
export function selectComponents(
  files: ComponentFile[],
  names: string[]
): ComponentFile[] {
  if (names.length === 0) return files

  const missing = names.filter((name) => !files.some((f) => f.name === name))
  if (missing.length > 0) {
    throw new ExpansionError(
      'ComponentNotFound',
      `unknown component(s): ${missing.join(', ')}`
    )
  }
  return files.filter((f) => names.includes(f.name))
}

/**
 * Ext-code holding one field per component, each importing its file.
 */
export function constructBaseObject(components: ComponentFile[]): ExtEntry {
  const fields = components.map(
    (c) => `  ${JSON.stringify(c.name)}: import ${JSON.stringify(c.path)},\n`
  )
  return {
    key: JSONNET.COMPONENTS_EXT_CODE_KEY,
    value: `{\n${fields.join('')}}\n`
  }
}

export function importParams(paramsPath: string): ExtEntry {
  return {
    key: JSONNET.PARAMS_EXT_CODE_KEY,
    value: `import ${JSON.stringify(paramsPath)}`
  }
}

/**
 * Drops every entry whose key already appeared earlier in the list, so
 * earlier entries take precedence.
 */
export function dedupeByKey(entries: ExtEntry[]): ExtEntry[] {
  const seen = new Set<string>()
  const result: ExtEntry[] = []
  for (const entry of entries) {
    if (seen.has(entry.key)) {
      core.warning(
        `Ignoring ext-code '${entry.key}': already set by the environment`
      )
      continue
    }
    seen.add(entry.key)
    result.push(entry)
  }
  return result
}

/**
 * Expands environments of a jsonnet app into resource objects.
 *
 * Search paths are ordered environment lib, vendor, shared lib, then caller
 * paths. Ext-codes are ordered base object, environment params, then caller
 * codes; on a key collision the earlier one wins.
 */
export class ManifestExpander implements ManifestSource {
  constructor(
    private readonly layout: AppLayout,
    private readonly evaluator: TemplateEvaluator,
    private readonly options: ExpanderOptions = {
      jpaths: [],
      extCodes: [],
      extVars: []
    }
  ) {}

  async expand(
    environment: string,
    components: string[]
  ): Promise<KubernetesObject[]> {
    const { libPath, vendorPath, envLibPath, envComponentPath, envParamsPath } =
      this.layout.libPaths(environment)

    const selected = selectComponents(
      await this.layout.componentFiles(),
      components
    )

    const baseObject = constructBaseObject(selected)
    const params = importParams(envParamsPath)

    const objects = await this.evaluator.evaluate({
      entryFile: envComponentPath,
      searchPaths: [envLibPath, vendorPath, libPath, ...this.options.jpaths],
      extCodes: dedupeByKey([baseObject, params, ...this.options.extCodes]),
      extVars: this.options.extVars
    })

    core.info(
      `Expanded environment '${environment}' (${selected.length} components): ${objects.length} objects`
    )
    return objects
  }
}
