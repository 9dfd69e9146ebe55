import { KUBERNETES } from './constants.js'
import { ExpansionError } from './errors.js'
import { KubernetesObject } from './types.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Checks for the fields that identify an object: apiVersion, kind and metadata.name.
 */
export function isKubernetesObject(value: unknown): value is KubernetesObject {
  if (!isRecord(value)) return false
  const { metadata } = value
  return (
    typeof value.apiVersion === 'string' &&
    typeof value.kind === 'string' &&
    isRecord(metadata) &&
    typeof metadata.name === 'string' &&
    (metadata.namespace === undefined || typeof metadata.namespace === 'string')
  )
}

/**
 * Identity of an object: `kind/namespace/name`. Objects without a namespace
 * are keyed under the default namespace.
 */
export function getObjectKey(obj: KubernetesObject): string {
  const namespace = obj.metadata.namespace || KUBERNETES.DEFAULT_NAMESPACE
  return `${obj.kind}/${namespace}/${obj.metadata.name}`
}

/**
 * Indexes objects by identity. A later object with the same identity
 * replaces an earlier one, keeping the earlier position.
 */
export function indexObjects(
  objects: KubernetesObject[]
): Map<string, KubernetesObject> {
  const index = new Map<string, KubernetesObject>()
  for (const obj of objects) {
    index.set(getObjectKey(obj), obj)
  }
  return index
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function walk(value: unknown, path: string, out: KubernetesObject[]): void {
  if (value === null || value === undefined) return

  if (Array.isArray(value)) {
    value.forEach((item, i) => walk(item, `${path}[${i}]`, out))
    return
  }

  if (!isRecord(value)) {
    throw new ExpansionError(
      'InvalidObject',
      `looking for kubernetes object at ${path}, but instead found ${describeValue(value)}`
    )
  }

  if (value.kind === undefined || value.apiVersion === undefined) {
    for (const [key, child] of Object.entries(value)) {
      walk(child, `${path}.${key}`, out)
    }
    return
  }

  if (value.kind === KUBERNETES.LIST_KIND) {
    walk(value.items, `${path}.items`, out)
    return
  }

  if (!isKubernetesObject(value)) {
    throw new ExpansionError(
      'InvalidObject',
      `object at ${path} has kind and apiVersion but no usable metadata.name`
    )
  }
  out.push(value)
}

/**
 * Walks evaluator output into a flat object list, in output order.
 *
 * Nested objects and arrays are descended until an object carrying both
 * `kind` and `apiVersion` is found. `List` objects contribute their items.
 */
export function flattenObjects(output: unknown): KubernetesObject[] {
  const objects: KubernetesObject[] = []
  walk(output, '<top>', objects)
  return objects
}

/**
 * Removes from `live` every map field `shape` does not have, recursively.
 * Arrays are pruned element by element; live elements past the end of the
 * shape are kept so they show up in the diff.
 */
export function pruneToShape(shape: unknown, live: unknown): unknown {
  if (isRecord(shape) && isRecord(live)) {
    const fields = live
    // own keys only, so `toString` or `__proto__` in a manifest stay data
    return Object.fromEntries(
      Object.entries(shape)
        .filter(([key]) => Object.hasOwn(fields, key))
        .map(([key, value]) => [key, pruneToShape(value, fields[key])])
    )
  }

  if (Array.isArray(shape) && Array.isArray(live)) {
    return live.map((item, i) =>
      i < shape.length ? pruneToShape(shape[i], item) : item
    )
  }

  return live
}
