import * as yaml from 'js-yaml'
import { createTwoFilesPatch } from 'diff'
import { KubernetesObject, ManifestDiff } from './types.js'

/**
 * Compares two identity-keyed object sets.
 *
 * Objects only in `current` are added, objects only in `target` are removed,
 * and objects in both are modified when their YAML (with sorted keys)
 * differs. Keys are visited in `current` order, then the remaining `target`
 * keys in their order.
 */
export function computeDiffs(
  currentObjects: Map<string, KubernetesObject>,
  targetObjects: Map<string, KubernetesObject>
): ManifestDiff[] {
  const diffs: ManifestDiff[] = []
  const allKeys = new Set([...currentObjects.keys(), ...targetObjects.keys()])

  for (const key of allKeys) {
    const currentObj = currentObjects.get(key)
    const targetObj = targetObjects.get(key)

    if (!currentObj && targetObj) {
      diffs.push({
        objectKey: key,
        status: 'removed',
        targetObject: targetObj
      })
    } else if (currentObj && !targetObj) {
      diffs.push({
        objectKey: key,
        status: 'added',
        currentObject: currentObj
      })
    } else if (currentObj && targetObj) {
      const currentYaml = yaml.dump(currentObj, { sortKeys: true })
      const targetYaml = yaml.dump(targetObj, { sortKeys: true })

      if (currentYaml !== targetYaml) {
        const diff = createTwoFilesPatch(
          `target/${key}`,
          `current/${key}`,
          targetYaml,
          currentYaml,
          '',
          ''
        )

        diffs.push({
          objectKey: key,
          status: 'modified',
          currentObject: currentObj,
          targetObject: targetObj,
          diff
        })
      }
    }
  }

  return diffs
}

export function countDiffs(diffs: ManifestDiff[]): {
  totalCount: number
  addedCount: number
  removedCount: number
  modifiedCount: number
} {
  return {
    totalCount: diffs.length,
    addedCount: diffs.filter((d) => d.status === 'added').length,
    removedCount: diffs.filter((d) => d.status === 'removed').length,
    modifiedCount: diffs.filter((d) => d.status === 'modified').length
  }
}
