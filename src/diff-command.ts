import * as core from '@actions/core'
import { computeDiffs } from './manifest-comparator.js'
import {
  getObjectKey,
  indexObjects,
  isKubernetesObject,
  pruneToShape
} from './objects.js'
import {
  DiffCommand,
  DiffReporter,
  DiffSides,
  DiffStrategy,
  KubernetesObject,
  LocalEnvironment,
  ManifestDiff,
  RemoteEnvironment
} from './types.js'

/**
 * Reads the live counterpart of every object the remote side expands to,
 * keyed by the requested object's identity. Objects missing from the
 * cluster are left out. In `subset` mode each live object is pruned to the
 * fields its manifest sets.
 */
export async function fetchLiveObjects(
  remote: RemoteEnvironment,
  strategy: DiffStrategy
): Promise<Map<string, KubernetesObject>> {
  const live = new Map<string, KubernetesObject>()

  for (const requested of remote.objects) {
    const obj = await remote.client.objects.read(requested)
    if (!obj) {
      core.debug(`${getObjectKey(requested)} not found on remote:${remote.name}`)
      continue
    }
    if (strategy === 'subset') {
      const pruned = pruneToShape(requested, obj)
      live.set(
        getObjectKey(requested),
        isKubernetesObject(pruned) ? pruned : obj
      )
    } else {
      live.set(getObjectKey(requested), obj)
    }
  }

  core.info(
    `Read ${live.size} of ${remote.objects.length} objects from remote:${remote.name}`
  )
  return live
}

function localSide(env: LocalEnvironment): Map<string, KubernetesObject> {
  return indexObjects(env.objects)
}

function describeSides(command: DiffCommand): DiffSides {
  switch (command.mode) {
    case 'single-environment':
      return {
        current: `local:${command.environment}`,
        target: `remote:${command.environment}`
      }
    case 'two-local':
      return {
        current: `local:${command.a.name}`,
        target: `local:${command.b.name}`
      }
    case 'two-remote':
      return {
        current: `remote:${command.a.name}`,
        target: `remote:${command.b.name}`
      }
    case 'local-versus-remote':
      return {
        current: `local:${command.local.name}`,
        target: `remote:${command.remote.name}`
      }
  }
}

async function collectSides(
  command: DiffCommand
): Promise<[Map<string, KubernetesObject>, Map<string, KubernetesObject>]> {
  switch (command.mode) {
    case 'single-environment':
    case 'local-versus-remote':
      return [
        localSide(command.local),
        await fetchLiveObjects(command.remote, command.strategy)
      ]
    case 'two-local':
      return [localSide(command.a), localSide(command.b)]
    case 'two-remote':
      return [
        await fetchLiveObjects(command.a, command.strategy),
        await fetchLiveObjects(command.b, command.strategy)
      ]
  }
}

/**
 * Runs a resolved diff: reads any live objects the command needs, compares
 * both sides and hands the result to the reporter.
 *
 * The command must be fully populated; nothing is expanded or connected here.
 */
export async function runDiffCommand(
  command: DiffCommand,
  reporter: DiffReporter
): Promise<ManifestDiff[]> {
  const sides = describeSides(command)
  const [current, target] = await collectSides(command)

  core.info(
    `Comparing ${sides.current} with ${sides.target} (strategy ${command.strategy})`
  )

  const diffs = computeDiffs(current, target)
  await reporter.report(diffs, sides)
  return diffs
}
