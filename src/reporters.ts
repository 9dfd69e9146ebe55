import * as core from '@actions/core'
import { countDiffs } from './manifest-comparator.js'
import { DiffReporter, DiffSides, ManifestDiff } from './types.js'

/**
 * Prints manifest differences to the action log.
 */
export function printDiffs(diffs: ManifestDiff[], sides: DiffSides): void {
  core.info(
    `\n🔍 Found ${diffs.length} differences between ${sides.current} and ${sides.target}:`
  )

  for (const diff of diffs) {
    core.info(`\n${'='.repeat(80)}`)

    switch (diff.status) {
      case 'added':
        core.info(`➕ ADDED: ${diff.objectKey}`)
        break
      case 'removed':
        core.info(`➖ REMOVED: ${diff.objectKey}`)
        break
      case 'modified':
        core.info(`🔄 MODIFIED: ${diff.objectKey}`)
        if (diff.diff) {
          core.info('\nDiff:')
          core.info(diff.diff)
        }
        break
    }
  }

  const { addedCount, removedCount, modifiedCount } = countDiffs(diffs)
  core.info(`\n${'='.repeat(80)}`)
  core.info(
    `Summary: ${addedCount} added, ${removedCount} removed, ${modifiedCount} modified`
  )
}

export class ConsoleReporter implements DiffReporter {
  async report(diffs: ManifestDiff[], sides: DiffSides): Promise<void> {
    printDiffs(diffs, sides)
  }
}
