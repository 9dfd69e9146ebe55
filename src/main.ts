import * as core from '@actions/core'
import { AppLayout } from './app-layout.js'
import { ClientContextBuilder } from './client-context.js'
import { COMMENTS, DIFF, GITHUB } from './constants.js'
import { runDiffCommand } from './diff-command.js'
import {
  DiffOptions,
  DiffServices,
  planDiff,
  populateDiff
} from './diff-mode-resolver.js'
import { describeError } from './errors.js'
import { GitHubPRCommenter } from './github-pr-commenter.js'
import { ManifestExpander, parseExtEntries } from './manifest-expander.js'
import { ConsoleReporter } from './reporters.js'
import { JsonnetCli } from './template-evaluator.js'
import { DiffReporter } from './types.js'

/**
 * Collaborators `run` would otherwise build from the action inputs.
 */
export type RunOverrides = Partial<DiffServices & { reporter: DiffReporter }>

function readOptions(): DiffOptions {
  return {
    environments: core
      .getInput('environments', { required: true })
      .split(/\s+/)
      .filter(Boolean),
    components: core.getMultilineInput('components'),
    diffStrategy: core.getInput('diff_strategy') || DIFF.DEFAULT_STRATEGY
  }
}

async function buildServices(
  overrides: RunOverrides
): Promise<DiffServices> {
  if (overrides.manifests && overrides.clusters) {
    return { manifests: overrides.manifests, clusters: overrides.clusters }
  }

  const expanderOptions = {
    jpaths: core.getMultilineInput('jpath'),
    extCodes: parseExtEntries(core.getMultilineInput('ext_code')),
    extVars: parseExtEntries(core.getMultilineInput('ext_str'))
  }

  const layout = await AppLayout.find(core.getInput('app_dir') || '.')
  core.info(`Using app at ${layout.root}`)

  const manifests =
    overrides.manifests ??
    new ManifestExpander(
      layout,
      new JsonnetCli({ binary: core.getInput('jsonnet_bin'), cwd: layout.root }),
      expanderOptions
    )

  const clusters =
    overrides.clusters ??
    new ClientContextBuilder(
      {
        kubeconfig: core.getInput('kubeconfig') || undefined,
        context: core.getInput('context') || undefined,
        namespace: core.getInput('namespace') || undefined
      },
      layout
    )

  return { manifests, clusters }
}

function buildReporter(): DiffReporter {
  const githubToken = core.getInput('github_token') || process.env.GITHUB_TOKEN
  if (!githubToken) {
    return new ConsoleReporter()
  }

  const title = core.getInput('title') || COMMENTS.DEFAULT_TITLE
  const subtitle = core.getInput('subtitle')
  const maxCommentCharLen = parseInt(
    core.getInput('max_comment_char_len') ||
      GITHUB.MAX_COMMENT_LENGTH.toString(),
    10
  )
  return new GitHubPRCommenter(githubToken, title, subtitle, maxCommentCharLen)
}

export async function run(overrides: RunOverrides = {}): Promise<void> {
  try {
    const options = readOptions()
    const plan = planDiff(options)
    core.info(
      `Diffing ${options.environments.join(' ')}: ${plan.mode} (strategy ${plan.strategy})`
    )

    const services = await buildServices(overrides)
    const command = await populateDiff(plan, services)
    const reporter = overrides.reporter ?? buildReporter()

    const diffs = await runDiffCommand(command, reporter)

    core.setOutput('has_differences', diffs.length > 0 ? 'true' : 'false')
    core.setOutput('diff_count', diffs.length.toString())
  } catch (error) {
    core.setFailed(`Action failed with error: ${describeError(error)}`)
  }
}
