import * as github from '@actions/github'
import * as core from '@actions/core'
import * as yaml from 'js-yaml'
import { KubernetesObject, DiffReporter, DiffSides, ManifestDiff } from './types.js'
import { GITHUB, COMMENTS } from './constants.js'
import { countDiffs } from './manifest-comparator.js'
import { printDiffs } from './reporters.js'
import { describeError } from './errors.js'

/**
 * Handles posting manifest diff comments to GitHub Pull Requests.
 * Provides functionality to format diffs as GitHub comments and manage comment lifecycle.
 */
export class GitHubPRCommenter implements DiffReporter {
  private octokit: ReturnType<typeof github.getOctokit>
  private title: string
  private subtitle: string
  private maxCommentLength: number

  /**
   * Creates a new GitHubPRCommenter instance.
   *
   * @param token - GitHub token for API authentication
   * @param title - Custom title for the diff comment
   * @param subtitle - Optional subtitle for additional context
   * @param maxCommentLength - Maximum length for a comment before splitting
   */
  constructor(
    token: string,
    title: string = COMMENTS.DEFAULT_TITLE,
    subtitle: string = '',
    maxCommentLength: number = GITHUB.MAX_COMMENT_LENGTH
  ) {
    this.octokit = github.getOctokit(token)
    this.title = title
    this.subtitle = subtitle
    this.maxCommentLength = maxCommentLength
  }

  /**
   * Posts manifest differences as comments on the current Pull Request.
   * Falls back to console output outside a Pull Request or when the API fails.
   */
  async report(diffs: ManifestDiff[], sides: DiffSides): Promise<void> {
    const pullRequest = github.context.payload.pull_request
    if (!pullRequest) {
      core.warning(
        'Pull Request context not available, falling back to console output'
      )
      printDiffs(diffs, sides)
      return
    }

    try {
      await this.minimizeExistingComments(pullRequest.number)

      if (diffs.length === 0) {
        await this.postComment(
          pullRequest.number,
          `## 🎉 No manifest differences found\n\nAll manifests are identical between \`${sides.current}\` and \`${sides.target}\`.`
        )
        return
      }

      const comments = this.formatDiffsAsComments(diffs, sides)
      for (const comment of comments) {
        await this.postComment(pullRequest.number, comment)
      }
    } catch (error) {
      core.error(`Failed to post PR comments: ${describeError(error)}`)
      printDiffs(diffs, sides)
    }
  }

  /**
   * Minimizes earlier comments from this action so only the latest diff stays expanded.
   */
  private async minimizeExistingComments(prNumber: number): Promise<void> {
    const { owner, repo } = github.context.repo

    try {
      const comments = await this.octokit.rest.issues.listComments({
        owner,
        repo,
        issue_number: prNumber
      })

      const botComments = comments.data.filter(
        (comment) =>
          comment.user?.type === 'Bot' &&
          comment.body?.includes(`🔍 ${this.title}`)
      )

      for (const comment of botComments) {
        await this.octokit.graphql(
          `
            mutation($subjectId: ID!) {
              minimizeComment(input: { subjectId: $subjectId, classifier: OUTDATED }) {
                minimizedComment {
                  isMinimized
                }
              }
            }
          `,
          { subjectId: comment.node_id }
        )
      }
    } catch (error) {
      core.warning(`Failed to minimize existing comments: ${describeError(error)}`)
    }
  }

  /**
   * Formats manifest diffs into comment bodies, splitting across several
   * comments to stay under the length limit.
   */
  formatDiffsAsComments(diffs: ManifestDiff[], sides: DiffSides): string[] {
    const comments: string[] = []

    let currentComment = this.getCommentHeader(diffs, sides)
    const footer = this.getCommentFooter(diffs, sides)

    for (const diff of diffs) {
      const diffSection = this.formatDiffSection(diff)

      // Reserve space for either the footer (if last comment) or continuation text
      const reservedSpace = footer.length + GITHUB.COMMENT_LENGTH_BUFFER
      if (
        currentComment.length + diffSection.length + reservedSpace >
        this.maxCommentLength
      ) {
        comments.push(currentComment + COMMENTS.CONTINUATION_TEXT)
        currentComment = this.replacePlaceholders(
          COMMENTS.CONTINUATION_HEADER,
          { title: this.title }
        )
      }

      currentComment += diffSection
    }

    currentComment += footer
    comments.push(currentComment)

    core.info(`Formatted ${comments.length} comments for PR`)

    return comments
  }

  private getCommentHeader(diffs: ManifestDiff[], sides: DiffSides): string {
    return this.replacePlaceholders(COMMENTS.HEADER_TEMPLATE, {
      ...countDiffs(diffs),
      ...sides,
      title: this.title,
      subtitle: this.subtitle ? `\n${this.subtitle}\n` : ''
    })
  }

  private formatDiffSection(diff: ManifestDiff): string {
    const summary = `<details>\n<summary>${this.getStatusEmoji(diff.status)} ${diff.status.toUpperCase()}: \`${diff.objectKey}\`</summary>\n`
    let body: string | undefined

    if (diff.status === 'modified' && diff.diff) {
      body = diff.diff
    } else if (diff.status === 'added' && diff.currentObject) {
      body = this.formatObjectWithDiffSyntax(diff.currentObject, 'added')
    } else if (diff.status === 'removed' && diff.targetObject) {
      body = this.formatObjectWithDiffSyntax(diff.targetObject, 'removed')
    }

    if (body === undefined) {
      return `### ${this.getStatusEmoji(diff.status)} ${diff.status.toUpperCase()}: \`${diff.objectKey}\`\n`
    }
    return [summary, '```diff', body, '```\n</details>\n'].join('\n')
  }

  private getStatusEmoji(status: ManifestDiff['status']): string {
    switch (status) {
      case 'added':
        return '➕'
      case 'removed':
        return '➖'
      case 'modified':
        return '🔄'
    }
  }

  /**
   * Renders an object as YAML with every line prefixed for diff highlighting.
   */
  private formatObjectWithDiffSyntax(
    obj: KubernetesObject,
    status: 'added' | 'removed'
  ): string {
    const yamlContent = yaml.dump(obj, { sortKeys: true }).trim()
    const prefix = status === 'added' ? '+' : '-'
    return yamlContent
      .split('\n')
      .map((line) => `${prefix} ${line}`)
      .join('\n')
  }

  private getCommentFooter(diffs: ManifestDiff[], sides: DiffSides): string {
    return this.replacePlaceholders(COMMENTS.FOOTER_TEMPLATE, {
      ...countDiffs(diffs),
      ...sides
    })
  }

  /**
   * Replaces `{key}` placeholders; unknown keys are left as they are.
   */
  private replacePlaceholders(
    template: string,
    values: Record<string, string | number>
  ): string {
    return template.replace(/{(\w+)}/g, (match, key: string) => {
      return values[key]?.toString() ?? match
    })
  }

  private async postComment(prNumber: number, body: string): Promise<void> {
    const { owner, repo } = github.context.repo

    await this.octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: prNumber,
      body
    })
  }
}
