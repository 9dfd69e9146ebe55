/**
 * Application-wide constants used across different modules.
 */

/**
 * GitHub API and comment-related constants
 */
export const GITHUB = {
  /**
   * Maximum length for a GitHub comment before it needs to be split.
   * GitHub's actual limit is ~65536 chars, but we use a lower value for safety.
   */
  MAX_COMMENT_LENGTH: 60000,

  /**
   * Buffer space to reserve when calculating comment length limits.
   * This accounts for footers, continuation text, and formatting.
   */
  COMMENT_LENGTH_BUFFER: 100
} as const

/**
 * Kubernetes constants
 */
export const KUBERNETES = {
  /**
   * Namespace used when neither an override nor the kubeconfig context names one,
   * and the namespace objects without one are keyed under
   */
  DEFAULT_NAMESPACE: 'default',

  /** Kind whose `items` are expanded in place */
  LIST_KIND: 'List',

  /** Token mounted into pods, used for in-cluster configuration */
  SERVICE_ACCOUNT_TOKEN_PATH: '/var/run/secrets/kubernetes.io/serviceaccount/token'
} as const

/**
 * Locator grammar
 */
export const LOCATOR = {
  SEPARATOR: ':',
  LOCAL: 'local',
  REMOTE: 'remote'
} as const

/**
 * Layout of a jsonnet app directory
 */
export const APP = {
  /** Marks the root of an app */
  APP_FILE: 'app.yaml',
  COMPONENTS_DIR: 'components',
  ENVIRONMENTS_DIR: 'environments',
  LIB_DIR: 'lib',
  VENDOR_DIR: 'vendor',
  ENV_METADATA_DIR: '.metadata',
  ENV_ENTRY_FILE: 'main.jsonnet',
  ENV_PARAMS_FILE: 'params.libsonnet',
  COMPONENT_EXTENSIONS: ['.jsonnet', '.json']
} as const

/**
 * Template evaluation constants
 */
export const JSONNET = {
  DEFAULT_BINARY: 'jsonnet',

  /** Ext-code carrying the merged component object */
  COMPONENTS_EXT_CODE_KEY: '__ksonnet/components',

  /** Ext-code carrying the environment's imported params */
  PARAMS_EXT_CODE_KEY: '__ksonnet/params',

  /** Evaluator output can be large for big apps */
  MAX_OUTPUT_BUFFER: 64 * 1024 * 1024
} as const

/**
 * Diff defaults
 */
export const DIFF = {
  DEFAULT_STRATEGY: 'subset',
  STRATEGIES: ['all', 'subset']
} as const

/**
 * Comment formatting constants
 */
export const COMMENTS = {
  DEFAULT_TITLE: 'Environment Manifests Diff',

  /**
   * Text shown when a comment is continued in the next comment
   */
  CONTINUATION_TEXT: '\n\n---\n*Continued in next comment...*',

  /**
   * Header for continuation comments
   */
  CONTINUATION_HEADER: '## 🔍 {title} (continued)\n\n',

  /**
   * Header template for the comment section, with placeholders for dynamic values
   */
  HEADER_TEMPLATE: `## 🔍 {title}
{subtitle}
Comparing \`{current}\` with \`{target}\`

Found **{totalCount}** differences: {addedCount} added, {removedCount} removed, {modifiedCount} modified

`,

  /**
   * Footer template for the comment section, with placeholders for dynamic values
   */
  FOOTER_TEMPLATE: `
<hr>

**Summary:** {addedCount} added, {removedCount} removed, {modifiedCount} modified

<details>
<summary>ℹ️ How to read this diff</summary>

- ➕ **Added**: Objects only in \`{current}\`
- ➖ **Removed**: Objects only in \`{target}\`
- 🔄 **Modified**: Objects in both whose content differs

Objects are identified by: \`{kind}/{namespace}/{name}\`
</details>
`
} as const
