import * as core from '@actions/core'
import execa from 'execa'
import { JSONNET } from './constants.js'
import { describeError, ExpansionError } from './errors.js'
import { flattenObjects } from './objects.js'
import { KubernetesObject } from './types.js'

/**
 * A named jsonnet external value, `key=value` on the command line.
 */
export interface ExtEntry {
  key: string
  value: string
}

export interface EvaluationRequest {
  entryFile: string
  /** Library search directories, highest precedence first */
  searchPaths: string[]
  /** Ext-codes with unique keys */
  extCodes: ExtEntry[]
  /** Ext-vars (plain strings) with unique keys */
  extVars: ExtEntry[]
}

/**
 * Evaluates a jsonnet entry file into resource objects.
 */
export interface TemplateEvaluator {
  evaluate(request: EvaluationRequest): Promise<KubernetesObject[]>
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { cwd?: string }
) => Promise<{ stdout: string }>

const runWithExeca: CommandRunner = async (file, args, options) => {
  const { stdout } = await execa(file, args, {
    cwd: options.cwd,
    maxBuffer: JSONNET.MAX_OUTPUT_BUFFER
  })
  return { stdout }
}

/**
 * Builds the argument list for the `jsonnet` binary.
 *
 * The binary gives the right-most `-J` directory precedence, so search
 * paths are passed in reverse.
 */
export function buildJsonnetArgs(request: EvaluationRequest): string[] {
  const args: string[] = []
  for (const dir of [...request.searchPaths].reverse()) {
    args.push('-J', dir)
  }
  for (const { key, value } of request.extVars) {
    args.push('--ext-str', `${key}=${value}`)
  }
  for (const { key, value } of request.extCodes) {
    args.push('--ext-code', `${key}=${value}`)
  }
  args.push(request.entryFile)
  return args
}

function evaluatorDiagnostic(error: unknown): string {
  if (error instanceof Error && 'stderr' in error) {
    const { stderr } = error
    if (typeof stderr === 'string' && stderr.trim()) {
      return stderr.trim()
    }
  }
  return describeError(error)
}

export interface JsonnetCliOptions {
  binary?: string
  cwd?: string
  run?: CommandRunner
}

/**
 * Runs the `jsonnet` command-line evaluator and flattens its JSON output.
 */
export class JsonnetCli implements TemplateEvaluator {
  private binary: string
  private cwd?: string
  private run: CommandRunner

  constructor(options: JsonnetCliOptions = {}) {
    this.binary = options.binary || JSONNET.DEFAULT_BINARY
    this.cwd = options.cwd
    this.run = options.run ?? runWithExeca
  }

  async evaluate(request: EvaluationRequest): Promise<KubernetesObject[]> {
    const args = buildJsonnetArgs(request)
    core.debug(`Running ${this.binary} ${args.join(' ')}`)

    let stdout: string
    try {
      ;({ stdout } = await this.run(this.binary, args, { cwd: this.cwd }))
    } catch (error) {
      throw new ExpansionError(
        'TemplateEvaluationError',
        `failed to evaluate ${request.entryFile}`,
        evaluatorDiagnostic(error),
        { cause: error }
      )
    }

    let output: unknown
    try {
      output = JSON.parse(stdout)
    } catch (error) {
      throw new ExpansionError(
        'TemplateEvaluationError',
        `evaluator output for ${request.entryFile} is not JSON`,
        describeError(error),
        { cause: error }
      )
    }

    return flattenObjects(output)
  }
}
