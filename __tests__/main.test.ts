/**
 * Unit tests for the action's entry point, src/main.ts
 */
import { jest } from '@jest/globals'
import * as core from '@actions/core'
import { run } from '../src/main.js'
import {
  configMap,
  FakeClusterConnector,
  FakeManifestSource,
  RecordingReporter
} from '../__fixtures__/fakes.js'

jest.mock('@actions/core')

function setInputs(inputs: Record<string, string>): void {
  jest
    .mocked(core.getInput)
    .mockImplementation((name: string) => inputs[name] ?? '')
  jest
    .mocked(core.getMultilineInput)
    .mockImplementation((name: string) =>
      (inputs[name] ?? '').split('\n').filter((line) => line !== '')
    )
}

describe('main.ts', () => {
  let manifests: FakeManifestSource
  let clusters: FakeClusterConnector
  let reporter: RecordingReporter

  beforeEach(() => {
    manifests = new FakeManifestSource({
      dev: [configMap('app', { level: 'debug' })],
      prod: [configMap('app', { level: 'debug' })]
    })
    clusters = new FakeClusterConnector({
      dev: [configMap('app', { level: 'info' })]
    })
    reporter = new RecordingReporter()
  })

  it('diffs a single environment against its own cluster', async () => {
    setInputs({ environments: 'dev' })

    await run({ manifests, clusters, reporter })

    expect(core.setFailed).not.toHaveBeenCalled()
    expect(manifests.calls).toEqual([{ environment: 'dev', components: [] }])
    expect(clusters.calls).toEqual(['dev'])
    expect(reporter.reports[0].sides).toEqual({
      current: 'local:dev',
      target: 'remote:dev'
    })
    expect(core.setOutput).toHaveBeenCalledWith('has_differences', 'true')
    expect(core.setOutput).toHaveBeenCalledWith('diff_count', '1')
  })

  it('passes the component filter to the single-environment expansion', async () => {
    setInputs({ environments: 'dev', components: 'redis\nfrontend\n' })

    await run({ manifests, clusters, reporter })

    expect(manifests.calls).toEqual([
      { environment: 'dev', components: ['redis', 'frontend'] }
    ])
  })

  it('reports no differences between identical local environments', async () => {
    setInputs({ environments: 'local:dev  local:prod' })

    await run({ manifests, clusters, reporter })

    expect(clusters.calls).toEqual([])
    expect(core.setOutput).toHaveBeenCalledWith('has_differences', 'false')
    expect(core.setOutput).toHaveBeenCalledWith('diff_count', '0')
  })

  it('fails on a prefixed single locator before touching anything', async () => {
    setInputs({ environments: 'remote:dev' })

    await run({ manifests, clusters, reporter })

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.stringContaining(
        "Action failed with error: single <env> argument with prefix 'local:' or 'remote:' not allowed (got 'remote:dev')"
      )
    )
    expect(manifests.calls).toEqual([])
    expect(clusters.calls).toEqual([])
    expect(reporter.reports).toEqual([])
    expect(core.setOutput).not.toHaveBeenCalled()
  })

  it('rejects a component filter with two environments', async () => {
    setInputs({
      environments: 'local:dev remote:prod',
      components: 'redis'
    })

    await run({ manifests, clusters, reporter })

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.stringContaining(
        'a component filter is not supported when diffing two environments'
      )
    )
    expect(manifests.calls).toEqual([])
  })

  it('rejects an unknown diff strategy', async () => {
    setInputs({ environments: 'dev', diff_strategy: 'everything' })

    await run({ manifests, clusters, reporter })

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.stringContaining(
        "diff strategy must be one of all, subset, got 'everything'"
      )
    )
  })

  it('fails when an environment cannot be expanded', async () => {
    setInputs({ environments: 'local:dev local:staging' })

    await run({ manifests, clusters, reporter })

    expect(core.setFailed).toHaveBeenCalledWith(
      'Action failed with error: no fixture for environment staging'
    )
    expect(reporter.reports).toEqual([])
  })
})
