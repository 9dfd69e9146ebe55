import { fetchLiveObjects, runDiffCommand } from '../src/diff-command.js'
import { KubernetesObject } from '../src/types.js'
import {
  configMap,
  FakeClusterConnector,
  RecordingReporter
} from '../__fixtures__/fakes.js'

const withServerFields = (obj: KubernetesObject): KubernetesObject => ({
  ...obj,
  metadata: {
    ...obj.metadata,
    namespace: 'default',
    uid: '0b7c1f9e',
    resourceVersion: '42'
  }
})

describe('fetchLiveObjects', () => {
  const requested = [configMap('app', { level: 'info' }), configMap('gone')]

  it('keys live objects by the requested identity and skips missing ones', async () => {
    const client = await new FakeClusterConnector({
      prod: [withServerFields(configMap('app', { level: 'info' }))]
    }).connect('prod')

    const live = await fetchLiveObjects(
      { name: 'prod', client, objects: requested },
      'all'
    )

    expect([...live.keys()]).toEqual(['ConfigMap/default/app'])
    expect(live.get('ConfigMap/default/app')?.metadata.uid).toBe('0b7c1f9e')
  })

  it('prunes live objects to the manifest fields in subset mode', async () => {
    const client = await new FakeClusterConnector({
      prod: [withServerFields(configMap('app', { level: 'info' }))]
    }).connect('prod')

    const live = await fetchLiveObjects(
      { name: 'prod', client, objects: requested },
      'subset'
    )

    expect(live.get('ConfigMap/default/app')).toEqual(
      configMap('app', { level: 'info' })
    )
  })
})

describe('runDiffCommand', () => {
  let reporter: RecordingReporter

  beforeEach(() => {
    reporter = new RecordingReporter()
  })

  it('compares two local environments', async () => {
    const diffs = await runDiffCommand(
      {
        mode: 'two-local',
        strategy: 'subset',
        a: { name: 'dev', objects: [configMap('app', { level: 'debug' })] },
        b: {
          name: 'prod',
          objects: [configMap('app', { level: 'info' }), configMap('extra')]
        }
      },
      reporter
    )

    expect(diffs.map((d) => [d.status, d.objectKey])).toEqual([
      ['modified', 'ConfigMap/default/app'],
      ['removed', 'ConfigMap/default/extra']
    ])
    expect(reporter.reports).toEqual([
      { diffs, sides: { current: 'local:dev', target: 'local:prod' } }
    ])
  })

  it('ignores server-set fields against a cluster in subset mode', async () => {
    const objects = [configMap('app', { level: 'info' })]
    const client = await new FakeClusterConnector({
      dev: [withServerFields(configMap('app', { level: 'info' }))]
    }).connect('dev')

    const diffs = await runDiffCommand(
      {
        mode: 'single-environment',
        strategy: 'subset',
        environment: 'dev',
        local: { name: 'dev', objects },
        remote: { name: 'dev', client, objects }
      },
      reporter
    )

    expect(diffs).toEqual([])
    expect(reporter.reports[0].sides).toEqual({
      current: 'local:dev',
      target: 'remote:dev'
    })
  })

  it('diffs a manifest key missing from the cluster in subset mode', async () => {
    const objects = [configMap('app', { toString: 'x' })]
    const client = await new FakeClusterConnector({
      dev: [configMap('app')]
    }).connect('dev')

    const diffs = await runDiffCommand(
      {
        mode: 'single-environment',
        strategy: 'subset',
        environment: 'dev',
        local: { name: 'dev', objects },
        remote: { name: 'dev', client, objects }
      },
      reporter
    )

    expect(diffs).toEqual([
      expect.objectContaining({
        objectKey: 'ConfigMap/default/app',
        status: 'modified',
        targetObject: configMap('app')
      })
    ])
  })

  it('reports server-set fields in all mode', async () => {
    const objects = [configMap('app', { level: 'info' })]
    const client = await new FakeClusterConnector({
      dev: [withServerFields(configMap('app', { level: 'info' }))]
    }).connect('dev')

    const diffs = await runDiffCommand(
      {
        mode: 'single-environment',
        strategy: 'all',
        environment: 'dev',
        local: { name: 'dev', objects },
        remote: { name: 'dev', client, objects }
      },
      reporter
    )

    expect(diffs.map((d) => d.status)).toEqual(['modified'])
  })

  it('reports objects missing from the cluster as added', async () => {
    const objects = [configMap('new-app')]
    const client = await new FakeClusterConnector({ prod: [] }).connect('prod')

    const diffs = await runDiffCommand(
      {
        mode: 'local-versus-remote',
        strategy: 'subset',
        local: { name: 'dev', objects },
        remote: { name: 'prod', client, objects }
      },
      reporter
    )

    expect(diffs).toEqual([
      {
        objectKey: 'ConfigMap/default/new-app',
        status: 'added',
        currentObject: configMap('new-app')
      }
    ])
    expect(reporter.reports[0].sides).toEqual({
      current: 'local:dev',
      target: 'remote:prod'
    })
  })

  it('compares two clusters', async () => {
    const connector = new FakeClusterConnector({
      a: [withServerFields(configMap('app', { level: 'debug' }))],
      b: [withServerFields(configMap('app', { level: 'info' }))]
    })

    const diffs = await runDiffCommand(
      {
        mode: 'two-remote',
        strategy: 'subset',
        a: {
          name: 'a',
          client: await connector.connect('a'),
          objects: [configMap('app', { level: 'debug' })]
        },
        b: {
          name: 'b',
          client: await connector.connect('b'),
          objects: [configMap('app', { level: 'info' })]
        }
      },
      reporter
    )

    expect(diffs.map((d) => [d.status, d.objectKey])).toEqual([
      ['modified', 'ConfigMap/default/app']
    ])
    expect(reporter.reports[0].sides).toEqual({
      current: 'remote:a',
      target: 'remote:b'
    })
  })
})
