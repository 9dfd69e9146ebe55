import { computeDiffs, countDiffs } from '../src/manifest-comparator.js'
import { indexObjects } from '../src/objects.js'
import { configMap } from '../__fixtures__/fakes.js'

describe('computeDiffs', () => {
  it('reports added, removed and modified objects by identity', () => {
    const current = indexObjects([
      configMap('shared', { level: 'debug' }),
      configMap('only-current'),
      configMap('same', { a: '1' })
    ])
    const target = indexObjects([
      configMap('same', { a: '1' }),
      configMap('only-target'),
      configMap('shared', { level: 'info' })
    ])

    const diffs = computeDiffs(current, target)

    expect(diffs.map((d) => [d.status, d.objectKey])).toEqual([
      ['modified', 'ConfigMap/default/shared'],
      ['added', 'ConfigMap/default/only-current'],
      ['removed', 'ConfigMap/default/only-target']
    ])
  })

  it('matches objects regardless of position', () => {
    const a = configMap('a')
    const b = configMap('b')

    expect(computeDiffs(indexObjects([a, b]), indexObjects([b, a]))).toEqual([])
  })

  it('ignores key order inside objects', () => {
    const current = indexObjects([
      {
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: 'x' },
        data: { a: '1', b: '2' }
      }
    ])
    const target = indexObjects([
      {
        data: { b: '2', a: '1' },
        metadata: { name: 'x' },
        kind: 'ConfigMap',
        apiVersion: 'v1'
      }
    ])

    expect(computeDiffs(current, target)).toEqual([])
  })

  it('renders a unified patch from target to current', () => {
    const diffs = computeDiffs(
      indexObjects([configMap('app', { level: 'debug' })]),
      indexObjects([configMap('app', { level: 'info' })])
    )

    expect(diffs).toHaveLength(1)
    const patch = diffs[0].diff ?? ''
    expect(patch.split('\n')).toEqual(
      expect.arrayContaining([
        '-  level: info',
        '+  level: debug'
      ])
    )
  })

  it('counts each status', () => {
    const diffs = computeDiffs(
      indexObjects([configMap('a'), configMap('b', { x: '1' })]),
      indexObjects([configMap('b', { x: '2' }), configMap('c'), configMap('d')])
    )

    expect(countDiffs(diffs)).toEqual({
      totalCount: 4,
      addedCount: 1,
      removedCount: 2,
      modifiedCount: 1
    })
  })
})
