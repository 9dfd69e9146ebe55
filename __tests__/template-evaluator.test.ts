import { jest } from '@jest/globals'
import {
  buildJsonnetArgs,
  CommandRunner,
  EvaluationRequest,
  JsonnetCli
} from '../src/template-evaluator.js'

const request: EvaluationRequest = {
  entryFile: '/app/environments/dev/main.jsonnet',
  searchPaths: ['/app/environments/dev/.metadata', '/app/vendor', '/app/lib'],
  extCodes: [
    { key: '__ksonnet/components', value: '{}' },
    { key: '__ksonnet/params', value: 'import "params.libsonnet"' }
  ],
  extVars: [{ key: 'image', value: 'nginx:1.25' }]
}

describe('buildJsonnetArgs', () => {
  it('passes search paths lowest precedence first', () => {
    expect(buildJsonnetArgs(request)).toEqual([
      '-J',
      '/app/lib',
      '-J',
      '/app/vendor',
      '-J',
      '/app/environments/dev/.metadata',
      '--ext-str',
      'image=nginx:1.25',
      '--ext-code',
      '__ksonnet/components={}',
      '--ext-code',
      '__ksonnet/params=import "params.libsonnet"',
      '/app/environments/dev/main.jsonnet'
    ])
  })

  it('does not reorder the request', () => {
    buildJsonnetArgs(request)

    expect(request.searchPaths[0]).toBe('/app/environments/dev/.metadata')
  })
})

describe('JsonnetCli', () => {
  it('runs the configured binary and flattens its output', async () => {
    const run = jest.fn<CommandRunner>().mockResolvedValue({
      stdout: JSON.stringify({
        redis: {
          apiVersion: 'v1',
          kind: 'Service',
          metadata: { name: 'redis' }
        },
        frontend: [
          {
            apiVersion: 'apps/v1',
            kind: 'Deployment',
            metadata: { name: 'frontend', namespace: 'web' }
          }
        ]
      })
    })
    const cli = new JsonnetCli({ binary: '/usr/local/bin/jsonnet', cwd: '/app', run })

    const objects = await cli.evaluate(request)

    expect(run).toHaveBeenCalledWith(
      '/usr/local/bin/jsonnet',
      buildJsonnetArgs(request),
      { cwd: '/app' }
    )
    expect(objects).toEqual([
      { apiVersion: 'v1', kind: 'Service', metadata: { name: 'redis' } },
      {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'frontend', namespace: 'web' }
      }
    ])
  })

  it('defaults to the jsonnet binary on the path', async () => {
    const run = jest.fn<CommandRunner>().mockResolvedValue({ stdout: '{}' })
    const cli = new JsonnetCli({ run })

    await expect(cli.evaluate(request)).resolves.toEqual([])
    expect(run.mock.calls[0][0]).toBe('jsonnet')
  })

  it('reports the evaluator diagnostic as a TemplateEvaluationError', async () => {
    const failure = Object.assign(new Error('Command failed with exit code 1'), {
      stderr: 'RUNTIME ERROR: Field does not exist: replicas\n'
    })
    const run = jest.fn<CommandRunner>().mockRejectedValue(failure)
    const cli = new JsonnetCli({ run })

    await expect(cli.evaluate(request)).rejects.toMatchObject({
      code: 'TemplateEvaluationError',
      diagnostic: 'RUNTIME ERROR: Field does not exist: replicas',
      message:
        'failed to evaluate /app/environments/dev/main.jsonnet:\nRUNTIME ERROR: Field does not exist: replicas'
    })
  })

  it('falls back to the error message without stderr', async () => {
    const run = jest
      .fn<CommandRunner>()
      .mockRejectedValue(new Error('spawn jsonnet ENOENT'))
    const cli = new JsonnetCli({ run })

    await expect(cli.evaluate(request)).rejects.toMatchObject({
      code: 'TemplateEvaluationError',
      diagnostic: 'spawn jsonnet ENOENT'
    })
  })

  it('rejects output that is not JSON', async () => {
    const run = jest.fn<CommandRunner>().mockResolvedValue({ stdout: 'oops' })
    const cli = new JsonnetCli({ run })

    await expect(cli.evaluate(request)).rejects.toMatchObject({
      code: 'TemplateEvaluationError'
    })
  })
})
