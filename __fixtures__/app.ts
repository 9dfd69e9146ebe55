import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

export const APP_YAML = `apiVersion: 0.1.0
kind: ksonnet.io/app
name: guestbook
environments:
  dev:
    destination:
      namespace: dev
      server: https://dev.example.test
    path: dev
  us-west/prod:
    destination:
      server: https://prod.example.test
    path: us-west/prod
`

/**
 * Writes a small jsonnet app into a fresh temporary directory.
 */
export function writeApp(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'env-diff-app-'))
  const files: Record<string, string> = {
    'app.yaml': APP_YAML,
    'components/redis.jsonnet': '{}',
    'components/frontend.jsonnet': '{}',
    'components/config.json': '{}',
    'components/params.libsonnet': '{}',
    'components/README.md': '',
    'environments/base.libsonnet': '{}',
    'environments/dev/main.jsonnet': '{}',
    'environments/dev/params.libsonnet': '{}',
    'environments/dev/.metadata/k.libsonnet': '{}',
    'environments/us-west/prod/main.jsonnet': '{}',
    'environments/us-west/prod/params.libsonnet': '{}',
    'environments/staging-dir/main.jsonnet': '{}',
    'lib/util.libsonnet': '{}',
    'vendor/k8s/k.libsonnet': '{}'
  }

  for (const [file, content] of Object.entries(files)) {
    const target = path.join(root, file)
    fs.mkdirSync(path.dirname(target), { recursive: true })
    fs.writeFileSync(target, content)
  }
  return root
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}
