import { spawn } from 'node:child_process'
import { getLogger } from '@fabriclab/telemetry'
import { RuntimeUnavailableError } from '../errors.js'
import { formatInvocation } from './format.js'
import type { ContainerRuntime, ExecResult } from './types.js'

const logger = getLogger('runtime')

/**
 * `docker exec` (or any CLI with the same surface, such as podman) driven
 * through `node:child_process`.
 */
export class DockerRuntime implements ContainerRuntime {
  constructor(readonly binary: string = 'docker') {}

  exec(container: string, argv: readonly string[]): Promise<ExecResult> {
    logger.debug('exec {command}', { command: formatInvocation(this.binary, container, argv) })

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ['exec', container, ...argv], {
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      child.stdout.setEncoding('utf-8')
      child.stderr.setEncoding('utf-8')
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })

      child.on('error', (err) => {
        reject(new RuntimeUnavailableError(this.binary, err))
      })
      child.on('close', (code, signal) => {
        if (code === null) {
          logger.warn('{binary} exec terminated by {signal}', { binary: this.binary, signal })
        }
        resolve({ stdout, stderr, exitCode: code ?? 1 })
      })
    })
  }
}
