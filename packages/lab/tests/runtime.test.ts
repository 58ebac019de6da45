import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { RuntimeUnavailableError } from '../src/errors.js'
import { DockerRuntime, DryRunRuntime, formatArgv, formatInvocation, quoteArg } from '../src/runtime/index.js'

describe('format', () => {
  it('leaves plain arguments alone', () => {
    expect(quoteArg('192.168.1.1/24')).toBe('192.168.1.1/24')
    expect(quoteArg('s/bgpd=no/bgpd=yes/')).toBe('s/bgpd=no/bgpd=yes/')
  })

  it('single-quotes arguments with spaces or shell characters', () => {
    expect(quoteArg('write memory')).toBe("'write memory'")
    expect(quoteArg('a|b')).toBe("'a|b'")
    expect(quoteArg('')).toBe("''")
  })

  it('escapes embedded single quotes', () => {
    expect(quoteArg("it's")).toBe(`'it'\\''s'`)
  })

  it('renders argv and full exec lines', () => {
    expect(formatArgv(['vtysh', '-c', 'show ip bgp summary'])).toBe("vtysh -c 'show ip bgp summary'")
    expect(formatInvocation('podman', 'leaf-a', ['ip', 'link', 'set', 'eth1', 'up'])).toBe(
      'podman exec leaf-a ip link set eth1 up'
    )
  })
})

describe('DryRunRuntime', () => {
  it('records invocations and reports success', async () => {
    const runtime = new DryRunRuntime()

    const result = await runtime.exec('leaf-a', ['ip', 'link', 'set', 'eth1', 'up'])
    await runtime.exec('leaf-b', ['vtysh', '-c', 'write memory'])

    expect(result).toEqual({ stdout: '', stderr: '', exitCode: 0 })
    expect(runtime.invocations).toEqual([
      { container: 'leaf-a', argv: ['ip', 'link', 'set', 'eth1', 'up'] },
      { container: 'leaf-b', argv: ['vtysh', '-c', 'write memory'] },
    ])
    expect(runtime.commandLines()).toEqual([
      'docker exec leaf-a ip link set eth1 up',
      "docker exec leaf-b vtysh -c 'write memory'",
    ])
  })

  it('renders with the configured binary', async () => {
    const runtime = new DryRunRuntime('podman')
    await runtime.exec('pc-a', ['ping', '-c', '3', '172.16.2.10'])

    expect(runtime.commandLines()).toEqual(['podman exec pc-a ping -c 3 172.16.2.10'])
  })
})

describe('DockerRuntime', () => {
  let dir: string
  let fakeDocker: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fabriclab-runtime-'))
    fakeDocker = join(dir, 'fake-docker')
    // $1 is "exec", $2 the container, the rest the command
    await writeFile(
      fakeDocker,
      ['#!/bin/sh', 'echo "container=$2 cmd=$3 $4"', 'echo "complaint" >&2', 'exit 3', ''].join('\n')
    )
    await chmod(fakeDocker, 0o755)
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('passes exec, container and argv to the binary and collects output', async () => {
    const runtime = new DockerRuntime(fakeDocker)

    const result = await runtime.exec('leaf-a', ['ip', 'route'])

    expect(result).toEqual({
      stdout: 'container=leaf-a cmd=ip route\n',
      stderr: 'complaint\n',
      exitCode: 3,
    })
  })

  it('rejects when the binary cannot be started', async () => {
    const runtime = new DockerRuntime(join(dir, 'missing-docker'))

    const run = runtime.exec('leaf-a', ['true'])

    await expect(run).rejects.toBeInstanceOf(RuntimeUnavailableError)
    await expect(run).rejects.toThrow(`Container runtime '${join(dir, 'missing-docker')}' is not available`)
  })
})
