import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { parseTopology } from './topology.js'
import type { LabTopology } from './topology.js'

export * from './ipv4.js'
export * from './topology.js'

/**
 * Raised when a topology file cannot be read or parsed as JSON.
 * Schema violations surface as the underlying `ZodError`.
 */
export class TopologyError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message)
    this.name = 'TopologyError'
  }
}

/** Location of the topology that ships with the package. */
export function defaultTopologyPath(): string {
  return fileURLToPath(new URL('../topologies/simple-sonic.json', import.meta.url))
}

/**
 * Load and validate a JSON topology file.
 *
 * @throws {TopologyError} if the file cannot be read or is not valid JSON
 * @throws {z.ZodError} if the content violates the topology schema
 */
export async function loadTopologyFile(filePath: string): Promise<LabTopology> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new TopologyError(`Topology file not found: ${filePath}`, filePath)
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new TopologyError(`Topology file could not be read: ${filePath}: ${reason}`, filePath)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new TopologyError(`Topology file is not valid JSON: ${filePath}`, filePath)
  }

  return parseTopology(raw)
}

export const LabConfigSchema = z.object({
  topologyPath: z.string().min(1),
  /** Container runtime binary, `docker` or a compatible CLI such as `podman`. */
  runtime: z.string().min(1).default('docker'),
})

export type LabConfig = z.infer<typeof LabConfigSchema>

type LabConfigOptions = {
  topologyPath?: string
  runtime?: string
}

/**
 * Resolve lab settings. Explicit options win over environment variables,
 * which win over the bundled defaults.
 *
 * - `FABRICLAB_TOPOLOGY`: path to a topology JSON file
 * - `CONTAINER_RUNTIME`: container runtime binary
 */
export function loadLabConfig(options: LabConfigOptions = {}): LabConfig {
  return LabConfigSchema.parse({
    topologyPath: options.topologyPath || process.env.FABRICLAB_TOPOLOGY || defaultTopologyPath(),
    runtime: options.runtime || process.env.CONTAINER_RUNTIME || undefined,
  })
}
