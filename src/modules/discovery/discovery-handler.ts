/**
 * Built-in handler for `{ type: 'discovery' }` phases.
 *
 * Runs deterministic discovery for the task and writes the result document
 * to `<stateDir>/discovery/<workflowId>.json`.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { PhaseOutput, Task } from '../../core/types.js'
import type { DeterministicDiscovery } from './deterministic-discovery.js'
import { DISCOVERY_LEVEL_NAMES, type DiscoveryResult } from './types.js'

export function discoveryDocumentPath(stateDir: string, workflowId: string): string {
  return join(stateDir, 'discovery', `${encodeURIComponent(workflowId)}.json`)
}

export async function writeDiscoveryDocument(path: string, result: DiscoveryResult): Promise<void> {
  const document = {
    success: result.success,
    items: result.items,
    level: result.level,
    seed: result.seed,
    fallback_chain: result.fallback_chain,
  }
  await mkdir(dirname(path), { recursive: true })
  const tmp = `${path}.${String(process.pid)}.tmp`
  await writeFile(tmp, `${JSON.stringify(document, null, 2)}\n`, 'utf-8')
  await rename(tmp, path)
}

export async function runDiscoveryPhase(
  discovery: DeterministicDiscovery,
  task: Task,
  stateDir: string,
): Promise<PhaseOutput> {
  const result = await discovery.discover(task)
  const path = discoveryDocumentPath(stateDir, task.workflowId)
  await writeDiscoveryDocument(path, result)
  return {
    status: 'ok',
    summary: `Level ${String(result.level)} (${DISCOVERY_LEVEL_NAMES[result.level]}): ${String(result.items.length)} items`,
    artifacts: [path],
    data: {
      success: result.success,
      level: result.level,
      items: result.items,
      seed: result.seed,
      fallback_chain: result.fallback_chain,
    },
  }
}
