/**
 * Integration tests for createEngine(): configuration-driven wiring of the
 * file store, discovery, executor and orchestrator, with git disabled.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createEngine, resolveStateDir } from '../engine-impl.js'
import type { Engine } from '../engine.js'
import { StateCorruptionError, WorkflowNotFoundError, WorkflowSpecError } from '../errors.js'
import type { PhaseflowConfig } from '../../modules/config/config-schema.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { createTask } from '../../modules/workflow-orchestrator/task.js'
import type { FunctionHandler } from '../../modules/phase-executor/handler-registry.js'

const SPEC_YAML = `
version: "1"
name: sdlc
phases:
  - name: scout
    handler: { type: discovery }
  - name: plan
    handler: { type: function, name: plan }
    depends_on: [scout]
  - name: build
    handler: { type: function, name: build }
    depends_on: [plan]
`

let workDir: string
let projectRoot: string
let engine: Engine | undefined

function testConfig(): PhaseflowConfig {
  return {
    ...DEFAULT_CONFIG,
    global: { ...DEFAULT_CONFIG.global, state_dir: join(workDir, 'state') },
    recovery: { ...DEFAULT_CONFIG.recovery, backoff_unit_ms: 0 },
    agent: { ...DEFAULT_CONFIG.agent, env_passthrough: [] },
    git: { enabled: false },
  }
}

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'phaseflow-engine-'))
  projectRoot = join(workDir, 'project')
  await mkdir(join(projectRoot, 'src'), { recursive: true })
  await writeFile(join(projectRoot, 'src', 'auth.ts'), 'export const login = 1\n')
  await writeFile(join(projectRoot, 'src', 'util.ts'), 'export const x = 1\n')
  await writeFile(join(projectRoot, 'workflow.yaml'), SPEC_YAML)
})

afterEach(async () => {
  await engine?.shutdown()
  engine = undefined
  await rm(workDir, { recursive: true, force: true })
})

describe('createEngine', () => {
  it('resolves a relative state_dir against the project root', () => {
    const config = { ...DEFAULT_CONFIG, global: { ...DEFAULT_CONFIG.global, state_dir: '.phaseflow/state' } }
    expect(resolveStateDir(config, '/repo')).toBe('/repo/.phaseflow/state')
    expect(resolveStateDir(testConfig(), '/repo')).toBe(join(workDir, 'state'))
  })

  it('runs a spec file end to end and exposes the persisted state', async () => {
    const seenItems: string[][] = []
    const handlers: Record<string, FunctionHandler> = {
      plan: ({ context }) => {
        seenItems.push(context.discoveredItems)
        return Promise.resolve({ status: 'ok', summary: 'planned' })
      },
      build: () => Promise.resolve({ status: 'ok', artifacts: ['src/util.ts'] }),
    }
    engine = await createEngine({ config: testConfig(), projectRoot, functionHandlers: handlers })
    expect(engine.isReady).toBe(true)
    expect(engine.store.backend).toBe('file')

    const spec = await engine.loadWorkflowSpec(join(projectRoot, 'workflow.yaml'))
    expect(spec.maxParallel).toBe(3)
    expect(spec.phases.map((p) => p.timeoutMs)).toEqual([600_000, 600_000, 600_000])

    const result = await engine.orchestrator.run(spec, createTask({ workflowId: 'wf-1', description: 'find auth code' }))

    expect(result.success).toBe(true)
    expect(result.phases[0]?.output?.summary).toBe('Level 2 (structural): 1 items')
    expect(seenItems).toEqual([['src/auth.ts']])

    const document: unknown = JSON.parse(
      await readFile(join(workDir, 'state', 'discovery', 'wf-1.json'), 'utf8'),
    )
    expect(document).toMatchObject({ level: 2, items: ['src/auth.ts'] })

    const state = await engine.getWorkflowState('wf-1')
    expect(state.status).toBe('completed')
    expect(state.lastCheckpoint).toBe('wf-1/completed-build')

    const listed = await engine.listWorkflows()
    expect(listed.map((w) => [w.workflowId, w.specName, w.status])).toEqual([['wf-1', 'sdlc', 'completed']])
  })

  it('feeds completed workflow artifacts back into informed discovery', async () => {
    const handlers: Record<string, FunctionHandler> = {
      plan: () => Promise.resolve({ status: 'ok' }),
      build: () => Promise.resolve({ status: 'ok', artifacts: ['src/util.ts'] }),
    }
    engine = await createEngine({ config: testConfig(), projectRoot, functionHandlers: handlers })
    const spec = await engine.loadWorkflowSpec(join(projectRoot, 'workflow.yaml'))

    await engine.orchestrator.run(spec, createTask({ workflowId: 'wf-a', description: 'find auth code' }))
    const second = await engine.orchestrator.run(
      spec,
      createTask({ workflowId: 'wf-b', description: 'find auth code again' }),
    )

    expect(second.phases[0]?.output?.summary).toBe('Level 1 (informed): 1 items')
    expect(second.phases[0]?.output?.data?.['items']).toEqual(['src/util.ts'])
  })

  it('rejects a spec naming an unregistered function handler', async () => {
    engine = await createEngine({ config: testConfig(), projectRoot })
    await expect(engine.loadWorkflowSpec(join(projectRoot, 'workflow.yaml'))).rejects.toBeInstanceOf(
      WorkflowSpecError,
    )
  })

  it('reports missing and malformed workflow state', async () => {
    engine = await createEngine({ config: testConfig(), projectRoot })
    await expect(engine.getWorkflowState('nope')).rejects.toBeInstanceOf(WorkflowNotFoundError)

    await engine.store.save('workflow:bad', { workflowId: 'bad' })
    await expect(engine.getWorkflowState('bad')).rejects.toBeInstanceOf(StateCorruptionError)
    expect(await engine.listWorkflows()).toEqual([])
  })

  it('shutdown() is idempotent', async () => {
    engine = await createEngine({ config: testConfig(), projectRoot })
    await engine.shutdown()
    await engine.shutdown()
    expect(engine.isReady).toBe(false)
  })
})
