/**
 * Commander program for the `phaseflow` command-line interface.
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { registerRunCommand } from './commands/run.js'
import { registerResumeCommand } from './commands/resume.js'
import { registerStatusCommand } from './commands/status.js'
import { registerListCommand } from './commands/list.js'

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string() })

/** Resolve the version from package.json, whether run from dist/ or src/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let content: unknown
    try {
      content = JSON.parse(await readFile(pkgPath, 'utf-8'))
    } catch {
      // Try the next location
      continue
    }
    const parsed = PackageJsonSchema.safeParse(content)
    if (parsed.success && parsed.data.name === 'phaseflow') return parsed.data.version
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('phaseflow')
    .description('Multi-phase workflow orchestration for AI-assisted development pipelines')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, projectRoot)
  registerResumeCommand(program, projectRoot)
  registerStatusCommand(program, projectRoot)
  registerListCommand(program, projectRoot)

  return program
}
