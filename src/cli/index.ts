#!/usr/bin/env node
/**
 * phaseflow CLI - main entry point
 */

import { createLogger } from '../utils/logger.js'
import { createProgram } from './program.js'

const logger = createLogger('cli')

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ err: error }, 'CLI error')
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  }
}

// Errors are handled inside main(), which exits with status 1
void main()
