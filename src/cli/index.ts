#!/usr/bin/env node
/**
 * gauntlet CLI - main entry point
 */

import { createLogger } from '../utils/logger.js'
import { createProgram } from './program.js'

// pino-pretty workers and Commander exit handlers can exceed the default of 10
process.setMaxListeners(30)

const logger = createLogger('cli')

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
