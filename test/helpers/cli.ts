/**
 * Helpers for command tests: captured stdio and throwaway config directories.
 */

import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { vi } from 'vitest'
import type { CommandContextOptions } from '../../src/cli/utils/command-context.js'
import { IN_MEMORY_DATABASE } from '../../src/persistence/database.js'
import { ScriptedCapability, stageOutput } from './capability.js'
import type { StageScript } from './capability.js'
import { MemoryReportSink, RecordingNotifier } from './fakes.js'

export interface CapturedOutput {
  stdout(): string
  stderr(): string
  restore(): void
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString('utf-8')
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString('utf-8')
    return true
  })
  return {
    stdout: () => stdout,
    stderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

export interface CommandWorkspace {
  dir: string
  projectConfigDir: string
  globalConfigDir: string
  /** Database file shared by every command run against this workspace */
  databasePath: string
  /** Context options with no env overrides; `inMemory` gives each run a private database */
  options(inMemory?: boolean): CommandContextOptions
  cleanup(): Promise<void>
}

export async function createCommandWorkspace(): Promise<CommandWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), 'gauntlet-cmd-'))
  const projectConfigDir = join(dir, 'project', '.gauntlet')
  const globalConfigDir = join(dir, 'global', '.gauntlet')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
  const databasePath = join(dir, 'gauntlet.db')
  return {
    dir,
    projectConfigDir,
    globalConfigDir,
    databasePath,
    options: (inMemory = false) => ({
      projectConfigDir,
      globalConfigDir,
      env: {},
      cliOverrides: { store: { database_path: inMemory ? IN_MEMORY_DATABASE : databasePath } },
    }),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  }
}

/** Answers for every stage of the test pack: problem 7.5, solution 7.0 */
export const PASSING_SCRIPT: Readonly<Record<string, StageScript>> = {
  'problem-a': stageOutput({ severity: 8, market_size: 7 }),
  'problem-b': stageOutput({ wtp: 8, solution_fit: 7 }),
  'solution-a': stageOutput({ technical_viability: 8, competitive_advantage: 6 }),
  'solution-b': stageOutput({ resource_requirements: 7, time_to_market: 7 }),
  pivot: stageOutput({}, { suggestions: ['Target electricians'] }),
  report: stageOutput({}, { report: 'Full narrative' }),
}

export function inProcessAdapters(script: Readonly<Record<string, StageScript>> = PASSING_SCRIPT): {
  capability: ScriptedCapability
  notifier: RecordingNotifier
  reportSink: MemoryReportSink
} {
  return { capability: new ScriptedCapability(script), notifier: new RecordingNotifier(), reportSink: new MemoryReportSink() }
}
