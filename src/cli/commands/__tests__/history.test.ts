/**
 * Tests for the `gauntlet history` command group
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { z } from 'zod'
import { runEvaluate } from '../evaluate.js'
import { runHistoryInsights, runHistoryList, runHistorySearch, runHistorySimilar } from '../history.js'
import { captureOutput, createCommandWorkspace, inProcessAdapters } from '../../../../test/helpers/cli.js'
import type { CapturedOutput, CommandWorkspace } from '../../../../test/helpers/cli.js'
import { createTestPack } from '../../../../test/helpers/packs.js'
import type { TestPack } from '../../../../test/helpers/packs.js'

let workspace: CommandWorkspace
let testPack: TestPack
let output: CapturedOutput

beforeEach(async () => {
  workspace = await createCommandWorkspace()
  testPack = await createTestPack()
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  await testPack.cleanup()
  await workspace.cleanup()
})

async function seed(statement: string): Promise<void> {
  const exitCode = await runEvaluate([statement], {
    ...workspace.options(),
    pack: testPack.dir,
    quiet: true,
    runtimeOverrides: inProcessAdapters(),
  })
  expect(exitCode).toBe(0)
  output.restore()
  output = captureOutput()
}

const InsightSchema = z.object({
  outcome: z.object({ statement: z.string() }),
  stages: z.array(z.object({ stage: z.string(), content: z.string() })),
})

function json(): unknown {
  return JSON.parse(output.stdout())
}

describe('history list', () => {
  it('says so when nothing has been evaluated', async () => {
    expect(await runHistoryList(workspace.options())).toBe(0)
    expect(output.stdout()).toBe('No evaluations recorded.\n')
  })

  it('lists recorded outcomes newest first', async () => {
    await seed('Invoices for plumbers')
    await seed('Rota planning for clinics')
    expect(await runHistoryList({ ...workspace.options(), json: true })).toBe(0)
    expect(json()).toMatchObject([
      { statement: 'Rota planning for clinics', status: 'complete', verdict: 'PASS' },
      { statement: 'Invoices for plumbers', status: 'complete', verdict: 'PASS' },
    ])
  })

  it('filters by status', async () => {
    await seed('Invoices for plumbers')
    expect(await runHistoryList({ ...workspace.options(), json: true, status: 'failed' })).toBe(0)
    expect(json()).toEqual([])
  })
})

describe('history search and similar', () => {
  it('ranks outcomes by overlap with the query', async () => {
    await seed('Invoices for plumbers')
    await seed('Rota planning for clinics')
    expect(await runHistorySearch('plumbers invoices', { ...workspace.options(), json: true })).toBe(0)
    expect(json()).toMatchObject([{ statement: 'Invoices for plumbers', similarity: 1 }])
  })

  it('finds an identical statement', async () => {
    await seed('Invoices for plumbers')
    expect(await runHistorySimilar('Invoices for plumbers', { ...workspace.options(), json: true })).toBe(0)
    expect(json()).toMatchObject([{ statement: 'Invoices for plumbers', similarity: 1, status: 'complete' }])
  })

  it('rejects an empty query', async () => {
    expect(await runHistorySearch('   ', workspace.options())).toBe(2)
    expect(output.stderr()).toBe('Error: query must not be empty\n')
  })
})

describe('history insights', () => {
  it('returns the stage outputs of matching sessions', async () => {
    await seed('Invoices for plumbers')
    expect(await runHistoryInsights('invoices', { ...workspace.options(), json: true })).toBe(0)
    const [insight] = z.array(InsightSchema).parse(json())
    expect(insight?.outcome.statement).toBe('Invoices for plumbers')
    expect(insight?.stages.map((s) => s.stage).sort()).toEqual([
      'problem-a',
      'problem-b',
      'report',
      'solution-a',
      'solution-b',
    ])
  })
})
