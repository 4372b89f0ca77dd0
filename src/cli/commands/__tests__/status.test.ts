/**
 * Tests for `gauntlet status`
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { z } from 'zod'
import { SessionDocumentSchema } from '../../../modules/session/session-schema.js'
import { runEvaluate } from '../evaluate.js'
import { runStatus } from '../status.js'
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

/** Evaluate one statement against the workspace database and return its session id */
async function evaluateOnce(): Promise<string> {
  const exitCode = await runEvaluate(['Invoices for plumbers'], {
    ...workspace.options(),
    pack: testPack.dir,
    json: true,
    runtimeOverrides: inProcessAdapters(),
  })
  expect(exitCode).toBe(0)
  const [doc] = z.array(SessionDocumentSchema).parse(JSON.parse(output.stdout()))
  if (doc === undefined) throw new Error('no session document printed')
  output.restore()
  output = captureOutput()
  return doc.session_id
}

describe('runStatus', () => {
  it('prints the last recorded state of a finished session as JSON', async () => {
    const sessionId = await evaluateOnce()
    expect(await runStatus(sessionId, { ...workspace.options(), json: true })).toBe(0)

    const doc = SessionDocumentSchema.parse(JSON.parse(output.stdout()))
    expect([doc.session_id, doc.status, doc.pipeline_state, doc.verdict]).toEqual([
      sessionId,
      'complete',
      'COMPLETE',
      'PASS',
    ])
  })

  it('prints a human summary by default', async () => {
    const sessionId = await evaluateOnce()
    expect(await runStatus(sessionId, workspace.options())).toBe(0)
    expect(output.stdout().split('\n')[0]).toBe(`Session ${sessionId}  Status: complete  State: COMPLETE`)
  })

  it('exits 2 for an unknown session', async () => {
    expect(await runStatus('nope0000', workspace.options())).toBe(2)
    expect(output.stderr()).toBe('Error: Session not found: nope0000\n')
  })
})
