/**
 * Tests for the pipeline pack loader, including the built-in packs
 */

import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PipelineDefinitionError } from '../../../core/errors.js'
import { builtInPacksDir, createPackLoader, resolvePackPath } from '../pack-loader.js'
import { PipelinePack } from '../pipeline-pack.js'
import { PipelineManifestSchema } from '../schemas.js'
import { PROMPT_TEMPLATE, testManifest, writePack } from '../../../../test/helpers/packs.js'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'gauntlet-loader-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('built-in packs', () => {
  it('loads the two-phase pack', async () => {
    const pack = await createPackLoader().load(join(builtInPacksDir(), 'two-phase'))
    expect(pack.name).toBe('two-phase')
    expect(pack.manifest.threshold).toBe(6)
    expect(pack.getStages('problem').map((s) => s.name)).toEqual(['researcher', 'market-analyst', 'customer-discovery'])
    expect(pack.getStages('solution')).toHaveLength(3)
    expect(pack.eliminationBar(7)).toBe(6)
  })

  it('loads the sequential pack with chained dependencies', async () => {
    const pack = await createPackLoader().load(resolvePackPath('sequential'))
    expect(pack.manifest.threshold).toBe(5)
    expect(pack.manifest.elimination_policy).toBe('full')
    expect(pack.getStages()).toHaveLength(8)
    expect(pack.getStage('market-analyst').depends_on).toEqual(['researcher'])
    expect(pack.eliminationBar(5)).toBe(5)
  })

  it('discovers both packs in name order', async () => {
    const packs = await createPackLoader().discover(builtInPacksDir())
    expect(packs.map((p) => [p.name, p.stageCount, p.threshold])).toEqual([
      ['sequential', 8, 5],
      ['two-phase', 8, 6],
    ])
  })
})

describe('PackLoader.load', () => {
  it('fails without a manifest', async () => {
    await expect(createPackLoader().load(dir)).rejects.toThrow('pipeline.yaml not found or unreadable')
  })

  it('fails on invalid YAML', async () => {
    await writeFile(join(dir, 'pipeline.yaml'), 'stages: [unclosed', 'utf-8')
    await expect(createPackLoader().load(dir)).rejects.toThrow('contains invalid YAML')
  })

  it('fails schema validation with the offending path', async () => {
    await writePack(dir, testManifest({ threshold: 12 }))
    await expect(createPackLoader().load(dir)).rejects.toThrow('threshold')
  })

  it('fails on a broken stage graph', async () => {
    await writePack(dir, testManifest({ stages: testManifestStagesWithout('problem-b') }))
    await expect(createPackLoader().load(dir)).rejects.toThrow('has an invalid stage graph')
  })

  it('fails when a prompt file is missing', async () => {
    await writePack(dir, testManifest(), ['solution-a'])
    await expect(createPackLoader().load(dir)).rejects.toThrow(
      'stage "solution-a" → prompts/solution-a.md (not found)'
    )
  })

  it('skips broken packs during discovery', async () => {
    await writePack(join(dir, 'good'), testManifest({ name: 'good' }))
    await mkdir(join(dir, 'broken'), { recursive: true })
    await writeFile(join(dir, 'broken', 'pipeline.yaml'), 'name: broken', 'utf-8')
    await mkdir(join(dir, 'not-a-pack'), { recursive: true })

    const packs = await createPackLoader().discover(dir)
    expect(packs.map((p) => p.name)).toEqual(['good'])
  })

  it('returns nothing for a missing packs directory', async () => {
    expect(await createPackLoader().discover(join(dir, 'missing'))).toEqual([])
  })
})

describe('PipelinePack', () => {
  it('reads prompts and resolves timeouts', async () => {
    await writePack(dir, testManifest({ stage_timeout_ms: 1_000 }))
    const manifest = PipelineManifestSchema.parse(
      testManifest({
        stage_timeout_ms: 1_000,
        stages: testManifestStagesWith('problem-a', { timeout_ms: 250 }),
      })
    )
    const pack = new PipelinePack(manifest, dir)

    expect(await pack.getPrompt('problem-a')).toBe(PROMPT_TEMPLATE)
    expect(pack.timeoutFor(pack.getStage('problem-a'))).toBe(250)
    expect(pack.timeoutFor(pack.getStage('problem-b'))).toBe(1_000)
    expect(() => pack.getStage('ghost')).toThrow(PipelineDefinitionError)
  })

  it('serves cached prompts after the file is gone and fails for unread ones', async () => {
    await writePack(dir, testManifest())
    const pack = new PipelinePack(PipelineManifestSchema.parse(testManifest()), dir)
    await pack.getPrompt('problem-a')
    await rm(join(dir, 'prompts'), { recursive: true, force: true })

    expect(await pack.getPrompt('problem-a')).toBe(PROMPT_TEMPLATE)
    await expect(pack.getPrompt('problem-b')).rejects.toThrow('Failed to read prompt for stage "problem-b"')
  })
})

describe('resolvePackPath', () => {
  it('treats bare names as built-in packs and anything with a separator as a path', () => {
    expect(resolvePackPath('two-phase', '/packs')).toBe(join('/packs', 'two-phase'))
    expect(resolvePackPath('/abs/pack')).toBe('/abs/pack')
  })
})

function testManifestStagesWithout(name: string): unknown[] {
  const stages = testManifest()['stages']
  return Array.isArray(stages) ? stages.filter((s) => typeof s === 'object' && s !== null && 'name' in s && s.name !== name) : []
}

function testManifestStagesWith(name: string, extra: Record<string, unknown>): unknown[] {
  const stages = testManifest()['stages']
  return Array.isArray(stages)
    ? stages.map((s) => (typeof s === 'object' && s !== null && 'name' in s && s.name === name ? { ...s, ...extra } : s))
    : []
}
