/**
 * Unit tests for the `gauntlet config` command group
 *
 * Tests:
 *  - config show with defaults, JSON format and a single key
 *  - config export to stdout and to a file
 *  - Error handling for invalid config files
 */

import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import { runConfigExport, runConfigShow } from '../config.js'
import type { ConfigShowOptions } from '../config.js'
import { captureOutput, createCommandWorkspace } from '../../../../test/helpers/cli.js'
import type { CapturedOutput, CommandWorkspace } from '../../../../test/helpers/cli.js'

let workspace: CommandWorkspace
let output: CapturedOutput

beforeEach(async () => {
  workspace = await createCommandWorkspace()
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  await workspace.cleanup()
})

function dirs(): ConfigShowOptions {
  return { projectConfigDir: workspace.projectConfigDir, globalConfigDir: workspace.globalConfigDir, env: {} }
}

async function writeConfigYaml(content: string): Promise<void> {
  await writeFile(join(workspace.projectConfigDir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

describe('config show', () => {
  it('prints the merged defaults as YAML under a header', async () => {
    expect(await runConfigShow(dirs())).toBe(0)
    const text = output.stdout()
    expect(text.startsWith('# Gauntlet configuration (credentials masked)\n\n')).toBe(true)
    expect(yaml.load(text)).toEqual(DEFAULT_CONFIG)
  })

  it('prints JSON', async () => {
    await writeConfigYaml('pipeline:\n  pack: sequential\n')
    expect(await runConfigShow({ ...dirs(), format: 'json' })).toBe(0)
    expect(JSON.parse(output.stdout())).toEqual({
      ...DEFAULT_CONFIG,
      pipeline: { ...DEFAULT_CONFIG.pipeline, pack: 'sequential' },
    })
  })

  it('prints a single scalar key', async () => {
    expect(await runConfigShow({ ...dirs(), key: 'pipeline.pack' })).toBe(0)
    expect(output.stdout()).toBe('two-phase\n')
  })

  it('prints a section as YAML', async () => {
    expect(await runConfigShow({ ...dirs(), key: 'similarity' })).toBe(0)
    expect(output.stdout()).toBe('threshold: 0.5\nlimit: 3\n')
  })

  it('exits 2 for an unknown key', async () => {
    expect(await runConfigShow({ ...dirs(), key: 'pipeline.nope' })).toBe(2)
    expect(output.stderr()).toBe('Unknown configuration key: pipeline.nope\n')
  })

  it('exits 2 when a config file is invalid', async () => {
    await writeConfigYaml('pipeline:\n  threshold: 20\n')
    expect(await runConfigShow(dirs())).toBe(2)
    expect(output.stderr()).toMatch(/^Configuration error: Invalid config file at /)
  })
})

// ---------------------------------------------------------------------------
// config export
// ---------------------------------------------------------------------------

describe('config export', () => {
  it('writes YAML to stdout', async () => {
    expect(await runConfigExport(dirs())).toBe(0)
    expect(yaml.load(output.stdout())).toEqual(DEFAULT_CONFIG)
  })

  it('writes to a file', async () => {
    const target = join(workspace.dir, 'exported.json')
    expect(await runConfigExport({ ...dirs(), output: target, format: 'json' })).toBe(0)
    expect(output.stdout()).toBe(`Configuration exported to ${target}\n`)
    expect(JSON.parse(await readFile(target, 'utf-8'))).toEqual(DEFAULT_CONFIG)
  })

  it('exits 1 when the file cannot be written', async () => {
    const target = join(workspace.dir, 'no-such-dir', 'exported.yaml')
    expect(await runConfigExport({ ...dirs(), output: target })).toBe(1)
    expect(output.stderr()).toMatch(/^Error: Failed to write file: /)
  })
})
