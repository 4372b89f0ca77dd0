/**
 * PackLoader: loads and discovers pipeline packs.
 *
 * A pack is a directory holding `pipeline.yaml` and the prompt templates it
 * references.
 *
 * Usage:
 *   const loader = createPackLoader()
 *   const pack = await loader.load(resolvePackPath('two-phase'))
 */

import { existsSync } from 'node:fs'
import { access, readFile, readdir, stat } from 'node:fs/promises'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import yaml from 'js-yaml'
import { PipelineDefinitionError, errorMessage } from '../../core/errors.js'
import { PipelineManifestSchema } from './schemas.js'
import { PipelinePack } from './pipeline-pack.js'
import { validateStageGraph } from './stage-graph.js'

export const MANIFEST_FILE = 'pipeline.yaml'

export interface PackInfo {
  name: string
  description: string
  stageCount: number
  threshold: number
  path: string
}

export interface PackLoader {
  /**
   * Load a pack from a directory.
   * @throws {PipelineDefinitionError} if the manifest is missing or invalid,
   *   the stage graph is malformed, or referenced prompts are missing
   */
  load(packPath: string): Promise<PipelinePack>

  /**
   * Every loadable pack directly under `packsDir`; broken packs are skipped.
   */
  discover(packsDir: string): Promise<PackInfo[]>
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

class PackLoaderImpl implements PackLoader {
  async load(packPath: string): Promise<PipelinePack> {
    const manifestPath = join(packPath, MANIFEST_FILE)

    let raw: string
    try {
      raw = await readFile(manifestPath, 'utf-8')
    } catch (err) {
      throw new PipelineDefinitionError(
        `Cannot load pipeline pack at "${packPath}": ${MANIFEST_FILE} not found or unreadable. ${errorMessage(err)}`,
        { packPath }
      )
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      throw new PipelineDefinitionError(
        `Cannot load pipeline pack at "${packPath}": ${MANIFEST_FILE} contains invalid YAML. ${errorMessage(err)}`,
        { packPath }
      )
    }

    const result = PipelineManifestSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
      throw new PipelineDefinitionError(`Pipeline manifest at "${manifestPath}" failed validation:\n${issues}`, {
        packPath,
        issues: result.error.issues,
      })
    }

    const manifest = result.data
    const graphErrors = validateStageGraph(manifest.stages)
    if (graphErrors.length > 0) {
      throw new PipelineDefinitionError(
        `Pipeline "${manifest.name}" has an invalid stage graph:\n${graphErrors.map((e) => `  • ${e}`).join('\n')}`,
        { packPath, errors: graphErrors }
      )
    }

    const missing: string[] = []
    for (const stage of manifest.stages) {
      if (!(await fileExists(join(packPath, stage.prompt)))) {
        missing.push(`  • stage "${stage.name}" → ${stage.prompt} (not found)`)
      }
    }
    if (missing.length > 0) {
      throw new PipelineDefinitionError(
        `Pipeline pack at "${packPath}" references missing prompt files:\n${missing.join('\n')}`,
        { packPath }
      )
    }

    return new PipelinePack(manifest, packPath)
  }

  async discover(packsDir: string): Promise<PackInfo[]> {
    if (!(await fileExists(packsDir))) {
      return []
    }

    const packs: PackInfo[] = []
    for (const entry of (await readdir(packsDir)).sort()) {
      const entryPath = join(packsDir, entry)
      const info = await stat(entryPath)
      if (!info.isDirectory() || !(await fileExists(join(entryPath, MANIFEST_FILE)))) continue
      try {
        const pack = await this.load(entryPath)
        packs.push({
          name: pack.name,
          description: pack.manifest.description,
          stageCount: pack.manifest.stages.length,
          threshold: pack.manifest.threshold,
          path: entryPath,
        })
      } catch (err) {
        if (!(err instanceof PipelineDefinitionError)) throw err
      }
    }
    return packs
  }
}

export function createPackLoader(): PackLoader {
  return new PackLoaderImpl()
}

/**
 * Directory of the packs shipped with the package. Found by walking up from
 * this module so it works from both the sources and the build output.
 */
export function builtInPacksDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 6; i++) {
    const candidate = join(dir, 'packs')
    if (existsSync(join(candidate, 'two-phase', MANIFEST_FILE))) {
      return candidate
    }
    dir = dirname(dir)
  }
  throw new PipelineDefinitionError('Built-in pipeline packs directory not found')
}

/**
 * Resolve a pack reference: a path (absolute, or relative containing a
 * separator) is used as-is; a bare name refers to a built-in pack.
 */
export function resolvePackPath(ref: string, packsDir?: string): string {
  if (isAbsolute(ref) || ref.includes('/') || ref.includes('\\')) {
    return resolve(ref)
  }
  return join(packsDir ?? builtInPacksDir(), ref)
}
