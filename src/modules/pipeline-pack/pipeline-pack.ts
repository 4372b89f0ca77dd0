/**
 * A loaded pipeline pack: validated manifest plus lazily read prompt templates.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { PipelineDefinitionError, errorMessage } from '../../core/errors.js'
import type { PipelineManifest, StageDefinition, StageGroup } from './schemas.js'

export class PipelinePack {
  readonly manifest: PipelineManifest
  readonly path: string
  private readonly _promptCache = new Map<string, string>()

  constructor(manifest: PipelineManifest, packPath: string) {
    this.manifest = manifest
    this.path = packPath
  }

  get name(): string {
    return this.manifest.name
  }

  /** Stages in declaration order, optionally limited to one group */
  getStages(group?: StageGroup): StageDefinition[] {
    return group === undefined ? [...this.manifest.stages] : this.manifest.stages.filter((s) => s.group === group)
  }

  /**
   * @throws {PipelineDefinitionError} for unknown stage names
   */
  getStage(name: string): StageDefinition {
    const stage = this.manifest.stages.find((s) => s.name === name)
    if (stage === undefined) {
      throw new PipelineDefinitionError(`Pipeline "${this.name}" has no stage "${name}"`, { stage: name })
    }
    return stage
  }

  /** Elimination bar, falling back to the given session threshold */
  eliminationBar(threshold: number): number {
    return this.manifest.elimination_bar ?? threshold
  }

  timeoutFor(stage: StageDefinition): number {
    return stage.timeout_ms ?? this.manifest.stage_timeout_ms
  }

  /** Raw prompt template for a stage, read once and cached */
  async getPrompt(stageName: string): Promise<string> {
    const cached = this._promptCache.get(stageName)
    if (cached !== undefined) return cached

    const stage = this.getStage(stageName)
    const filePath = join(this.path, stage.prompt)
    let content: string
    try {
      content = await readFile(filePath, 'utf-8')
    } catch (err) {
      throw new PipelineDefinitionError(
        `Failed to read prompt for stage "${stageName}" at "${filePath}": ${errorMessage(err)}`,
        { stage: stageName, filePath }
      )
    }
    this._promptCache.set(stageName, content)
    return content
  }
}
