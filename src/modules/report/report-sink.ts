/**
 * Report sinks receive the final session document once, at completion.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { ReportError, errorMessage } from '../../core/errors.js'
import type { SessionDocument } from '../session/session-types.js'
import { artifactName, compileReport } from './report-compiler.js'

export interface ReportArtifact {
  name: string
  /** Where the artifact landed, e.g. the Markdown file path */
  location: string
}

export interface ReportSink {
  /**
   * @throws {ReportError} when the artifact cannot be written, or already exists
   */
  write(session: SessionDocument): Promise<ReportArtifact>
}

/**
 * Writes `{name}.md` and `{name}.json` into a directory. An artifact is
 * written once; a second write for the same session fails.
 */
export class FileReportSink implements ReportSink {
  private readonly _dir: string

  constructor(outputDir: string) {
    this._dir = resolve(outputDir)
  }

  async write(session: SessionDocument): Promise<ReportArtifact> {
    const name = artifactName(session)
    const markdownPath = join(this._dir, `${name}.md`)
    try {
      await mkdir(this._dir, { recursive: true })
      await writeFile(markdownPath, compileReport(session), { encoding: 'utf-8', flag: 'wx' })
      await writeFile(join(this._dir, `${name}.json`), `${JSON.stringify(session, null, 2)}\n`, {
        encoding: 'utf-8',
        flag: 'wx',
      })
    } catch (err) {
      const exists = err instanceof Error && 'code' in err && err.code === 'EEXIST'
      throw new ReportError(
        exists ? `Report "${name}" was already written` : `Failed to write report "${name}": ${errorMessage(err)}`,
        { name, dir: this._dir }
      )
    }
    return { name, location: markdownPath }
  }
}
