/**
 * YAML extraction and parsing for stage output.
 *
 * Stages emit a structured YAML block at the END of their output. This module
 * finds that block regardless of the narrative text, reasoning or code fences
 * around it.
 *
 * Extraction strategy:
 * 1. Fenced blocks (```yaml ... ```) containing an anchor key; the LAST wins
 * 2. Otherwise, unfenced lines from the last line starting with an anchor key
 * 3. Parse with js-yaml, then validate with a zod schema
 */

import yaml from 'js-yaml'
import type { ZodType, ZodTypeDef } from 'zod'

const YAML_ANCHOR_KEYS = ['result:', 'summary:', 'scores:']

/**
 * Extract the YAML result block from stage output.
 *
 * @returns The raw YAML string, or null if no block is found
 */
export function extractYamlBlock(output: string): string | null {
  if (output.trim() === '') {
    return null
  }

  const fencedResult = extractLastFencedYaml(output)
  if (fencedResult !== null) {
    return fencedResult
  }

  return extractUnfencedYaml(output)
}

function extractLastFencedYaml(output: string): string | null {
  const fencePattern = /```(?:ya?ml)?\s*\n([\s\S]*?)```/g

  let lastMatch: string | null = null
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '' && containsAnchorKey(content)) {
      lastMatch = content.trim()
    }
  }

  return lastMatch
}

/**
 * Walk up from the end while lines still look like YAML; the block starts at
 * the highest top-level anchor line reached. Falls back to the last anchor line
 * when trailing prose follows the block.
 */
function extractUnfencedYaml(output: string): string | null {
  const lines = output.split('\n')

  let start = -1
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? ''
    if (!looksLikeYaml(line)) break
    if (isTopLevelAnchor(line)) start = i
  }

  if (start === -1) {
    for (let i = lines.length - 1; i >= 0; i--) {
      if (isTopLevelAnchor(lines[i] ?? '')) {
        start = i
        break
      }
    }
  }

  if (start === -1) {
    return null
  }

  const yamlText = lines.slice(start).join('\n').trim()
  return yamlText !== '' ? yamlText : null
}

function looksLikeYaml(line: string): boolean {
  return line.trim() === '' || /^\s/.test(line) || line.startsWith('- ') || /^[A-Za-z_][\w-]*:(\s|$)/.test(line)
}

function isTopLevelAnchor(line: string): boolean {
  return YAML_ANCHOR_KEYS.some((key) => line.startsWith(key))
}

function containsAnchorKey(content: string): boolean {
  return YAML_ANCHOR_KEYS.some((key) => content.includes(key))
}

export type YamlParseResult<T> =
  | { ok: true; parsed: T; error: null }
  | { ok: false; parsed: null; error: string }

/**
 * Parse a YAML string and validate it against a zod schema.
 */
export function parseYamlResult<T>(
  yamlText: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): YamlParseResult<T> {
  let raw: unknown

  try {
    raw = yaml.load(yamlText)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { ok: false, parsed: null, error: `YAML parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { ok: false, parsed: null, error: 'YAML parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { ok: true, parsed: result.data, error: null }
  }

  const issues = result.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
  return { ok: false, parsed: null, error: `Schema validation error: ${issues}` }
}
