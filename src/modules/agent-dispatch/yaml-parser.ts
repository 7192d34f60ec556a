/**
 * YAML extraction and parsing for agent output.
 *
 * Agents emit a structured YAML block at the END of their output. This module
 * extracts and validates that block regardless of surrounding narrative text,
 * reasoning, or code fences.
 *
 * Extraction strategy:
 * 1. Look for fenced YAML blocks (```yaml...```) first, taking the LAST one
 * 2. Fall back to unfenced lines starting at the last known anchor key
 * 3. Parse with js-yaml and validate with the request's Zod schema
 */

import yaml from 'js-yaml'
import type { ZodType, ZodTypeDef } from 'zod'

// ---------------------------------------------------------------------------
// Known anchor keys that indicate the start of a YAML result block
// ---------------------------------------------------------------------------

const YAML_ANCHOR_KEYS = ['result:', 'verdict:']

// ---------------------------------------------------------------------------
// extractYamlBlock
// ---------------------------------------------------------------------------

/**
 * Extract the YAML result block from agent output.
 *
 * @returns The raw YAML string, or null if no block is found
 */
export function extractYamlBlock(output: string): string | null {
  if (!output || output.trim() === '') {
    return null
  }

  const fencedResult = extractLastFencedYaml(output)
  if (fencedResult !== null) {
    return fencedResult
  }

  return extractUnfencedYaml(output)
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

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
 * Collect every line from the last anchor-key line to the end of the output.
 */
function extractUnfencedYaml(output: string): string | null {
  const lines = output.split('\n')

  let anchorLineIdx = -1
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]
    if (line !== undefined && isAnchorLine(line)) {
      anchorLineIdx = i
      break
    }
  }

  if (anchorLineIdx === -1) {
    return null
  }

  const yamlText = lines.slice(anchorLineIdx).join('\n').trim()
  return yamlText !== '' ? yamlText : null
}

function isAnchorLine(line: string): boolean {
  const trimmed = line.trim()
  return YAML_ANCHOR_KEYS.some((key) => trimmed.startsWith(key))
}

function containsAnchorKey(content: string): boolean {
  return YAML_ANCHOR_KEYS.some((key) => content.includes(key))
}

// ---------------------------------------------------------------------------
// parseYamlResult
// ---------------------------------------------------------------------------

/**
 * Parse a YAML string and validate it against a Zod schema.
 *
 * @returns Object with parsed result, or an error describing why there is none
 */
export function parseYamlResult<T>(
  yamlText: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): { parsed: T | null; error: string | null } {
  let raw: unknown

  try {
    raw = yaml.load(yamlText)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { parsed: null, error: `YAML parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { parsed: null, error: 'YAML parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { parsed: result.data, error: null }
  }

  return {
    parsed: null,
    error: `Schema validation error: ${result.error.message}`,
  }
}
