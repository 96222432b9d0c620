import type { NodeAttributes } from './types'
import { RELATION_KEY, ROOT_RELATION } from './graphBuilder'

export const UNKNOWN_VALUE = '不明'

export type DescriptionRow = readonly [label: string, value: string]

/**
 * Label/value pairs shown for a node. Roots carry only their Relation;
 * other nodes list every dynamic column, with a placeholder for columns
 * their map lacks. Markup is left to the caller.
 */
export function describeNode(
  _nodeId: string,
  attributes: NodeAttributes,
  isRoot: boolean,
  columns: readonly string[],
): DescriptionRow[] {
  const valueOf = (key: string, fallback: string) =>
    Object.prototype.hasOwnProperty.call(attributes, key) ? attributes[key] : fallback
  if (isRoot) return [[RELATION_KEY, valueOf(RELATION_KEY, ROOT_RELATION)]]
  return columns.map((col) => [col, valueOf(col, UNKNOWN_VALUE)])
}

/** Width-normalized form for labels. Never use it as a key. */
export function displayId(id: string): string {
  return id.normalize('NFKC')
}

// Mathematical Sans-Serif Bold blocks
const BOLD_UPPER = 0x1d5d4
const BOLD_LOWER = 0x1d5ee
const BOLD_DIGIT = 0x1d7ec

export function toBold(text: string): string {
  let out = ''
  for (const ch of text) {
    const code = ch.charCodeAt(0)
    if (ch >= 'A' && ch <= 'Z') out += String.fromCodePoint(BOLD_UPPER + code - 65)
    else if (ch >= 'a' && ch <= 'z') out += String.fromCodePoint(BOLD_LOWER + code - 97)
    else if (ch >= '0' && ch <= '9') out += String.fromCodePoint(BOLD_DIGIT + code - 48)
    else out += ch
  }
  return out
}

export function formatHoverText(
  nodeId: string,
  attributes: NodeAttributes,
  isRoot: boolean,
  columns: readonly string[],
): string {
  const lines = [`【${toBold(displayId(nodeId))}】`, '']
  for (const [label, value] of describeNode(nodeId, attributes, isRoot, columns)) {
    lines.push(`${toBold(label)}: ${value}`)
  }
  return lines.join('\n')
}
