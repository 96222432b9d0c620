/**
 * Graph construction from Child/Parent rows.
 *
 * Attribute policy:
 *   Phase 1 merges each row's dynamic columns into its Child node only;
 *           a Parent is registered with an empty map and nothing else.
 *   Phase 2 replaces the map of every root with { Relation: 'ROOT' }.
 *
 * A node that is never a child and is not a root keeps an empty map.
 */
import type { LineageEdge, LineageGraph, LineageTable, NodeAttributes, Row } from './types'

export const CHILD_COLUMN = 'Child'
export const PARENT_COLUMN = 'Parent'
export const RELATION_KEY = 'Relation'
export const ROOT_RELATION = 'ROOT'
export const REUSE_RELATION = '流用'

export const NODE_FILL_COLOR = '#F0F8FF' // AliceBlue
export const RELATION_REUSE_COLOR = '#FFFFE0' // LightYellow

function cell(row: Row, column: string): string {
  return String(row[column] ?? '').trim()
}

function hasColumn(row: Row, column: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, column)
}

export function dynamicColumns(columns: string[]): string[] {
  return columns.filter((c) => c !== CHILD_COLUMN && c !== PARENT_COLUMN)
}

function collectNodes(rows: readonly Row[]) {
  const children = new Set<string>()
  const parents = new Set<string>()
  for (const row of rows) {
    const child = cell(row, CHILD_COLUMN)
    const parent = cell(row, PARENT_COLUMN)
    if (child) children.add(child)
    if (parent) parents.add(parent)
  }
  return { children, parents }
}

/** Identifiers that appear as a Parent somewhere and never as a Child. */
export function identifyRoots(rows: readonly Row[]): Set<string> {
  const { children, parents } = collectNodes(rows)
  const roots = new Set<string>()
  for (const parent of parents) {
    if (!children.has(parent)) roots.add(parent)
  }
  return roots
}

export function rowAttributes(row: Row, columns: readonly string[]): NodeAttributes {
  return Object.fromEntries(columns.filter((col) => hasColumn(row, col)).map((col) => [col, cell(row, col)]))
}

export function mergeChildAttributes(rows: readonly Row[], columns: readonly string[]): Map<string, NodeAttributes> {
  const attributes = new Map<string, NodeAttributes>()
  for (const row of rows) {
    const child = cell(row, CHILD_COLUMN)
    const parent = cell(row, PARENT_COLUMN)
    if (child) {
      attributes.set(child, { ...(attributes.get(child) ?? {}), ...rowAttributes(row, columns) })
    }
    if (parent && !attributes.has(parent)) {
      attributes.set(parent, {})
    }
  }
  return attributes
}

export function applyRootAttributes(attributes: Map<string, NodeAttributes>, roots: ReadonlySet<string>): Map<string, NodeAttributes> {
  for (const root of roots) {
    if (attributes.has(root)) attributes.set(root, { [RELATION_KEY]: ROOT_RELATION })
  }
  return attributes
}

export function buildGraph(
  rows: readonly Row[],
  columns: readonly string[],
): { attributes: Map<string, NodeAttributes>; roots: Set<string> } {
  const roots = identifyRoots(rows)
  const attributes = applyRootAttributes(mergeChildAttributes(rows, columns), roots)
  return { attributes, roots }
}

export function colorFor(attributes: NodeAttributes): string {
  return hasColumn(attributes, RELATION_KEY) && attributes[RELATION_KEY] === REUSE_RELATION
    ? RELATION_REUSE_COLOR
    : NODE_FILL_COLOR
}

export function enumerateEdges(rows: readonly Row[]): LineageEdge[] {
  const edges: LineageEdge[] = []
  for (const row of rows) {
    const child = cell(row, CHILD_COLUMN)
    const parent = cell(row, PARENT_COLUMN)
    if (parent && child) edges.push([parent, child])
  }
  return edges
}

// Plain code-unit order; localeCompare would vary with the browser locale.
export function sortNodeIds(ids: Iterable<string>): string[] {
  return [...ids].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export function createLineageGraph(table: LineageTable): LineageGraph {
  const columns = dynamicColumns(table.columns)
  const { attributes, roots } = buildGraph(table.rows, columns)
  return {
    columns,
    attributes,
    roots,
    edges: enumerateEdges(table.rows),
    nodeIds: sortNodeIds(attributes.keys()),
  }
}
