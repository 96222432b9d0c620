import type { LineageEdge } from './types'

export const LEVEL_GAP = 200
export const COLUMN_GAP = 260

export type Position = { x: number; y: number }

/**
 * Breadth-first depth of every node. Nodes without incoming edges seed the
 * search first; whatever is still unplaced afterwards (cycles) is seeded in
 * id order.
 */
export function computeLevels(nodeIds: readonly string[], edges: readonly LineageEdge[]): Map<string, number> {
  const children = new Map<string, string[]>()
  const incoming = new Set<string>()
  for (const [parent, child] of edges) {
    const list = children.get(parent) ?? []
    list.push(child)
    children.set(parent, list)
    incoming.add(child)
  }

  const levels = new Map<string, number>()
  const bfs = (seeds: string[]) => {
    const queue = seeds.filter((s) => !levels.has(s))
    queue.forEach((s) => levels.set(s, 0))
    while (queue.length) {
      const current = queue.shift()
      if (current === undefined) break
      const depth = levels.get(current) ?? 0
      for (const child of children.get(current) ?? []) {
        if (levels.has(child)) continue
        levels.set(child, depth + 1)
        queue.push(child)
      }
    }
  }

  bfs(nodeIds.filter((id) => !incoming.has(id)))
  for (const id of nodeIds) {
    if (!levels.has(id)) bfs([id])
  }
  return levels
}

/** Top-down layered positions, each level centred on x = 0. */
export function layoutHierarchy(nodeIds: readonly string[], edges: readonly LineageEdge[]): Map<string, Position> {
  const levels = computeLevels(nodeIds, edges)
  const byLevel = new Map<number, string[]>()
  for (const id of nodeIds) {
    const level = levels.get(id) ?? 0
    byLevel.set(level, [...(byLevel.get(level) ?? []), id])
  }
  const positions = new Map<string, Position>()
  for (const [level, ids] of byLevel) {
    ids.forEach((id, idx) => {
      positions.set(id, { x: (idx - (ids.length - 1) / 2) * COLUMN_GAP, y: level * LEVEL_GAP })
    })
  }
  return positions
}
