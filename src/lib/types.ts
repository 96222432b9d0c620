export type Row = Record<string, string>

export type NodeAttributes = Record<string, string>

/** Directed parent → child pair, one per qualifying row. */
export type LineageEdge = readonly [parent: string, child: string]

export interface LineageTable {
  fileName: string
  sheetName?: string
  columns: string[] // Child, Parent, then the rest in source order
  rows: Row[]
}

export interface LineageGraph {
  columns: string[] // dynamic columns only
  attributes: ReadonlyMap<string, NodeAttributes>
  roots: ReadonlySet<string>
  edges: readonly LineageEdge[]
  nodeIds: readonly string[]
}

export type LoadErrorKind = 'schema' | 'parse' | 'unsupported'

export interface LoadError {
  kind: LoadErrorKind
  fileName: string
  message: string
  detail?: string
  hint?: string
}

export interface AppError {
  id: string
  fileName?: string
  message: string
  detail?: string
  hint?: string
}
