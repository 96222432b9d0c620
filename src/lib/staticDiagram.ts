import type { LineageGraph } from './types'
import { colorFor } from './graphBuilder'
import { describeNode, displayId } from './describe'

export interface DotOptions {
  fontName: string
  title?: string
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function quoteId(id: string): string {
  return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/** Graphviz HTML-like label: bold identifier, then one row per attribute. */
export function nodeLabel(label: string, rows: readonly (readonly [string, string])[]): string {
  const cells = [
    `<TR><TD ALIGN="CENTER"><B><FONT POINT-SIZE="20">${escapeHtml(label)}</FONT></B></TD></TR>`,
    ...rows.map(([name, value]) =>
      `<TR><TD ALIGN="CENTER"><FONT POINT-SIZE="10">${escapeHtml(name)}: ${escapeHtml(value)}</FONT></TD></TR>`),
  ]
  return `<<TABLE BORDER="0" CELLBORDER="0" CELLSPACING="0">${cells.join('')}</TABLE>>`
}

export function toDot(graph: LineageGraph, options: DotOptions): string {
  const lines = [
    `digraph ${quoteId(options.title ?? 'Lineage Tree')} {`,
    '  graph [rankdir="TB"];',
    `  node [shape="box", style="filled", fontname=${quoteId(options.fontName)}];`,
  ]
  for (const id of graph.nodeIds) {
    const attributes = graph.attributes.get(id) ?? {}
    const rows = describeNode(id, attributes, graph.roots.has(id), graph.columns)
    lines.push(`  ${quoteId(id)} [label=${nodeLabel(displayId(id), rows)}, fillcolor="${colorFor(attributes)}"];`)
  }
  for (const [parent, child] of graph.edges) {
    lines.push(`  ${quoteId(parent)} -> ${quoteId(child)};`)
  }
  lines.push('}')
  return lines.join('\n') + '\n'
}
