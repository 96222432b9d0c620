import type { LineageGraph } from './types'
import { colorFor } from './graphBuilder'
import { displayId, formatHoverText } from './describe'
import { escapeHtml } from './staticDiagram'

export interface NetworkNode {
  id: string
  label: string
  title: string
  shape: 'box'
  color: { background: string; border: string }
  font: { face: string }
}

export interface NetworkEdge {
  id: string
  from: string
  to: string
  arrows: 'to'
}

export const NETWORK_OPTIONS = {
  layout: { hierarchical: { enabled: true, direction: 'UD', sortMethod: 'directed' } },
  physics: { enabled: false },
  interaction: { navigationButtons: true, keyboard: true, hover: true },
  edges: { smooth: false },
} as const

export interface InteractiveNetwork {
  nodes: NetworkNode[]
  edges: NetworkEdge[]
  options: typeof NETWORK_OPTIONS
}

export interface InteractiveHtmlOptions {
  /** vis-network standalone build, inlined into the page */
  scriptSource: string
  fontName: string
  title?: string
}

const BORDER_COLOR = '#4A5568'

export function buildInteractiveNetwork(graph: LineageGraph, fontName: string): InteractiveNetwork {
  const nodes = graph.nodeIds.map((id): NetworkNode => {
    const attributes = graph.attributes.get(id) ?? {}
    return {
      id,
      label: displayId(id),
      title: formatHoverText(id, attributes, graph.roots.has(id), graph.columns),
      shape: 'box',
      color: { background: colorFor(attributes), border: BORDER_COLOR },
      font: { face: fontName },
    }
  })
  const edges = graph.edges.map(([from, to], idx): NetworkEdge => ({ id: `e${idx}`, from, to, arrows: 'to' }))
  return { nodes, edges, options: NETWORK_OPTIONS }
}

/** Script text that cannot close or comment out the surrounding script element. */
export function scriptSafeSource(source: string): string {
  return source.replace(/<\/(script)/gi, '<\\/$1').replace(/<!--/g, '<\\!--')
}

/** JSON that cannot close the surrounding script element. */
export function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')
}

export function toInteractiveHtml(graph: LineageGraph, options: InteractiveHtmlOptions): string {
  const title = options.title ?? 'Lineage Tree'
  const network = buildInteractiveNetwork(graph, options.fontName)
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<script>
${scriptSafeSource(options.scriptSource)}
</script>
<style>
html, body { margin: 0; height: 100%; }
#network { width: 100%; height: 100vh; }
</style>
</head>
<body>
<div id="network"></div>
<script>
const data = ${scriptSafeJson(network)};
new vis.Network(
  document.getElementById('network'),
  { nodes: new vis.DataSet(data.nodes), edges: new vis.DataSet(data.edges) },
  data.options,
);
</script>
</body>
</html>
`
}

// Loaded on first export so the library stays out of the main chunk
export async function loadNetworkScript(): Promise<string> {
  const { default: source } = await import('vis-network/standalone/umd/vis-network.min.js?raw')
  return source
}
