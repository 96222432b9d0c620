import { MarkerType } from 'reactflow'
import type { Edge, Node } from 'reactflow'
import type { LineageGraph } from './types'
import type { LineageNodeData } from '../components/LineageNode'
import { colorFor } from './graphBuilder'
import { describeNode, displayId, formatHoverText } from './describe'
import { layoutHierarchy } from './layout'

export function edgeId(index: number, parent: string, child: string): string {
  return `e${index}:${parent}->${child}`
}

export function toFlowElements(graph: LineageGraph): { nodes: Node<LineageNodeData>[]; edges: Edge[] } {
  const positions = layoutHierarchy(graph.nodeIds, graph.edges)
  const nodes = graph.nodeIds.map((id) => {
    const attributes = graph.attributes.get(id) ?? {}
    const isRoot = graph.roots.has(id)
    return {
      id,
      type: 'lineageNode',
      position: positions.get(id) ?? { x: 0, y: 0 },
      data: {
        nodeId: id,
        label: displayId(id),
        rows: describeNode(id, attributes, isRoot, graph.columns),
        isRoot,
        fillColor: colorFor(attributes),
        hoverText: formatHoverText(id, attributes, isRoot, graph.columns),
      },
    }
  })
  // Row position keeps duplicate parent/child pairs distinct
  const edges = graph.edges.map(([parent, child], idx) => ({
    id: edgeId(idx, parent, child),
    source: parent,
    target: child,
    markerEnd: { type: MarkerType.ArrowClosed, width: 18, height: 18 },
  }))
  return { nodes, edges }
}
