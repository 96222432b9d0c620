import { memo } from 'react'
import { Handle, Position } from 'reactflow'
import type { NodeProps } from 'reactflow'
import type { DescriptionRow } from '../lib/describe'
import './LineageNode.css'

export type LineageNodeData = {
  nodeId: string
  label: string
  rows: DescriptionRow[]
  isRoot: boolean
  fillColor: string
  hoverText: string
}

function LineageNodeInner({ data, selected }: NodeProps<LineageNodeData>) {
  return (
    <div
      className={['lineage-node', data.isRoot ? 'lineage-node--root' : '', selected ? 'lineage-node--selected' : ''].join(' ')}
      style={{ backgroundColor: data.fillColor }}
      title={data.hoverText}
      data-node-id={data.nodeId}
    >
      <Handle type="target" position={Position.Top} className="lineage-node__handle" isConnectable={false} />
      <div className="lineage-node__header">
        <span className="lineage-node__id">{data.label}</span>
        {data.isRoot && <span className="lineage-node__badge" aria-label="Root drawing">Root</span>}
      </div>
      <dl className="lineage-node__attrs">
        {data.rows.map(([label, value]) => (
          <div className="lineage-node__attr" key={label}>
            <dt>{label}</dt>
            <dd>{value}</dd>
          </div>
        ))}
      </dl>
      <Handle type="source" position={Position.Bottom} className="lineage-node__handle" isConnectable={false} />
    </div>
  )
}

const LineageNode = memo(LineageNodeInner)
export default LineageNode
