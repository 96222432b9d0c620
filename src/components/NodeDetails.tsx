import type { LineageGraph } from '../lib/types'
import { describeNode, displayId } from '../lib/describe'

interface NodeDetailsProps {
  graph: LineageGraph
  selectedId: string
  onSelect: (id: string) => void
}

export default function NodeDetails({ graph, selectedId, onSelect }: NodeDetailsProps) {
  const known = selectedId !== '' && graph.attributes.has(selectedId)
  const rows = known
    ? describeNode(selectedId, graph.attributes.get(selectedId) ?? {}, graph.roots.has(selectedId), graph.columns)
    : []
  return (
    <section className="node-details">
      <h2>Details</h2>
      <label className="node-details__picker">
        Drawing
        <select value={known ? selectedId : ''} onChange={(e) => onSelect(e.target.value)}>
          <option value="">Select…</option>
          {graph.nodeIds.map((id) => (
            <option key={id} value={id}>{displayId(id)}</option>
          ))}
        </select>
      </label>
      {known ? (
        <div className="node-details__body">
          <h3>
            {displayId(selectedId)}
            {graph.roots.has(selectedId) && <span className="node-details__root">Root</span>}
          </h3>
          <dl>
            {rows.map(([label, value]) => (
              <div key={label} className="node-details__row">
                <dt>{label}</dt>
                <dd>{value || '—'}</dd>
              </div>
            ))}
          </dl>
        </div>
      ) : (
        <p className="node-details__hint">Pick a drawing above or click a node to see its details.</p>
      )}
    </section>
  )
}
