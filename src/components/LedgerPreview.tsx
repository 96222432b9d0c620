import type { LineageTable } from '../lib/types'

interface LedgerPreviewProps {
  table: LineageTable
}

export default function LedgerPreview({ table }: LedgerPreviewProps) {
  return (
    <details className="ledger-preview">
      <summary>Ledger data</summary>
      <div className="table-preview__meta">
        Rows: {table.rows.length} · Columns: {table.columns.length}
      </div>
      <div className="table-preview__table-wrapper">
        <table className="table-preview__table">
          <thead>
            <tr>
              {table.columns.map((c) => (
                <th key={c}>{c}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {table.rows.map((row, idx) => (
              <tr key={idx}>
                {table.columns.map((c) => (
                  <td key={c}>{row[c] ?? ''}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </details>
  )
}
