import type { AppError } from '../lib/types'

interface ErrorPanelProps {
  errors: AppError[]
  onSelect: (err: AppError) => void
  onDismiss: (id: string) => void
  onClear: () => void
}

export default function ErrorPanel({ errors, onSelect, onDismiss, onClear }: ErrorPanelProps) {
  if (errors.length === 0) return null
  return (
    <div className="error-panel">
      <div className="error-panel__header">
        <span>Errors</span>
        <button className="error-panel__clear" onClick={onClear}>Clear all</button>
      </div>
      <ul className="error-list">
        {errors.map((err) => (
          <li key={err.id} className="error-item">
            <button className="error-item__message" onClick={() => onSelect(err)}>
              {err.fileName ? `${err.fileName}: ` : ''}{err.message}
            </button>
            <button className="error-item__dismiss" onClick={() => onDismiss(err.id)} aria-label="Dismiss">×</button>
          </li>
        ))}
      </ul>
    </div>
  )
}

interface ErrorModalProps {
  error: AppError
  onClose: () => void
}

export function ErrorModal({ error, onClose }: ErrorModalProps) {
  return (
    <div className="modal" onClick={onClose}>
      <div className="modal__content" role="dialog" onClick={(e) => e.stopPropagation()}>
        <div className="modal__header">
          <h3>Error{error.fileName ? ` · ${error.fileName}` : ''}</h3>
          <button onClick={onClose}>Close</button>
        </div>
        <div className="modal__body">
          <p>{error.message}</p>
          {error.hint && <p className="error-hint">{error.hint}</p>}
          {error.detail && <pre className="error-detail">{error.detail}</pre>}
        </div>
      </div>
    </div>
  )
}
