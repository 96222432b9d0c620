import { useCallback, useEffect, useMemo, useRef, useState } from 'react'
import ReactFlow, { Background, Controls, MiniMap, ReactFlowProvider, applyNodeChanges } from 'reactflow'
import type { Edge, Node, NodeMouseHandler, OnNodesChange } from 'reactflow'
import { saveAs } from 'file-saver'
import 'reactflow/dist/style.css'
import './App.css'
import { loadTable, ACCEPTED_EXTENSIONS } from './lib/loadTable'
import { createLineageGraph, NODE_FILL_COLOR } from './lib/graphBuilder'
import { toFlowElements } from './lib/flowElements'
import { toDot } from './lib/staticDiagram'
import { renderSvg, RenderBackendError } from './lib/graphvizBackend'
import { svgToPdf } from './lib/pdfExport'
import { loadNetworkScript, toInteractiveHtml } from './lib/interactiveExport'
import { config, detectPlatform, resolveLabelFont } from './lib/config'
import type { AppError, LineageGraph, LineageTable } from './lib/types'
import LineageNode, { type LineageNodeData } from './components/LineageNode'
import NodeDetails from './components/NodeDetails'
import ErrorPanel, { ErrorModal } from './components/ErrorPanel'
import LedgerPreview from './components/LedgerPreview'

const nodeTypes = { lineageNode: LineageNode }
const EXPORT_BASENAME = 'lineage_tree'
const LABEL_FONT = resolveLabelFont(detectPlatform(navigator.userAgent), config.labelFont)

type ExportFormat = 'pdf' | 'svg' | 'dot' | 'html'

function makeErrorId(): string {
  return typeof crypto !== 'undefined' && 'randomUUID' in crypto
    ? crypto.randomUUID()
    : `err-${Date.now()}-${Math.random().toString(16).slice(2)}`
}

function App() {
  const [table, setTable] = useState<LineageTable | null>(null)
  const [graph, setGraph] = useState<LineageGraph | null>(null)
  const [nodes, setNodes] = useState<Node<LineageNodeData>[]>([])
  const [edges, setEdges] = useState<Edge[]>([])
  const [errors, setErrors] = useState<AppError[]>([])
  const [selectedError, setSelectedError] = useState<AppError | null>(null)
  const [selectedId, setSelectedId] = useState('')
  const [exporting, setExporting] = useState<ExportFormat | null>(null)
  const [aboutOpen, setAboutOpen] = useState(false)
  const [dragOverlay, setDragOverlay] = useState(false)

  const fileInputRef = useRef<HTMLInputElement>(null)
  const dragCounterRef = useRef(0)
  const loadSeqRef = useRef(0)

  const pushError = useCallback((error: Omit<AppError, 'id'>) => {
    setErrors((prev) => prev.concat({ id: makeErrorId(), ...error }))
  }, [])

  const handleErrorDismiss = useCallback((id: string) => {
    setErrors((prev) => prev.filter((e) => e.id !== id))
    setSelectedError((prev) => (prev?.id === id ? null : prev))
  }, [])

  const clearErrors = useCallback(() => {
    setErrors([])
    setSelectedError(null)
  }, [])

  const onFile = useCallback(async (file: File) => {
    const seq = ++loadSeqRef.current
    const { table: loaded, errors: loadErrors } = await loadTable(file, { sheetName: config.sheetName })
    // Only the most recently opened file may replace the view
    if (seq !== loadSeqRef.current) {
      console.warn(`[Loader] Discarding ${file.name}; a newer file was opened`)
      return
    }
    for (const err of loadErrors) {
      pushError({ fileName: err.fileName, message: err.message, detail: err.detail, hint: err.hint })
    }
    const next = createLineageGraph(loaded)
    const elements = toFlowElements(next)
    setTable(loaded)
    setGraph(next)
    setNodes(elements.nodes)
    setEdges(elements.edges)
    setSelectedId('')
  }, [pushError])

  const handleFiles = useCallback((files: FileList | File[]) => {
    const list = Array.from(files)
    if (list.length > 1) console.warn(`[Loader] ${list.length} files dropped; loading ${list[0].name} only`)
    if (list.length) void onFile(list[0])
  }, [onFile])

  useEffect(() => {
    const hasFiles = (e: DragEvent) => Array.from(e.dataTransfer?.types ?? []).includes('Files')
    const handleDragEnter = (e: DragEvent) => {
      if (!hasFiles(e)) return
      e.preventDefault()
      dragCounterRef.current += 1
      setDragOverlay(true)
    }
    const handleDragOver = (e: DragEvent) => {
      if (!hasFiles(e)) return
      e.preventDefault()
    }
    const handleDragLeave = (e: DragEvent) => {
      if (!hasFiles(e)) return
      e.preventDefault()
      dragCounterRef.current = Math.max(dragCounterRef.current - 1, 0)
      if (dragCounterRef.current === 0) setDragOverlay(false)
    }
    const handleDrop = (e: DragEvent) => {
      if (!hasFiles(e)) return
      e.preventDefault()
      dragCounterRef.current = 0
      setDragOverlay(false)
      const files = e.dataTransfer?.files
      if (files?.length) handleFiles(files)
    }
    window.addEventListener('dragenter', handleDragEnter)
    window.addEventListener('dragover', handleDragOver)
    window.addEventListener('dragleave', handleDragLeave)
    window.addEventListener('drop', handleDrop)
    return () => {
      window.removeEventListener('dragenter', handleDragEnter)
      window.removeEventListener('dragover', handleDragOver)
      window.removeEventListener('dragleave', handleDragLeave)
      window.removeEventListener('drop', handleDrop)
    }
  }, [handleFiles])

  const handleFileInput = useCallback((e: React.ChangeEvent<HTMLInputElement>) => {
    if (e.target.files?.length) handleFiles(e.target.files)
    // Allow picking the same file again after editing it
    e.target.value = ''
  }, [handleFiles])

  const onNodesChange: OnNodesChange = useCallback((changes) => {
    setNodes((nds) => applyNodeChanges(changes, nds))
  }, [])

  const onNodeClick: NodeMouseHandler = useCallback((_event, node) => {
    setSelectedId(node.id)
  }, [])

  const runExport = useCallback(async (format: ExportFormat) => {
    if (!graph) return
    setExporting(format)
    try {
      const fileName = `${EXPORT_BASENAME}.${format}`
      if (format === 'dot') {
        saveAs(new Blob([toDot(graph, { fontName: LABEL_FONT })], { type: 'text/vnd.graphviz;charset=utf-8' }), fileName)
      } else if (format === 'html') {
        const scriptSource = await loadNetworkScript()
        const html = toInteractiveHtml(graph, { scriptSource, fontName: LABEL_FONT })
        saveAs(new Blob([html], { type: 'text/html;charset=utf-8' }), fileName)
      } else {
        const svg = await renderSvg(toDot(graph, { fontName: LABEL_FONT }))
        const blob = format === 'svg' ? new Blob([svg], { type: 'image/svg+xml;charset=utf-8' }) : await svgToPdf(svg)
        saveAs(blob, fileName)
      }
    } catch (err) {
      console.error(`[Export] ${format} export failed`, err)
      if (err instanceof RenderBackendError) {
        pushError({ message: err.message, hint: err.hint, detail: err.detail })
      } else {
        pushError({
          message: `Could not export ${format.toUpperCase()}`,
          detail: err instanceof Error ? err.message : String(err),
        })
      }
    } finally {
      setExporting(null)
    }
  }, [graph, pushError])

  const summary = useMemo(() => {
    if (!graph) return ''
    return `Drawings: ${graph.nodeIds.length} · Links: ${graph.edges.length} · Roots: ${graph.roots.size}`
  }, [graph])

  const canExport = graph !== null && graph.nodeIds.length > 0 && exporting === null

  return (
    <div className="app">
      <header className="topbar">
        <nav className="menu-bar">
          <button className="menu-button" onClick={() => fileInputRef.current?.click()}>Open ledger</button>
          <button className="menu-button" onClick={() => setAboutOpen(true)}>About</button>
        </nav>
        <div className="app-brand">
          <div className="app-title">Lineage Tree</div>
          {table && <div className="app-file">{table.fileName}{table.sheetName ? ` · ${table.sheetName}` : ''}</div>}
        </div>
      </header>

      <input
        ref={fileInputRef}
        type="file"
        aria-label="Ledger file"
        accept={ACCEPTED_EXTENSIONS.join(',')}
        style={{ display: 'none' }}
        onChange={handleFileInput}
      />

      <div className="app-body">
        <aside className="sidebar">
          <ErrorPanel errors={errors} onSelect={setSelectedError} onDismiss={handleErrorDismiss} onClear={clearErrors} />
          {graph && <p className="summary">{summary}</p>}
          {graph && graph.nodeIds.length > 0 && (
            <NodeDetails graph={graph} selectedId={selectedId} onSelect={setSelectedId} />
          )}
          <section className="export-section">
            <h2>Export</h2>
            <div className="export-buttons">
              {(['pdf', 'svg', 'dot', 'html'] as const).map((format) => (
                <button key={format} disabled={!canExport} onClick={() => void runExport(format)}>
                  {exporting === format ? 'Exporting…' : format.toUpperCase()}
                </button>
              ))}
            </div>
          </section>
        </aside>

        <main className="canvas">
          {!graph && <div className="canvas__empty">Open a ledger file or drop it here.</div>}
          {graph && graph.nodeIds.length === 0 && (
            <div className="canvas__empty">Nothing to render: the ledger has no lineage rows.</div>
          )}
          {graph && graph.nodeIds.length > 0 && (
            <div className="canvas__flow">
              <ReactFlow
                nodes={nodes}
                edges={edges}
                nodeTypes={nodeTypes}
                onNodesChange={onNodesChange}
                onNodeClick={onNodeClick}
                nodesConnectable={false}
                fitView
              >
                <MiniMap nodeColor={(n) => n.data?.fillColor ?? NODE_FILL_COLOR} />
                <Controls showInteractive={false} />
                <Background gap={16} />
              </ReactFlow>
            </div>
          )}
          {table && table.rows.length > 0 && <LedgerPreview table={table} />}
        </main>
      </div>

      {dragOverlay && <div className="drag-overlay">Drop the ledger to load it</div>}

      {selectedError && <ErrorModal error={selectedError} onClose={() => setSelectedError(null)} />}

      {aboutOpen && (
        <div className="modal" onClick={() => setAboutOpen(false)}>
          <div className="modal__content" onClick={(e) => e.stopPropagation()}>
            <div className="modal__header">
              <h3>About</h3>
              <button onClick={() => setAboutOpen(false)}>Close</button>
            </div>
            <div className="modal__body">
              <p><strong>Lineage Tree</strong></p>
              <p>Version: {config.version}{config.gitCommit ? ` (${config.gitCommit})` : ''}</p>
              <p>Worksheet: {config.sheetName} · Label font: {LABEL_FONT}</p>
            </div>
          </div>
        </div>
      )}
    </div>
  )
}

export default function WrappedApp() {
  return (
    <ReactFlowProvider>
      <App />
    </ReactFlowProvider>
  )
}
