import { render, screen, fireEvent, waitFor, act } from '@testing-library/react'
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { saveAs } from 'file-saver'
import App from './App'
import { renderSvg, RenderBackendError } from './lib/graphvizBackend'
import { loadTable, type LoadResult } from './lib/loadTable'

// jsdom cannot measure the flow canvas; render a stand-in that exposes the elements
vi.mock('reactflow', async (importOriginal) => {
  const actual = await importOriginal<typeof import('reactflow')>()
  const { createElement } = await import('react')
  return {
    ...actual,
    default: ({ nodes, edges }: { nodes: unknown[]; edges: unknown[] }) =>
      createElement('div', { 'data-testid': 'flow' }, `${nodes.length} nodes, ${edges.length} edges`),
    MiniMap: () => null,
    Controls: () => null,
    Background: () => null,
  }
})

vi.mock('file-saver', () => ({ saveAs: vi.fn() }))

vi.mock('./lib/graphvizBackend', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./lib/graphvizBackend')>()
  return { ...actual, renderSvg: vi.fn() }
})

vi.mock('./lib/loadTable', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./lib/loadTable')>()
  return { ...actual, loadTable: vi.fn(actual.loadTable) }
})

vi.mock('./lib/interactiveExport', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./lib/interactiveExport')>()
  return { ...actual, loadNetworkScript: vi.fn(async () => 'var vis = {};') }
})

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

const csv = 'Child,Parent,Creator\nB-1,A-1,kato\nC-1,B-1,sato\n'

function openFile(content: string, name: string) {
  const file = new File([content], name, { type: 'text/csv' })
  fireEvent.change(screen.getByLabelText('Ledger file'), { target: { files: [file] } })
}

async function openLedger() {
  openFile(csv, 'ledger.csv')
  await screen.findByText('Drawings: 3 · Links: 2 · Roots: 1')
}

describe('App', () => {
  beforeEach(() => {
    vi.mocked(saveAs).mockReset()
    vi.mocked(renderSvg).mockReset()
  })

  it('asks for a ledger before anything is loaded', () => {
    render(<App />)
    expect(screen.getByText('Open a ledger file or drop it here.')).toBeInTheDocument()
    expect(screen.getByRole('button', { name: 'PDF' })).toBeDisabled()
  })

  it('builds the graph from a loaded ledger', async () => {
    render(<App />)
    openFile(csv, 'ledger.csv')
    expect(await screen.findByText('Drawings: 3 · Links: 2 · Roots: 1')).toBeInTheDocument()
    expect(screen.getByTestId('flow')).toHaveTextContent('3 nodes, 2 edges')
    expect(screen.getByRole('button', { name: 'DOT' })).toBeEnabled()
  })

  it('shows a message for a ledger without rows', async () => {
    render(<App />)
    openFile('Child,Parent\n', 'empty.csv')
    expect(await screen.findByText('Nothing to render: the ledger has no lineage rows.')).toBeInTheDocument()
    expect(screen.queryByTestId('flow')).toBeNull()
  })

  it('reports a schema error in the error panel', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    render(<App />)
    openFile('Name,Owner\nB-1,kato\n', 'wrong.csv')
    expect(await screen.findByText(/^wrong\.csv: Required columns not found/)).toBeInTheDocument()
  })

  it('saves the DOT source', async () => {
    render(<App />)
    await openLedger()
    fireEvent.click(screen.getByRole('button', { name: 'DOT' }))
    await waitFor(() => expect(saveAs).toHaveBeenCalledWith(expect.any(Blob), 'lineage_tree.dot'))
  })

  it('saves the rendered SVG', async () => {
    vi.mocked(renderSvg).mockResolvedValue('<svg xmlns="http://www.w3.org/2000/svg"></svg>')
    render(<App />)
    await openLedger()
    fireEvent.click(screen.getByRole('button', { name: 'SVG' }))
    await waitFor(() => expect(saveAs).toHaveBeenCalledWith(expect.any(Blob), 'lineage_tree.svg'))
    expect(vi.mocked(renderSvg).mock.calls[0][0]).toContain('digraph "Lineage Tree" {')
  })

  it('keeps the session alive when the diagram backend fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.mocked(renderSvg).mockRejectedValue(
      new RenderBackendError('Diagram backend could not be loaded', 'Reload the page.', 'wasm unavailable'),
    )
    render(<App />)
    await openLedger()
    fireEvent.click(screen.getByRole('button', { name: 'PDF' }))
    fireEvent.click(await screen.findByText('Diagram backend could not be loaded'))
    expect(screen.getByText('Reload the page.')).toBeInTheDocument()
    expect(screen.getByText('wasm unavailable')).toBeInTheDocument()
    expect(saveAs).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith('[Export] pdf export failed', expect.any(RenderBackendError))
    expect(screen.getByTestId('flow')).toBeInTheDocument()
  })

  it('saves a self-contained interactive page', async () => {
    render(<App />)
    await openLedger()
    fireEvent.click(screen.getByRole('button', { name: 'HTML' }))
    await waitFor(() => expect(saveAs).toHaveBeenCalledWith(expect.any(Blob), 'lineage_tree.html'))
  })

  it('shows the most recently opened file when loads finish out of order', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const older = deferred<LoadResult>()
    const newer = deferred<LoadResult>()
    vi.mocked(loadTable)
      .mockImplementationOnce(() => older.promise)
      .mockImplementationOnce(() => newer.promise)
    render(<App />)
    openFile('ignored', 'old.xlsx')
    openFile('ignored', 'new.csv')

    newer.resolve({
      table: { fileName: 'new.csv', columns: ['Child', 'Parent'], rows: [{ Child: 'B', Parent: 'A' }] },
      errors: [],
    })
    expect(await screen.findByText('new.csv')).toBeInTheDocument()

    await act(async () => {
      older.resolve({
        table: { fileName: 'old.xlsx', sheetName: 'Sheet1', columns: ['Child', 'Parent'], rows: [] },
        errors: [{ kind: 'parse', fileName: 'old.xlsx', message: 'Failed reading old.xlsx' }],
      })
      await older.promise
    })
    expect(screen.queryByText('old.xlsx · Sheet1')).toBeNull()
    expect(screen.getByText('new.csv')).toBeInTheDocument()
    expect(screen.getByText('Drawings: 2 · Links: 1 · Roots: 1')).toBeInTheDocument()
    expect(screen.queryByText(/Failed reading old\.xlsx/)).toBeNull()
    expect(warn).toHaveBeenCalledWith('[Loader] Discarding old.xlsx; a newer file was opened')
  })
})
