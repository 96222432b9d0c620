import Papa from 'papaparse'
import * as XLSX from 'xlsx'
import type { LineageTable, LoadError, Row } from './types'
import { CHILD_COLUMN, PARENT_COLUMN } from './graphBuilder'

export const REQUIRED_COLUMNS = [CHILD_COLUMN, PARENT_COLUMN]
export const DEFAULT_SHEET_NAME = 'Sheet1'
export const ACCEPTED_EXTENSIONS = ['.xlsx', '.xls', '.csv', '.tsv', '.txt']

export interface LoadResult {
  table: LineageTable
  errors: LoadError[]
}

export interface LoadOptions {
  sheetName?: string
}

export class MissingSheetError extends Error {
  constructor(readonly sheetName: string, readonly available: string[]) {
    super(`Worksheet '${sheetName}' not found (found: ${available.join(', ') || 'none'})`)
    this.name = 'MissingSheetError'
  }
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0')

export function formatDate(d: Date): string {
  return `${d.getFullYear()}/${pad(d.getMonth() + 1)}/${pad(d.getDate())}`
}

export function formatRecordedDate(d: Date): string {
  const yy = pad(d.getFullYear() % 100)
  return `${yy}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

export function toCellString(value: unknown, column: string): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'number' && Number.isNaN(value)) return ''
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return ''
    if (column === 'Date') return formatDate(value)
    if (column === 'Recorded Date') return formatRecordedDate(value)
    return formatTimestamp(value)
  }
  return String(value).trim()
}

/** Blank headers become `Unnamed: <index>`, repeats get `.1`, `.2`, … */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>()
  return raw.map((h, idx) => {
    const text = h === null || h === undefined ? '' : String(h).trim()
    const base = text || `Unnamed: ${idx}`
    const count = seen.get(base) ?? 0
    seen.set(base, count + 1)
    return count ? `${base}.${count}` : base
  })
}

export function emptyTable(fileName: string, sheetName?: string): LineageTable {
  return { fileName, sheetName, columns: [], rows: [] }
}

/**
 * Turn a header-first cell matrix into a lineage table: validate the
 * required columns, reorder them to the front and coerce every cell.
 */
export function normalizeTable(fileName: string, matrix: readonly (readonly unknown[])[], sheetName?: string): LoadResult {
  const [headerRow = [], ...body] = matrix
  const headers = normalizeHeaders(headerRow)
  const missing = REQUIRED_COLUMNS.filter((c) => !headers.includes(c))
  if (missing.length) {
    return {
      table: emptyTable(fileName, sheetName),
      errors: [{
        kind: 'schema',
        fileName,
        message: `Required columns not found: ${REQUIRED_COLUMNS.join(', ')}. Missing: ${missing.join(', ')}`,
      }],
    }
  }

  const columns = [...REQUIRED_COLUMNS, ...headers.filter((h) => !REQUIRED_COLUMNS.includes(h))]
  const rows: Row[] = []
  for (const cells of body) {
    const byHeader = new Map(headers.map((h, idx) => [h, toCellString(cells[idx], h)]))
    const row: Row = Object.fromEntries(columns.map((c) => [c, byHeader.get(c) ?? '']))
    if (columns.some((c) => row[c] !== '')) rows.push(row)
  }
  return { table: { fileName, sheetName, columns, rows }, errors: [] }
}

export async function readBytes(file: File): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader()
    reader.onerror = () => reject(reader.error)
    reader.onload = () => {
      const result = reader.result
      if (result === null || typeof result === 'string') reject(new Error('File could not be read as binary data'))
      else resolve(new Uint8Array(result))
    }
    reader.readAsArrayBuffer(file)
  })
}

// Drops the byte-order mark spreadsheet tools write before a UTF-8 header
const utf8 = new TextDecoder('utf-8')

/** Without a delimiter, Papa Parse guesses one from the first rows. */
export function parseDelimitedMatrix(content: string, delimiter?: string): string[][] {
  const result = Papa.parse<string[]>(content, { delimiter, skipEmptyLines: true })
  if (result.errors.length) {
    console.warn('[Loader] Delimited text parsed with issues', result.errors.slice(0, 5))
  }
  return result.data
}

export function readWorkbookMatrix(bytes: Uint8Array, sheetName: string): unknown[][] {
  const workbook = XLSX.read(bytes, { type: 'array', cellDates: true })
  const sheet = workbook.Sheets[sheetName]
  if (!sheet) throw new MissingSheetError(sheetName, workbook.SheetNames)
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false })
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export async function loadTable(file: File, options?: LoadOptions): Promise<LoadResult> {
  const name = file.name
  const lower = name.toLowerCase()
  const sheetName = options?.sheetName ?? DEFAULT_SHEET_NAME
  try {
    if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
      return normalizeTable(name, readWorkbookMatrix(await readBytes(file), sheetName), sheetName)
    }
    if (lower.endsWith('.csv') || lower.endsWith('.tsv') || lower.endsWith('.txt')) {
      const text = utf8.decode(await readBytes(file))
      const delimiter = lower.endsWith('.csv') ? ',' : lower.endsWith('.tsv') ? '\t' : undefined
      return normalizeTable(name, parseDelimitedMatrix(text, delimiter))
    }
    return {
      table: emptyTable(name),
      errors: [{
        kind: 'unsupported',
        fileName: name,
        message: `Unsupported file type: ${name}`,
        hint: `Accepted: ${ACCEPTED_EXTENSIONS.join(', ')}`,
      }],
    }
  } catch (err) {
    console.error(`[Loader] Failed reading ${name}:`, err)
    return {
      table: emptyTable(name),
      errors: [{
        kind: 'parse',
        fileName: name,
        message: `Failed reading ${name}`,
        detail: errorText(err),
        hint: `Check that the worksheet is named '${sheetName}' and that the header row has '${CHILD_COLUMN}' and '${PARENT_COLUMN}' columns.`,
      }],
    }
  }
}
