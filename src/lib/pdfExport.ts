import { jsPDF } from 'jspdf'
import { svg2pdf } from 'svg2pdf.js'

// A4 portrait in points
const FALLBACK_SIZE = { width: 595, height: 842 }

export function readSvgSize(svg: Element): { width: number; height: number } {
  const viewBox = (svg.getAttribute('viewBox') ?? '').trim().split(/[\s,]+/).map(Number)
  if (viewBox.length === 4 && viewBox.every((n) => Number.isFinite(n)) && viewBox[2] > 0 && viewBox[3] > 0) {
    return { width: viewBox[2], height: viewBox[3] }
  }
  const width = parseFloat(svg.getAttribute('width') ?? '')
  const height = parseFloat(svg.getAttribute('height') ?? '')
  if (width > 0 && height > 0) return { width, height }
  return FALLBACK_SIZE
}

export function parseSvg(svgText: string): Element {
  const doc = new DOMParser().parseFromString(svgText, 'image/svg+xml')
  const root = doc.documentElement
  if (root.nodeName.toLowerCase() !== 'svg') {
    throw new Error('Rendered diagram is not an SVG document')
  }
  return root
}

/** One-page vector PDF sized to the diagram. */
export async function svgToPdf(svgText: string): Promise<Blob> {
  const svg = parseSvg(svgText)
  const { width, height } = readSvgSize(svg)
  const pdf = new jsPDF({ orientation: width > height ? 'landscape' : 'portrait', unit: 'pt', format: [width, height] })
  await svg2pdf(svg, pdf, { x: 0, y: 0, width, height })
  return pdf.output('blob')
}
