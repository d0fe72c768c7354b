import { jsPDF } from 'jspdf'
import type { SummaryRow } from '../../types.js'
import { formatScore } from '../scoring.js'

export const PDF_FILE_NAME = 'competition_results.pdf'
export const PDF_TITLE = 'Competition Results Summary'

// A4 in points; all offsets measured from the top edge
export const A4_HEIGHT = 841.89
const MARGIN = 50
const FIRST_LINE_Y = 100
const LINE_HEIGHT = 20

export interface PdfLine {
  page: number
  y: number
  text: string
}

// Characters the standard PDF fonts encode beyond Latin-1 (WinAnsiEncoding)
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ')

/**
 * Helvetica only covers WinAnsi; anything else is drawn as '?'
 * instead of corrupting the encoding of the whole line.
 */
export function toWinAnsi(text: string): string {
  return Array.from(text, char =>
    char.charCodeAt(0) <= 0xff || WIN_ANSI_EXTRAS.has(char) ? char : '?'
  ).join('')
}

export function formatResultLine(row: SummaryRow): string {
  return `${row.teamName} — Score: ${formatScore(row.totalScore)}`
}

/**
 * Position one line per team. A new page starts once the cursor passes the
 * bottom margin; following lines resume at the top margin.
 */
export function layoutResultLines(summary: SummaryRow[], pageHeight: number = A4_HEIGHT): PdfLine[] {
  const lines: PdfLine[] = []
  let page = 0
  let y = FIRST_LINE_Y

  for (const row of summary) {
    lines.push({ page, y, text: formatResultLine(row) })
    y += LINE_HEIGHT
    if (y > pageHeight - MARGIN) {
      page += 1
      y = MARGIN
    }
  }

  return lines
}

export function buildResultsPdf(summary: SummaryRow[]): jsPDF {
  const doc = new jsPDF({ unit: 'pt', format: 'a4' })

  doc.setFont('helvetica', 'bold')
  doc.setFontSize(16)
  doc.text(PDF_TITLE, MARGIN, MARGIN)

  doc.setFont('helvetica', 'normal')
  doc.setFontSize(11)

  let currentPage = 0
  for (const line of layoutResultLines(summary, doc.internal.pageSize.getHeight())) {
    if (line.page !== currentPage) {
      doc.addPage()
      currentPage = line.page
    }
    doc.text(toWinAnsi(line.text), MARGIN, line.y)
  }

  return doc
}

export function renderResultsPdf(summary: SummaryRow[]): ArrayBuffer {
  return buildResultsPdf(summary).output('arraybuffer')
}
