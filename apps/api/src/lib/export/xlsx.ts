import * as XLSX from 'xlsx'
import {
  CRITERIA,
  TOTAL_SCORE_COLUMN,
  type ScoredEvaluation,
  type SummaryRow,
} from '../../types.js'

type Cell = string | number | boolean | null
type Row = Record<string, Cell>

export const WORKBOOK_FILE_NAME = 'competition_results.xlsx'
export const RAW_SHEET_NAME = 'Raw Evaluations'
export const SUMMARY_SHEET_NAME = 'Final Scores'

export const RESULT_COLUMNS = [
  'Team Name',
  ...CRITERIA.map(c => c.column),
  TOTAL_SCORE_COLUMN,
]

export function sanitizeCell(value: Cell | undefined): Cell {
  if (value === undefined) {
    return null
  }
  // Formula injection: =, +, -, @ would make the cell a formula
  if (typeof value === 'string' && /^[=+\-@]/.test(value)) {
    return `'${value}`
  }
  return value
}

function toRow(row: ScoredEvaluation | SummaryRow): Row {
  const result: Row = { 'Team Name': sanitizeCell(row.teamName) }
  for (const { key, column } of CRITERIA) {
    result[column] = row[key]
  }
  result[TOTAL_SCORE_COLUMN] = row.totalScore
  return result
}

function appendSheet(workbook: XLSX.WorkBook, sheetName: string, rows: Row[]) {
  const worksheet = XLSX.utils.json_to_sheet(rows, { header: RESULT_COLUMNS })

  worksheet['!cols'] = RESULT_COLUMNS.map(column => {
    let max = column.length
    for (const row of rows) {
      const length = String(row[column] ?? '').length
      if (length > max) max = length
    }
    return { wch: Math.min(Math.max(max + 2, 10), 48) }
  })

  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName)
}

/**
 * Workbook with the raw evaluations and the per-team summary
 */
export function buildResultsWorkbook(
  evaluations: ScoredEvaluation[],
  summary: SummaryRow[]
): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new()
  appendSheet(workbook, RAW_SHEET_NAME, evaluations.map(toRow))
  appendSheet(workbook, SUMMARY_SHEET_NAME, summary.map(toRow))
  return workbook
}

export function workbookToArrayBuffer(workbook: XLSX.WorkBook): ArrayBuffer {
  const data: ArrayBuffer = XLSX.write(workbook, {
    type: 'array',
    bookType: 'xlsx',
    compression: true,
  })
  return data
}
