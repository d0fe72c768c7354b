import { google, type sheets_v4 } from 'googleapis'
import { getConfig } from '../config.js'

/**
 * Google Sheets access for the two record worksheets.
 * Only whole-sheet reads and row appends are needed.
 */

export type CellValue = string | number | boolean
export type SheetRecord = Record<string, CellValue>

export class SheetsNotConfiguredError extends Error {
  constructor(missing: string[]) {
    super(`Google Sheets is not configured (missing ${missing.join(', ')})`)
    this.name = 'SheetsNotConfiguredError'
  }
}

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
]

let client: sheets_v4.Sheets | null = null

function getSpreadsheetId(): string {
  const { spreadsheetId } = getConfig().google
  if (!spreadsheetId) {
    throw new SheetsNotConfiguredError(['GOOGLE_SHEETS_SPREADSHEET_ID'])
  }
  return spreadsheetId
}

function getClient(): sheets_v4.Sheets {
  if (!client) {
    const { serviceAccountEmail, privateKey } = getConfig().google
    if (!serviceAccountEmail || !privateKey) {
      const missing: string[] = []
      if (!serviceAccountEmail) missing.push('GOOGLE_SERVICE_ACCOUNT_EMAIL')
      if (!privateKey) missing.push('GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY')
      throw new SheetsNotConfiguredError(missing)
    }

    const auth = new google.auth.GoogleAuth({
      credentials: {
        client_email: serviceAccountEmail,
        private_key: privateKey,
      },
      scopes: SCOPES,
    })
    client = google.sheets({ version: 'v4', auth })
  }
  return client
}

function toCell(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  return value == null ? '' : String(value)
}

/**
 * Turn a header row plus data rows into records keyed by header.
 * Short rows are padded with '' and fully blank rows are dropped.
 */
export function toRecords(rows: unknown[][]): SheetRecord[] {
  const [header, ...body] = rows
  if (!header) return []

  const keys = header.map(cell => String(toCell(cell)))

  return body
    .filter(row => row.some(cell => toCell(cell) !== ''))
    .map(row => {
      const record: SheetRecord = {}
      keys.forEach((key, i) => {
        record[key] = toCell(row[i])
      })
      return record
    })
}

/**
 * Read every row of a worksheet as a record keyed by the header row
 */
export async function getAllRecords(worksheet: string): Promise<SheetRecord[]> {
  const response = await getClient().spreadsheets.values.get({
    spreadsheetId: getSpreadsheetId(),
    range: worksheet,
    valueRenderOption: 'UNFORMATTED_VALUE',
  })

  const rows: unknown[][] = response.data.values ?? []
  return toRecords(rows)
}

/**
 * Append one row after the last row of a worksheet
 */
export async function appendRow(worksheet: string, values: CellValue[]): Promise<void> {
  await getClient().spreadsheets.values.append({
    spreadsheetId: getSpreadsheetId(),
    range: worksheet,
    valueInputOption: 'RAW',
    insertDataOption: 'INSERT_ROWS',
    requestBody: { values: [values] },
  })
  console.log(`[SHEETS] Appended row to "${worksheet}"`)
}
