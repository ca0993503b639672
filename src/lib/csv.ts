// ABOUTME: Parses workout CSV text into structured rows for the import reconciler.
// ABOUTME: Accepts the legacy header layout and the one carrying an exercise order column.
import type { CsvLayout, CsvRow } from '../types'

interface LayoutColumns {
  minColumns: number
  exerciseOrder: number | null
  setNumber: number
  reps: number
  weight: number
  form: number
  notes: number
}

const layouts: Record<CsvLayout, LayoutColumns> = {
  legacy: {
    minColumns: 8,
    exerciseOrder: null,
    setNumber: 4,
    reps: 5,
    weight: 6,
    form: 7,
    notes: 8,
  },
  ordered: {
    minColumns: 9,
    exerciseOrder: 4,
    setNumber: 5,
    reps: 6,
    weight: 7,
    form: 8,
    notes: 9,
  },
}

const dateTimePattern = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{2})$/
const integerPattern = /^\+?\d+$/
const decimalPattern = /^\+?(\d+\.?\d*|\.\d+)$/

export function splitCsvLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/)
}

export function detectCsvLayout(header: string): CsvLayout {
  return header.toLowerCase().includes('exercise order') ? 'ordered' : 'legacy'
}

/** Splits one line on commas outside double quotes; `""` inside quotes is a literal quote. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = []
  let current = ''
  let insideQuotes = false

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index]

    if (char === '"') {
      if (insideQuotes && line[index + 1] === '"') {
        current += '"'
        index += 1
      } else {
        insideQuotes = !insideQuotes
      }
    } else if (char === ',' && !insideQuotes) {
      fields.push(current.trim())
      current = ''
    } else {
      current += char
    }
  }

  fields.push(current.trim())
  return fields
}

/** Parses `yyyy-MM-dd HH:mm` as local time. */
export function parseCsvDateTime(date: string, time: string): Date | null {
  const match = dateTimePattern.exec(`${date} ${time}`)
  if (!match) {
    return null
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number)
  if (month < 1 || month > 12 || hour > 23 || minute > 59) {
    return null
  }

  const parsed = new Date(year, month - 1, day, hour, minute)
  // Date rolls impossible days over into the next month.
  if (parsed.getMonth() !== month - 1 || parsed.getDate() !== day) {
    return null
  }

  return parsed
}

export function parseCsvInteger(value: string, fallback = 0): number {
  return integerPattern.test(value) ? Number(value) : fallback
}

export function parseCsvWeight(value: string): number {
  const normalized = value.replace(',', '.')
  if (!decimalPattern.test(normalized)) {
    return 0
  }

  return Math.round(Number(normalized) * 100) / 100
}

function parseRow(columns: string[], layout: LayoutColumns): CsvRow | null {
  if (columns.length < layout.minColumns) {
    return null
  }

  const date = parseCsvDateTime(columns[0], columns[1])
  if (!date) {
    return null
  }

  return {
    date,
    templateName: columns[2],
    exerciseName: columns[3],
    exerciseOrder:
      layout.exerciseOrder === null ? 0 : parseCsvInteger(columns[layout.exerciseOrder], 1),
    setNumber: parseCsvInteger(columns[layout.setNumber]),
    reps: parseCsvInteger(columns[layout.reps]),
    weight: parseCsvWeight(columns[layout.weight]),
    form: columns[layout.form],
    notes: columns[layout.notes] ?? '',
  }
}

/**
 * Lazily yields the data rows of a CSV export. Each iteration parses from the
 * start again. Lines that are too short or carry an unreadable date are dropped.
 */
export function readCsvRows(text: string): Iterable<CsvRow> {
  return {
    *[Symbol.iterator]() {
      const lines = splitCsvLines(text)
      const layout = layouts[detectCsvLayout(lines[0] ?? '')]

      for (const line of lines.slice(1)) {
        if (line.length === 0) {
          continue
        }

        const row = parseRow(parseCsvLine(line), layout)
        if (row) {
          yield row
        }
      }
    },
  }
}

export function toCsvRow(values: Array<string | number>): string {
  return values
    .map((value) => {
      const text = String(value)
      if (text.includes(',') || text.includes('"') || text.includes('\n')) {
        return `"${text.replaceAll('"', '""')}"`
      }
      return text
    })
    .join(',')
}
