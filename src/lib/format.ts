export function formatDateTime(value: string | undefined): string {
  if (!value) {
    return 'Not set'
  }

  const date = new Date(value)
  return new Intl.DateTimeFormat(undefined, {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
  }).format(date)
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(1)
}

export function formatWeight(weight: number): string {
  return `${formatNumber(weight)} kg`
}

export function formatSetsSummary(sets: Array<{ reps: number; weight: number }>): string {
  return sets.map((set) => `${set.reps} × ${formatWeight(set.weight)}`).join('  •  ')
}

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, '0')
}

/** `yyyy-MM-dd` in local time. */
export function formatCsvDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/** `HH:mm` in local time. */
export function formatCsvTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`
}

/** `yyyyMMdd_HHmm` in local time, used in export file names. */
export function formatFileStamp(date: Date): string {
  return `${formatCsvDate(date).replaceAll('-', '')}_${formatCsvTime(date).replace(':', '')}`
}

// Weight inputs accept a comma or a period as the decimal separator.
export function parseWeightInput(value: string): number {
  const parsed = Number(value.trim().replace(',', '.'))
  if (value.trim().length === 0 || !Number.isFinite(parsed) || parsed < 0) {
    return 0
  }

  return Math.round(parsed * 100) / 100
}

export function parseRepsInput(value: string): number {
  const parsed = Number.parseInt(value.trim(), 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0
}
