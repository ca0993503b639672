// ABOUTME: Defines when two logged sets count as the same row for import dedup.
// ABOUTME: Notes and exercise order never take part in a row's identity.
import type { CsvRow } from '../types'

const MINUTE_MS = 60_000

export type RowIdentity = Pick<
  CsvRow,
  'date' | 'templateName' | 'exerciseName' | 'setNumber' | 'reps' | 'weight' | 'form'
>

export function truncateToMinute(date: Date): number {
  return Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS
}

/** Weight compared at one decimal place, as an integer count of tenths. */
export function weightTenths(weight: number): number {
  return Math.round(weight * 10)
}

export function identityKey(row: RowIdentity): string {
  return JSON.stringify([
    truncateToMinute(row.date),
    row.templateName,
    row.exerciseName,
    row.setNumber,
    row.reps,
    weightTenths(row.weight),
    row.form,
  ])
}
