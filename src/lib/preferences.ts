// ABOUTME: Reads and writes local user preferences for export layout and history display.
// ABOUTME: Applies safe fallbacks so malformed local storage never breaks the UI.
import type { AppPreferences, CsvLayout } from '../types'

const PREFERENCES_KEY = 'workout-log.preferences.v1'

export const defaultPreferences: AppPreferences = {
  csvLayout: 'legacy',
  historyPreviewCount: 3,
}

function isCsvLayout(value: unknown): value is CsvLayout {
  return value === 'legacy' || value === 'ordered'
}

export function validatePreferences(value: unknown): AppPreferences {
  if (!value || typeof value !== 'object') {
    return defaultPreferences
  }

  const csvLayout =
    'csvLayout' in value && isCsvLayout(value.csvLayout)
      ? value.csvLayout
      : defaultPreferences.csvLayout
  const historyPreviewCount =
    'historyPreviewCount' in value &&
    typeof value.historyPreviewCount === 'number' &&
    Number.isFinite(value.historyPreviewCount)
      ? Math.max(1, Math.round(value.historyPreviewCount))
      : defaultPreferences.historyPreviewCount

  return {
    csvLayout,
    historyPreviewCount,
  }
}

export function readPreferences(): AppPreferences {
  const raw = localStorage.getItem(PREFERENCES_KEY)
  if (!raw) {
    return defaultPreferences
  }

  try {
    return validatePreferences(JSON.parse(raw))
  } catch {
    return defaultPreferences
  }
}

export function writePreferences(preferences: AppPreferences): void {
  localStorage.setItem(PREFERENCES_KEY, JSON.stringify(preferences))
}
