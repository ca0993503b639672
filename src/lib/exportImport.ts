import { toCsvRow } from './csv'
import { formatCsvDate, formatCsvTime, formatFileStamp } from './format'
import { defaultPreferences, validatePreferences, writePreferences } from './preferences'
import type { WorkoutStore } from './store'
import { exerciseForms } from '../types'
import type {
  AppPreferences,
  CsvLayout,
  Exercise,
  ExerciseLibraryItem,
  ExerciseTemplate,
  WorkoutBackup,
  WorkoutSession,
  WorkoutSnapshot,
  WorkoutTemplate,
} from '../types'

const legacyHeader = [
  'Date',
  'Time',
  'Workout Template',
  'Exercise',
  'Set Number',
  'Reps',
  'Weight (kg)',
  'Form',
  'Notes',
]

const orderedHeader = [
  'Date',
  'Time',
  'Workout Template',
  'Exercise',
  'Exercise Order',
  'Set Number',
  'Reps',
  'Weight (kg)',
  'Form',
  'Notes',
]

export function buildExportFileName(kind: 'csv' | 'json', now: Date = new Date()): string {
  return `workout-log-export-${formatFileStamp(now)}.${kind}`
}

export function buildCsvExport(store: WorkoutStore, layout: CsvLayout = 'legacy'): string {
  const sessions = store
    .listSessions()
    .sort((a, b) => Date.parse(b.date) - Date.parse(a.date))

  const rows: Array<Array<string | number>> = []

  for (const session of sessions) {
    const templateName = store.getTemplate(session.templateId)?.name ?? 'Unknown'
    const date = new Date(session.date)
    const day = formatCsvDate(date)
    const time = formatCsvTime(date)

    session.exercises.forEach((exercise, exerciseIndex) => {
      const notes = store.getExerciseNotes(exercise.exerciseId)

      exercise.sets.forEach((set, setIndex) => {
        const leading = [day, time, templateName, exercise.name]
        const trailing = [setIndex + 1, set.reps, set.weight, exercise.form, notes]
        rows.push(
          layout === 'ordered'
            ? [...leading, exerciseIndex + 1, ...trailing]
            : [...leading, ...trailing],
        )
      })
    })
  }

  const header = layout === 'ordered' ? orderedHeader : legacyHeader
  return [header, ...rows].map(toCsvRow).join('\n') + '\n'
}

export function buildJsonBackup(store: WorkoutStore, preferences: AppPreferences): string {
  const payload: WorkoutBackup = {
    version: 1,
    exportedAt: new Date().toISOString(),
    preferences,
    data: store.snapshot(),
  }

  return JSON.stringify(payload, null, 2)
}

export async function applyJsonBackup(store: WorkoutStore, jsonText: string): Promise<void> {
  let parsed: unknown
  try {
    parsed = JSON.parse(jsonText)
  } catch {
    throw new Error('Import failed: file is not valid JSON.')
  }

  const payload = validateBackup(parsed)

  await store.replaceAll(payload.data)
  writePreferences(payload.preferences)
}

export async function triggerDownload(
  fileName: string,
  content: string,
  mimeType: string,
): Promise<void> {
  const blob = new Blob([content], { type: mimeType })
  const url = URL.createObjectURL(blob)

  const anchor = document.createElement('a')
  anchor.href = url
  anchor.download = fileName
  anchor.click()

  URL.revokeObjectURL(url)
}

export function validateBackup(value: unknown): WorkoutBackup {
  if (!isRecord(value)) {
    throw new Error('Import failed: expected an object at the top level.')
  }

  if (value.version !== 1) {
    throw new Error('Import failed: unsupported export version.')
  }

  const data = value.data
  if (!isRecord(data)) {
    throw new Error('Import failed: missing data section.')
  }

  const snapshot: WorkoutSnapshot = {
    exerciseLibrary: readArray(data.exerciseLibrary, 'data.exerciseLibrary').map(
      (item, index) => readLibraryItem(item, `data.exerciseLibrary[${index}]`),
    ),
    templates: readArray(data.templates, 'data.templates').map((item, index) =>
      readTemplate(item, `data.templates[${index}]`),
    ),
    sessions: readArray(data.sessions, 'data.sessions').map((item, index) =>
      readSession(item, `data.sessions[${index}]`),
    ),
    drafts:
      data.drafts === undefined
        ? []
        : readArray(data.drafts, 'data.drafts').map((item, index) =>
            readSession(item, `data.drafts[${index}]`),
          ),
  }

  assertReferences(snapshot)

  return {
    version: 1,
    exportedAt:
      typeof value.exportedAt === 'string' ? value.exportedAt : new Date().toISOString(),
    preferences: value.preferences === undefined
      ? defaultPreferences
      : validatePreferences(value.preferences),
    data: snapshot,
  }
}

function assertReferences(snapshot: WorkoutSnapshot): void {
  assertUnique(snapshot.exerciseLibrary.map((item) => item.id), 'data.exerciseLibrary', 'id')
  assertUnique(snapshot.templates.map((template) => template.id), 'data.templates', 'id')
  assertUnique(snapshot.sessions.map((session) => session.id), 'data.sessions', 'id')
  // One draft per template: drafts are keyed by template.
  assertUnique(snapshot.drafts.map((draft) => draft.templateId), 'data.drafts', 'templateId')

  const exerciseIds = new Set(snapshot.exerciseLibrary.map((item) => item.id))
  const templateIds = new Set(snapshot.templates.map((template) => template.id))

  snapshot.templates.forEach((template, index) => {
    for (const exercise of template.exercises) {
      if (!exerciseIds.has(exercise.exerciseId)) {
        throw new Error(
          `Import failed: data.templates[${index}] references unknown exercise ${exercise.exerciseId}.`,
        )
      }
    }
  })

  const checkSession = (session: WorkoutSession, label: string): void => {
    if (!templateIds.has(session.templateId)) {
      throw new Error(
        `Import failed: ${label} references unknown template ${session.templateId}.`,
      )
    }
    for (const exercise of session.exercises) {
      if (!exerciseIds.has(exercise.exerciseId)) {
        throw new Error(
          `Import failed: ${label} references unknown exercise ${exercise.exerciseId}.`,
        )
      }
    }
  }

  snapshot.sessions.forEach((session, index) => checkSession(session, `data.sessions[${index}]`))
  snapshot.drafts.forEach((draft, index) => checkSession(draft, `data.drafts[${index}]`))
}

function assertUnique(keys: string[], label: string, field: string): void {
  const seen = new Set<string>()
  keys.forEach((key, index) => {
    if (seen.has(key)) {
      throw new Error(`Import failed: ${label}[${index}].${field} duplicates ${key}.`)
    }
    seen.add(key)
  })
}

function readLibraryItem(value: unknown, label: string): ExerciseLibraryItem {
  const item = readObject(value, label)
  return {
    id: readId(item.id, `${label}.id`),
    name: readName(item.name, `${label}.name`),
    notes: typeof item.notes === 'string' ? item.notes : '',
  }
}

function readTemplate(value: unknown, label: string): WorkoutTemplate {
  const template = readObject(value, label)
  return {
    id: readId(template.id, `${label}.id`),
    name: readName(template.name, `${label}.name`),
    exercises: readArray(template.exercises, `${label}.exercises`).map(
      (item, index): ExerciseTemplate => {
        const entryLabel = `${label}.exercises[${index}]`
        const entry = readObject(item, entryLabel)
        return {
          id: readId(entry.id, `${entryLabel}.id`),
          exerciseId: readId(entry.exerciseId, `${entryLabel}.exerciseId`),
          name: readName(entry.name, `${entryLabel}.name`),
        }
      },
    ),
  }
}

function readSession(value: unknown, label: string): WorkoutSession {
  const session = readObject(value, label)
  if (typeof session.date !== 'string' || Number.isNaN(Date.parse(session.date))) {
    throw new Error(`Import failed: ${label}.date must be an ISO string.`)
  }

  return {
    id: readId(session.id, `${label}.id`),
    templateId: readId(session.templateId, `${label}.templateId`),
    date: session.date,
    exercises: readArray(session.exercises, `${label}.exercises`).map((item, index) =>
      readExercise(item, `${label}.exercises[${index}]`),
    ),
  }
}

function readExercise(value: unknown, label: string): Exercise {
  const exercise = readObject(value, label)
  const form = exerciseForms.find((candidate) => candidate === exercise.form)
  if (!form) {
    throw new Error(`Import failed: ${label}.form must be one of ${exerciseForms.join(', ')}.`)
  }

  return {
    id: readId(exercise.id, `${label}.id`),
    exerciseId: readId(exercise.exerciseId, `${label}.exerciseId`),
    name: readName(exercise.name, `${label}.name`),
    form,
    sets: readArray(exercise.sets, `${label}.sets`).map((item, index) => {
      const setLabel = `${label}.sets[${index}]`
      const set = readObject(item, setLabel)
      if (typeof set.reps !== 'number' || !Number.isInteger(set.reps) || set.reps < 0) {
        throw new Error(`Import failed: ${setLabel}.reps must be a non-negative integer.`)
      }
      if (typeof set.weight !== 'number' || !Number.isFinite(set.weight) || set.weight < 0) {
        throw new Error(`Import failed: ${setLabel}.weight must be a non-negative number.`)
      }
      return {
        id: readId(set.id, `${setLabel}.id`),
        reps: set.reps,
        weight: set.weight,
      }
    }),
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`Import failed: ${label} must be an object.`)
  }
  return value
}

function readArray(value: unknown, label: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Import failed: ${label} must be an array.`)
  }
  return value
}

function readId(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Import failed: ${label} must be a non-empty string.`)
  }
  return value
}

function readName(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`Import failed: ${label} must be a non-empty string.`)
  }
  return value
}
