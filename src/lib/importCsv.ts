// ABOUTME: Merges CSV workout history into the store without duplicating logged sets.
// ABOUTME: Groups new rows into sessions, rebuilds exercise order and carries exercise notes over.
import { readCsvRows, splitCsvLines } from './csv'
import { groupStable } from './grouping'
import { identityKey, truncateToMinute } from './identity'
import { createId } from './ids'
import type { WorkoutStore } from './store'
import { addTemplateExercise } from './templates'
import { exerciseForms } from '../types'
import type {
  CsvRow,
  Exercise,
  ExerciseForm,
  ExerciseSet,
  ImportStats,
  WorkoutTemplate,
} from '../types'

const SESSION_MERGE_WINDOW_MS = 60_000

export class CsvReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CsvReadError'
  }
}

export interface ImportOptions {
  /** Checked before each session is merged; earlier sessions stay applied. */
  signal?: AbortSignal
}

export function parseExerciseForm(value: string): ExerciseForm {
  return exerciseForms.find((form) => form === value) ?? 'Good'
}

/** Identity keys of every set already logged against a known template. */
export function collectExistingIdentities(store: WorkoutStore): Set<string> {
  const identities = new Set<string>()

  for (const session of store.listSessions()) {
    const template = store.getTemplate(session.templateId)
    if (!template) {
      continue
    }

    const date = new Date(session.date)
    for (const exercise of session.exercises) {
      exercise.sets.forEach((set, index) => {
        identities.add(
          identityKey({
            date,
            templateName: template.name,
            exerciseName: exercise.name,
            setNumber: index + 1,
            reps: set.reps,
            weight: set.weight,
            form: exercise.form,
          }),
        )
      })
    }
  }

  return identities
}

export async function importCsvText(
  store: WorkoutStore,
  text: string,
  options: ImportOptions = {},
): Promise<ImportStats> {
  if (splitCsvLines(text).length <= 1) {
    return {
      rowsImported: 0,
      rowsSkipped: 0,
      sessionsAffected: 0,
    }
  }

  const identities = collectExistingIdentities(store)
  const accepted: CsvRow[] = []
  const notesByExercise = new Map<string, string>()
  let rowsSkipped = 0

  for (const row of readCsvRows(text)) {
    // Skipped rows still carry notes: they may have changed without new sets.
    if (row.notes.length > 0) {
      const exerciseKey = row.exerciseName.toLowerCase()
      // Re-inserting moves the key last, so the note read last is applied last.
      notesByExercise.delete(exerciseKey)
      notesByExercise.set(exerciseKey, row.notes)
    }

    const key = identityKey(row)
    if (identities.has(key)) {
      rowsSkipped += 1
      continue
    }

    identities.add(key)
    accepted.push(row)
  }

  const buckets = groupStable(
    accepted,
    (row) => `${truncateToMinute(row.date)}|${row.templateName}`,
  )

  let sessionsAffected = 0
  for (const bucket of buckets) {
    options.signal?.throwIfAborted()
    await mergeSessionRows(store, bucket.items)
    sessionsAffected += 1
  }

  for (const [exerciseKey, notes] of notesByExercise) {
    const item = store.findExerciseByName(exerciseKey)
    if (item && item.notes !== notes) {
      await store.updateExerciseNotes(item.id, notes)
    }
  }

  return {
    rowsImported: accepted.length,
    rowsSkipped,
    sessionsAffected,
  }
}

/** Rows share one template name and one minute. */
async function mergeSessionRows(store: WorkoutStore, rows: CsvRow[]): Promise<void> {
  const sessionDate = rows[0].date
  const templateName = rows[0].templateName

  let template: WorkoutTemplate =
    store.findTemplateByName(templateName) ?? (await store.createTemplate(templateName))
  const templateId = template.id

  const target = store
    .listSessions()
    .find(
      (session) =>
        session.templateId === templateId &&
        Math.abs(Date.parse(session.date) - sessionDate.getTime()) < SESSION_MERGE_WINDOW_MS,
    )
  const exercises: Exercise[] = target ? target.exercises.slice() : []

  // Stable sort: exercises without an order value keep their file order.
  const groups = groupStable(rows, (row) => row.exerciseName).sort(
    (a, b) => a.items[0].exerciseOrder - b.items[0].exerciseOrder,
  )

  for (const group of groups) {
    const libraryItem = await store.getOrCreateExerciseByName(group.key)

    const nextTemplate = addTemplateExercise(template, libraryItem)
    if (nextTemplate !== template) {
      template = nextTemplate
      await store.updateTemplate(template)
    }

    const sets: ExerciseSet[] = group.items
      .slice()
      .sort((a, b) => a.setNumber - b.setNumber)
      .map((row) => ({ id: createId(), reps: row.reps, weight: row.weight }))

    const index = exercises.findIndex((exercise) => exercise.exerciseId === libraryItem.id)
    if (index >= 0) {
      exercises[index] = {
        ...exercises[index],
        sets: [...exercises[index].sets, ...sets],
      }
    } else {
      exercises.push({
        id: createId(),
        exerciseId: libraryItem.id,
        name: group.key,
        sets,
        form: parseExerciseForm(group.items[0].form),
      })
    }
  }

  if (target) {
    await store.updateSession({ ...target, exercises })
    return
  }

  await store.createSession({
    id: createId(),
    templateId,
    date: sessionDate.toISOString(),
    exercises,
  })
}

/** Reads the file as strict UTF-8; failures here never reach the store. */
export async function readCsvFile(file: Pick<Blob, 'arrayBuffer'>): Promise<string> {
  let buffer: ArrayBuffer
  try {
    buffer = await file.arrayBuffer()
  } catch (error) {
    throw new CsvReadError('Error reading file.', { cause: error })
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer)
  } catch (error) {
    throw new CsvReadError('File is not valid UTF-8 text.', { cause: error })
  }
}

export async function importCsvFile(
  store: WorkoutStore,
  file: Pick<Blob, 'arrayBuffer'>,
  options: ImportOptions = {},
): Promise<ImportStats> {
  const text = await readCsvFile(file)
  return importCsvText(store, text, options)
}

export function describeImportStats(stats: ImportStats): string {
  if (stats.rowsImported === 0 && stats.rowsSkipped === 0) {
    return 'No rows found to import.'
  }

  const lines: string[] = []
  if (stats.rowsImported > 0) {
    lines.push(
      `Successfully added ${stats.rowsImported} new row${stats.rowsImported === 1 ? '' : 's'}!`,
    )
  }
  if (stats.rowsSkipped > 0) {
    lines.push(
      `Skipped ${stats.rowsSkipped} duplicate row${stats.rowsSkipped === 1 ? '' : 's'}.`,
    )
  }

  return lines.join('\n')
}
