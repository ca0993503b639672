import { describe, expect, it } from 'vitest'
import { createId } from './ids'
import {
  CsvReadError,
  describeImportStats,
  importCsvFile,
  importCsvText,
  parseExerciseForm,
  readCsvFile,
} from './importCsv'
import { WorkoutStore } from './store'
import { createMemoryStorage } from '../test/memoryStorage'
import type { ExerciseForm, WorkoutSession } from '../types'

const legacyHeader = 'Date,Time,Workout Template,Exercise,Set Number,Reps,Weight (kg),Form'
const legacyNotesHeader = `${legacyHeader},Notes`
const orderedHeader =
  'Date,Time,Workout Template,Exercise,Exercise Order,Set Number,Reps,Weight (kg),Form,Notes'

function csv(...lines: string[]): string {
  return lines.join('\n')
}

async function openStore() {
  const storage = createMemoryStorage()
  const store = await WorkoutStore.open(storage)
  return { store, storage }
}

async function seedSession(
  store: WorkoutStore,
  templateName: string,
  exerciseName: string,
  date: Date,
  sets: Array<[number, number]>,
  form: ExerciseForm = 'Good',
): Promise<WorkoutSession> {
  const item = await store.getOrCreateExerciseByName(exerciseName)
  const template =
    store.findTemplateByName(templateName) ??
    (await store.createTemplate(templateName, [
      { id: createId(), exerciseId: item.id, name: item.name },
    ]))

  const session: WorkoutSession = {
    id: createId(),
    templateId: template.id,
    date: date.toISOString(),
    exercises: [
      {
        id: createId(),
        exerciseId: item.id,
        name: exerciseName,
        form,
        sets: sets.map(([reps, weight]) => ({ id: createId(), reps, weight })),
      },
    ],
  }
  await store.createSession(session)
  return session
}

function setValues(session: WorkoutSession | undefined, exerciseIndex = 0) {
  return session?.exercises[exerciseIndex].sets.map(({ reps, weight }) => ({ reps, weight }))
}

describe('importCsvText', () => {
  it('creates the template, library exercise and session for a first import', async () => {
    const { store } = await openStore()

    const stats = await importCsvText(
      store,
      csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good'),
    )

    expect(stats).toEqual({ rowsImported: 1, rowsSkipped: 0, sessionsAffected: 1 })

    const templates = store.listTemplates()
    expect(templates).toHaveLength(1)
    expect(templates[0].name).toBe('Push Day')

    const library = store.listExerciseLibrary()
    expect(library.map((item) => item.name)).toEqual(['Bench Press'])
    expect(templates[0].exercises).toEqual([
      { id: expect.any(String), exerciseId: library[0].id, name: 'Bench Press' },
    ])

    const sessions = store.listSessions()
    expect(sessions).toHaveLength(1)
    expect(sessions[0].templateId).toBe(templates[0].id)
    expect(sessions[0].date).toBe(new Date(2025, 0, 15, 18, 30).toISOString())
    expect(sessions[0].exercises).toHaveLength(1)
    expect(sessions[0].exercises[0].name).toBe('Bench Press')
    expect(sessions[0].exercises[0].exerciseId).toBe(library[0].id)
    expect(sessions[0].exercises[0].form).toBe('Good')
    expect(setValues(sessions[0])).toEqual([{ reps: 8, weight: 60.5 }])
  })

  it('skips every row when the same file is imported twice', async () => {
    const { store } = await openStore()
    const text = csv(
      legacyHeader,
      '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good',
      '2025-01-15,18:30,Push Day,Bench Press,2,7,60.5,Good',
      '2025-01-17,07:05,Leg Day,Squat,1,5,100,Intense',
    )

    const first = await importCsvText(store, text)
    const afterFirst = store.snapshot()
    const second = await importCsvText(store, text)

    expect(first).toEqual({ rowsImported: 3, rowsSkipped: 0, sessionsAffected: 2 })
    expect(second).toEqual({ rowsImported: 0, rowsSkipped: 3, sessionsAffected: 0 })
    expect(store.snapshot()).toEqual(afterFirst)
  })

  it('keeps the first copy of a row repeated within one file', async () => {
    const { store } = await openStore()

    const stats = await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good',
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good',
      ),
    )

    expect(stats).toEqual({ rowsImported: 1, rowsSkipped: 1, sessionsAffected: 1 })
    expect(setValues(store.listSessions()[0])).toEqual([{ reps: 8, weight: 60.5 }])
  })

  it('compares weights at one decimal place', async () => {
    const { store } = await openStore()

    const first = await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60.50,Good',
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good',
      ),
    )
    const second = await importCsvText(
      store,
      csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60.6,Good'),
    )

    expect(first).toEqual({ rowsImported: 1, rowsSkipped: 1, sessionsAffected: 1 })
    expect(second).toEqual({ rowsImported: 1, rowsSkipped: 0, sessionsAffected: 1 })
    expect(store.listSessions()).toHaveLength(1)
    expect(setValues(store.listSessions()[0])).toEqual([
      { reps: 8, weight: 60.5 },
      { reps: 8, weight: 60.6 },
    ])
  })

  it('treats a stored session with seconds as the same minute as the csv row', async () => {
    const { store } = await openStore()
    await seedSession(store, 'Push Day', 'Bench Press', new Date(2025, 0, 15, 18, 30, 45), [
      [8, 60.5],
    ])

    const stats = await importCsvText(
      store,
      csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60.5,Good'),
    )

    expect(stats).toEqual({ rowsImported: 0, rowsSkipped: 1, sessionsAffected: 0 })
  })

  it('orders exercises by the exercise order column', async () => {
    const { store } = await openStore()

    await importCsvText(
      store,
      csv(
        orderedHeader,
        '2025-01-15,18:30,Push Day,B,2,1,8,50,Good',
        '2025-01-15,18:30,Push Day,A,1,1,8,50,Good',
        '2025-01-15,18:30,Push Day,C,3,1,8,50,Good',
      ),
    )

    const [session] = store.listSessions()
    expect(session.exercises.map((exercise) => exercise.name)).toEqual(['A', 'B', 'C'])
    expect(store.listTemplates()[0].exercises.map((exercise) => exercise.name)).toEqual([
      'A',
      'B',
      'C',
    ])
  })

  it('keeps first-occurrence order for files without an order column', async () => {
    const { store } = await openStore()

    await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,X,1,10,20,Good',
        '2025-01-15,18:30,Push Day,Y,1,10,30,Good',
        '2025-01-15,18:30,Push Day,X,2,9,20,Good',
        '2025-01-15,18:30,Push Day,Z,1,10,40,Good',
      ),
    )

    const [session] = store.listSessions()
    expect(session.exercises.map((exercise) => exercise.name)).toEqual(['X', 'Y', 'Z'])
    expect(setValues(session, 0)).toEqual([
      { reps: 10, weight: 20 },
      { reps: 9, weight: 20 },
    ])
  })

  it('sorts the sets of an exercise by set number', async () => {
    const { store } = await openStore()

    await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,Bench Press,3,6,60,Good',
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60,Good',
        '2025-01-15,18:30,Push Day,Bench Press,2,7,60,Good',
      ),
    )

    expect(setValues(store.listSessions()[0])).toEqual([
      { reps: 8, weight: 60 },
      { reps: 7, weight: 60 },
      { reps: 6, weight: 60 },
    ])
  })

  it('appends new sets to an existing session instead of duplicating it', async () => {
    const { store } = await openStore()
    const existing = await seedSession(
      store,
      'Push Day',
      'Bench Press',
      new Date(2025, 0, 15, 18, 30),
      [[8, 60]],
    )

    const stats = await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,Bench Press,2,7,60,Good',
        '2025-01-15,18:30,Push Day,Bench Press,1,8,60,Good',
      ),
    )

    expect(stats).toEqual({ rowsImported: 1, rowsSkipped: 1, sessionsAffected: 1 })

    const sessions = store.listSessions()
    expect(sessions).toHaveLength(1)
    expect(sessions[0].id).toBe(existing.id)
    expect(sessions[0].exercises).toHaveLength(1)
    expect(setValues(sessions[0])).toEqual([
      { reps: 8, weight: 60 },
      { reps: 7, weight: 60 },
    ])
  })

  it('merges into a session logged less than a minute away', async () => {
    const { store } = await openStore()
    const existing = await seedSession(
      store,
      'Push Day',
      'Bench Press',
      new Date(2025, 0, 15, 18, 30, 30),
      [[8, 60]],
    )

    await importCsvText(store, csv(legacyHeader, '2025-01-15,18:31,Push Day,Squat,1,5,100,Good'))

    const sessions = store.listSessions()
    expect(sessions).toHaveLength(1)
    expect(sessions[0].id).toBe(existing.id)
    expect(sessions[0].exercises.map((exercise) => exercise.name)).toEqual([
      'Bench Press',
      'Squat',
    ])
  })

  it('creates a separate session when the existing one is a full minute away', async () => {
    const { store } = await openStore()
    await seedSession(store, 'Push Day', 'Bench Press', new Date(2025, 0, 15, 18, 29), [[8, 60]])

    const stats = await importCsvText(
      store,
      csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60,Good'),
    )

    expect(stats).toEqual({ rowsImported: 1, rowsSkipped: 0, sessionsAffected: 1 })
    expect(store.listSessions()).toHaveLength(2)
    expect(store.listTemplates()).toHaveLength(1)
  })

  it('joins templates by name and appends exercises they do not list yet', async () => {
    const { store } = await openStore()
    await seedSession(store, 'Push Day', 'Bench Press', new Date(2025, 0, 10, 18, 0), [[8, 60]])

    await importCsvText(store, csv(legacyHeader, '2025-01-15,18:30,Push Day,Dips,1,12,0,Good'))

    const templates = store.listTemplates()
    expect(templates).toHaveLength(1)
    expect(templates[0].exercises.map((exercise) => exercise.name)).toEqual([
      'Bench Press',
      'Dips',
    ])
  })

  it('matches library exercises without regard to case', async () => {
    const { store } = await openStore()
    const item = await store.getOrCreateExerciseByName('Bench Press')

    await importCsvText(
      store,
      csv(legacyHeader, '2025-01-15,18:30,Push Day,bench press,1,8,60,Good'),
    )

    expect(store.listExerciseLibrary()).toHaveLength(1)
    const [session] = store.listSessions()
    expect(session.exercises[0].exerciseId).toBe(item.id)
    expect(session.exercises[0].name).toBe('bench press')
    expect(store.listTemplates()[0].exercises[0].name).toBe('Bench Press')
  })

  it('updates library notes even when every row of the exercise was a duplicate', async () => {
    const { store } = await openStore()
    await seedSession(store, 'Leg Day', 'Squat', new Date(2025, 0, 15, 18, 30), [[5, 100]])

    const stats = await importCsvText(
      store,
      csv(legacyNotesHeader, '2025-01-15,18:30,Leg Day,Squat,1,5,100,Good,"brace, then descend"'),
    )

    expect(stats).toEqual({ rowsImported: 0, rowsSkipped: 1, sessionsAffected: 0 })
    const squat = store.findExerciseByName('Squat')
    expect(squat?.notes).toBe('brace, then descend')
  })

  it('keeps the last non-empty notes seen for an exercise', async () => {
    const { store } = await openStore()

    await importCsvText(
      store,
      csv(
        legacyNotesHeader,
        '2025-01-15,18:30,Leg Day,Squat,1,5,100,Good,first cue',
        '2025-01-15,18:30,Leg Day,Squat,2,5,100,Good,second cue',
        '2025-01-15,18:30,Leg Day,Squat,3,5,100,Good,',
      ),
    )

    expect(store.findExerciseByName('Squat')?.notes).toBe('second cue')
  })

  it('applies the last notes even when the exercise name changes case between rows', async () => {
    const { store } = await openStore()

    await importCsvText(
      store,
      csv(
        legacyNotesHeader,
        '2025-01-15,18:30,Leg Day,Squat,1,5,100,Good,first',
        '2025-01-15,18:30,Leg Day,squat,2,5,100,Good,second',
        '2025-01-15,18:30,Leg Day,Squat,3,5,100,Good,third',
      ),
    )

    expect(store.listExerciseLibrary().map((item) => `${item.name}=${item.notes}`)).toEqual([
      'Squat=third',
    ])
  })

  it('falls back to Good for an unknown form value', async () => {
    const { store } = await openStore()

    await importCsvText(store, csv(legacyHeader, '2025-01-15,18:30,Push Day,Dips,1,12,0,Great'))

    expect(store.listSessions()[0].exercises[0].form).toBe('Good')
  })

  it('drops malformed rows and zeroes malformed numbers', async () => {
    const { store } = await openStore()

    const stats = await importCsvText(
      store,
      csv(
        legacyHeader,
        '2025-01-15,18:30,Push Day,Bench Press,1,8',
        '2025-02-30,18:30,Push Day,Bench Press,1,8,60,Good',
        'yesterday,18:30,Push Day,Bench Press,1,8,60,Good',
        '2025-01-15,18:30,Push Day,Bench Press,1,abc,heavy,Good',
      ),
    )

    expect(stats).toEqual({ rowsImported: 1, rowsSkipped: 0, sessionsAffected: 1 })
    expect(setValues(store.listSessions()[0])).toEqual([{ reps: 0, weight: 0 }])
  })

  it('returns zero statistics without writing for empty or header-only input', async () => {
    const { store, storage } = await openStore()

    expect(await importCsvText(store, '')).toEqual({
      rowsImported: 0,
      rowsSkipped: 0,
      sessionsAffected: 0,
    })
    expect(await importCsvText(store, legacyHeader)).toEqual({
      rowsImported: 0,
      rowsSkipped: 0,
      sessionsAffected: 0,
    })
    expect(await importCsvText(store, `${legacyHeader}\n`)).toEqual({
      rowsImported: 0,
      rowsSkipped: 0,
      sessionsAffected: 0,
    })
    expect(storage.writes).toBe(0)
  })

  it('stops before the next session once the signal is aborted', async () => {
    const { store } = await openStore()
    const controller = new AbortController()
    controller.abort(new Error('cancelled'))

    await expect(
      importCsvText(
        store,
        csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60,Good'),
        { signal: controller.signal },
      ),
    ).rejects.toThrow('cancelled')
    expect(store.listSessions()).toHaveLength(0)
  })
})

describe('readCsvFile', () => {
  it('decodes utf-8 text', async () => {
    const text = await readCsvFile(new Blob(['Date,Time\n2025-01-15,18:30']))
    expect(text).toBe('Date,Time\n2025-01-15,18:30')
  })

  it('rejects bytes that are not valid utf-8', async () => {
    await expect(readCsvFile(new Blob([new Uint8Array([0x41, 0xff, 0x42])]))).rejects.toThrow(
      'File is not valid UTF-8 text.',
    )
  })

  it('wraps read failures so they are distinct from an empty import', async () => {
    const { store, storage } = await openStore()
    const unreadable = {
      arrayBuffer: () => Promise.reject(new Error('permission denied')),
    }

    await expect(importCsvFile(store, unreadable)).rejects.toBeInstanceOf(CsvReadError)
    expect(storage.writes).toBe(0)
  })

  it('imports the rows of a readable file', async () => {
    const { store } = await openStore()
    const file = new Blob([csv(legacyHeader, '2025-01-15,18:30,Push Day,Bench Press,1,8,60,Good')])

    expect(await importCsvFile(store, file)).toEqual({
      rowsImported: 1,
      rowsSkipped: 0,
      sessionsAffected: 1,
    })
  })
})

describe('parseExerciseForm', () => {
  it('accepts the known forms exactly', () => {
    expect(parseExerciseForm('Meh')).toBe('Meh')
    expect(parseExerciseForm('Intense')).toBe('Intense')
    expect(parseExerciseForm('intense')).toBe('Good')
  })
})

describe('describeImportStats', () => {
  it('reports added and skipped rows on separate lines', () => {
    expect(describeImportStats({ rowsImported: 3, rowsSkipped: 1, sessionsAffected: 2 })).toBe(
      'Successfully added 3 new rows!\nSkipped 1 duplicate row.',
    )
  })

  it('reports an empty import', () => {
    expect(describeImportStats({ rowsImported: 0, rowsSkipped: 0, sessionsAffected: 0 })).toBe(
      'No rows found to import.',
    )
  })
})
