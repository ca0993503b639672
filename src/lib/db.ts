import Dexie, { type Table } from 'dexie'
import { WorkoutStore, type WorkoutStorage } from './store'
import type {
  ExerciseLibraryItem,
  WorkoutSession,
  WorkoutSnapshot,
  WorkoutTemplate,
} from '../types'

export class WorkoutLogDatabase extends Dexie {
  templates!: Table<WorkoutTemplate, string>
  sessions!: Table<WorkoutSession, string>
  exerciseLibrary!: Table<ExerciseLibraryItem, string>
  drafts!: Table<WorkoutSession, string>

  constructor(name = 'workout-log') {
    super(name)
    this.version(1).stores({
      templates: 'id,name',
      sessions: 'id,templateId,date',
      exerciseLibrary: 'id,name',
      drafts: 'templateId',
    })
  }
}

export function createDexieStorage(db: WorkoutLogDatabase): WorkoutStorage {
  // Collections are saved whole, so each write replaces the table inside one transaction.
  async function replaceTable<T>(table: Table<T, string>, items: T[]): Promise<void> {
    await db.transaction('rw', table, async () => {
      await table.clear()
      if (items.length > 0) {
        await table.bulkAdd(items)
      }
    })
  }

  return {
    async load(): Promise<WorkoutSnapshot> {
      const [templates, sessions, exerciseLibrary, drafts] = await Promise.all([
        db.templates.toArray(),
        db.sessions.toArray(),
        db.exerciseLibrary.toArray(),
        db.drafts.toArray(),
      ])

      return {
        templates,
        sessions,
        exerciseLibrary,
        drafts,
      }
    },

    saveTemplates: (templates) => replaceTable(db.templates, templates),
    saveSessions: (sessions) => replaceTable(db.sessions, sessions),
    saveExerciseLibrary: (items) => replaceTable(db.exerciseLibrary, items),
    saveDrafts: (drafts) => replaceTable(db.drafts, drafts),

    async replaceAll(snapshot: WorkoutSnapshot): Promise<void> {
      // All four tables change together or not at all.
      await db.transaction(
        'rw',
        [db.templates, db.sessions, db.exerciseLibrary, db.drafts],
        async () => {
          await Promise.all([
            db.templates.clear(),
            db.sessions.clear(),
            db.exerciseLibrary.clear(),
            db.drafts.clear(),
          ])

          if (snapshot.exerciseLibrary.length > 0) {
            await db.exerciseLibrary.bulkAdd(snapshot.exerciseLibrary)
          }
          if (snapshot.templates.length > 0) {
            await db.templates.bulkAdd(snapshot.templates)
          }
          if (snapshot.sessions.length > 0) {
            await db.sessions.bulkAdd(snapshot.sessions)
          }
          if (snapshot.drafts.length > 0) {
            await db.drafts.bulkAdd(snapshot.drafts)
          }
        },
      )
    },
  }
}

let sharedStore: Promise<WorkoutStore> | undefined

/** The app-wide store, opened once over the default database. */
export function getWorkoutStore(): Promise<WorkoutStore> {
  sharedStore ??= WorkoutStore.open(createDexieStorage(new WorkoutLogDatabase()))
  return sharedStore
}
