// ABOUTME: Holds templates, sessions, the exercise library and drafts in memory.
// ABOUTME: Every mutation writes its collection through to storage before resolving.
import { createId } from './ids'
import type {
  Exercise,
  ExerciseLibraryItem,
  ExerciseTemplate,
  WorkoutSession,
  WorkoutSnapshot,
  WorkoutTemplate,
} from '../types'

export interface WorkoutStorage {
  load(): Promise<WorkoutSnapshot>
  saveTemplates(templates: WorkoutTemplate[]): Promise<void>
  saveSessions(sessions: WorkoutSession[]): Promise<void>
  saveExerciseLibrary(items: ExerciseLibraryItem[]): Promise<void>
  saveDrafts(drafts: WorkoutSession[]): Promise<void>
  replaceAll(snapshot: WorkoutSnapshot): Promise<void>
}

export interface ExerciseRecord {
  session: WorkoutSession
  exercise: Exercise
}

export function emptySnapshot(): WorkoutSnapshot {
  return {
    templates: [],
    sessions: [],
    exerciseLibrary: [],
    drafts: [],
  }
}

/**
 * Repository over the whole dataset.
 *
 * Values are cloned on the way in and stored objects are replaced, never
 * mutated in place, so the objects returned by reads stay stable snapshots.
 * Callers must build new objects to change anything.
 *
 * A collection is swapped in memory only after storage accepted it, so a
 * rejected write leaves reads matching what is on disk.
 */
export class WorkoutStore {
  private templates: WorkoutTemplate[]
  private sessions: WorkoutSession[]
  private exerciseLibrary: ExerciseLibraryItem[]
  private drafts: WorkoutSession[]

  private constructor(
    private readonly storage: WorkoutStorage,
    snapshot: WorkoutSnapshot,
  ) {
    this.templates = snapshot.templates
    this.sessions = snapshot.sessions
    this.exerciseLibrary = snapshot.exerciseLibrary
    this.drafts = snapshot.drafts
  }

  static async open(storage: WorkoutStorage): Promise<WorkoutStore> {
    const snapshot = await storage.load()
    return new WorkoutStore(storage, snapshot)
  }

  snapshot(): WorkoutSnapshot {
    return structuredClone({
      templates: this.templates,
      sessions: this.sessions,
      exerciseLibrary: this.exerciseLibrary,
      drafts: this.drafts,
    })
  }

  // Templates

  listTemplates(): WorkoutTemplate[] {
    return this.templates.slice()
  }

  getTemplate(id: string): WorkoutTemplate | undefined {
    return this.templates.find((template) => template.id === id)
  }

  findTemplateByName(name: string): WorkoutTemplate | undefined {
    return this.templates.find((template) => template.name === name)
  }

  async createTemplate(
    name: string,
    exercises: ExerciseTemplate[] = [],
  ): Promise<WorkoutTemplate> {
    const template: WorkoutTemplate = {
      id: createId(),
      name,
      exercises: structuredClone(exercises),
    }
    await this.commitTemplates([...this.templates, template])
    return template
  }

  async updateTemplate(template: WorkoutTemplate): Promise<void> {
    const index = this.templates.findIndex((item) => item.id === template.id)
    if (index < 0) {
      return
    }

    await this.commitTemplates(
      this.templates.map((item, itemIndex) =>
        itemIndex === index ? structuredClone(template) : item,
      ),
    )
  }

  async deleteTemplate(id: string): Promise<void> {
    await this.commitTemplates(this.templates.filter((template) => template.id !== id))
    await this.commitSessions(this.sessions.filter((session) => session.templateId !== id))
    await this.commitDrafts(this.drafts.filter((draft) => draft.templateId !== id))
  }

  // Sessions

  listSessions(): WorkoutSession[] {
    return this.sessions.slice()
  }

  getSession(id: string): WorkoutSession | undefined {
    return this.sessions.find((session) => session.id === id)
  }

  sessionsForTemplate(templateId: string): WorkoutSession[] {
    return this.sessions
      .filter((session) => session.templateId === templateId)
      .sort(byDateDescending)
  }

  /** Every logged entry of one exercise across all templates, newest first. */
  sessionsForExercise(exerciseId: string): ExerciseRecord[] {
    const records: ExerciseRecord[] = []

    for (const session of this.sessions) {
      for (const exercise of session.exercises) {
        if (exercise.exerciseId === exerciseId) {
          records.push({ session, exercise })
        }
      }
    }

    return records.sort((a, b) => byDateDescending(a.session, b.session))
  }

  async createSession(session: WorkoutSession): Promise<void> {
    if (!this.getTemplate(session.templateId)) {
      throw new Error(`Unknown workout template: ${session.templateId}`)
    }

    await this.commitSessions([...this.sessions, structuredClone(session)])

    if (this.loadDraft(session.templateId)) {
      await this.clearDraft(session.templateId)
    }
  }

  async updateSession(session: WorkoutSession): Promise<void> {
    const index = this.sessions.findIndex((item) => item.id === session.id)
    if (index < 0) {
      return
    }

    await this.commitSessions(
      this.sessions.map((item, itemIndex) =>
        itemIndex === index ? structuredClone(session) : item,
      ),
    )
  }

  async deleteSession(id: string): Promise<void> {
    await this.commitSessions(this.sessions.filter((session) => session.id !== id))
  }

  // Exercise library

  listExerciseLibrary(): ExerciseLibraryItem[] {
    return this.exerciseLibrary.slice().sort((a, b) => a.name.localeCompare(b.name))
  }

  getExercise(id: string): ExerciseLibraryItem | undefined {
    return this.exerciseLibrary.find((item) => item.id === id)
  }

  findExerciseByName(name: string): ExerciseLibraryItem | undefined {
    const key = name.toLowerCase()
    return this.exerciseLibrary.find((item) => item.name.toLowerCase() === key)
  }

  exerciseExists(name: string): boolean {
    return this.findExerciseByName(name) !== undefined
  }

  async addExercise(name: string): Promise<ExerciseLibraryItem> {
    const item: ExerciseLibraryItem = {
      id: createId(),
      name,
      notes: '',
    }
    await this.commitExerciseLibrary([...this.exerciseLibrary, item])
    return item
  }

  async getOrCreateExerciseByName(name: string): Promise<ExerciseLibraryItem> {
    return this.findExerciseByName(name) ?? this.addExercise(name)
  }

  getExerciseNotes(exerciseId: string): string {
    return this.getExercise(exerciseId)?.notes ?? ''
  }

  async updateExerciseNotes(exerciseId: string, notes: string): Promise<void> {
    if (!this.getExercise(exerciseId)) {
      return
    }

    await this.commitExerciseLibrary(
      this.exerciseLibrary.map((item) => (item.id === exerciseId ? { ...item, notes } : item)),
    )
  }

  /** Removes the library item and every template or session entry pointing at it. */
  async deleteExercise(exerciseId: string): Promise<void> {
    const withoutExercise = (session: WorkoutSession): WorkoutSession =>
      session.exercises.some((exercise) => exercise.exerciseId === exerciseId)
        ? {
            ...session,
            exercises: session.exercises.filter(
              (exercise) => exercise.exerciseId !== exerciseId,
            ),
          }
        : session

    await this.commitExerciseLibrary(
      this.exerciseLibrary.filter((item) => item.id !== exerciseId),
    )
    await this.commitTemplates(
      this.templates.map((template) =>
        template.exercises.some((exercise) => exercise.exerciseId === exerciseId)
          ? {
              ...template,
              exercises: template.exercises.filter(
                (exercise) => exercise.exerciseId !== exerciseId,
              ),
            }
          : template,
      ),
    )
    await this.commitSessions(this.sessions.map(withoutExercise))
    await this.commitDrafts(this.drafts.map(withoutExercise))
  }

  // Drafts

  loadDraft(templateId: string): WorkoutSession | undefined {
    return this.drafts.find((draft) => draft.templateId === templateId)
  }

  async saveDraft(session: WorkoutSession): Promise<void> {
    await this.commitDrafts([
      ...this.drafts.filter((draft) => draft.templateId !== session.templateId),
      structuredClone(session),
    ])
  }

  async clearDraft(templateId: string): Promise<void> {
    await this.commitDrafts(this.drafts.filter((draft) => draft.templateId !== templateId))
  }

  async replaceAll(snapshot: WorkoutSnapshot): Promise<void> {
    const next = structuredClone(snapshot)
    await this.storage.replaceAll(next)
    this.templates = next.templates
    this.sessions = next.sessions
    this.exerciseLibrary = next.exerciseLibrary
    this.drafts = next.drafts
  }

  private async commitTemplates(next: WorkoutTemplate[]): Promise<void> {
    await this.storage.saveTemplates(next)
    this.templates = next
  }

  private async commitSessions(next: WorkoutSession[]): Promise<void> {
    await this.storage.saveSessions(next)
    this.sessions = next
  }

  private async commitExerciseLibrary(next: ExerciseLibraryItem[]): Promise<void> {
    await this.storage.saveExerciseLibrary(next)
    this.exerciseLibrary = next
  }

  private async commitDrafts(next: WorkoutSession[]): Promise<void> {
    await this.storage.saveDrafts(next)
    this.drafts = next
  }
}

function byDateDescending(a: WorkoutSession, b: WorkoutSession): number {
  return Date.parse(b.date) - Date.parse(a.date)
}
