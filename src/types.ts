export const exerciseForms = ['Meh', 'Good', 'Intense'] as const

export type ExerciseForm = (typeof exerciseForms)[number]

export interface ExerciseLibraryItem {
  id: string
  name: string
  notes: string
}

export interface ExerciseTemplate {
  id: string
  exerciseId: string
  name: string
}

export interface WorkoutTemplate {
  id: string
  name: string
  exercises: ExerciseTemplate[]
}

export interface ExerciseSet {
  id: string
  reps: number
  weight: number
}

export interface Exercise {
  id: string
  exerciseId: string
  name: string
  sets: ExerciseSet[]
  form: ExerciseForm
}

export interface WorkoutSession {
  id: string
  templateId: string
  date: string
  exercises: Exercise[]
}

export interface WorkoutSnapshot {
  templates: WorkoutTemplate[]
  sessions: WorkoutSession[]
  exerciseLibrary: ExerciseLibraryItem[]
  drafts: WorkoutSession[]
}

export type CsvLayout = 'legacy' | 'ordered'

export interface CsvRow {
  date: Date
  templateName: string
  exerciseName: string
  exerciseOrder: number
  setNumber: number
  reps: number
  weight: number
  form: string
  notes: string
}

export interface ImportStats {
  rowsImported: number
  rowsSkipped: number
  sessionsAffected: number
}

export interface AppPreferences {
  csvLayout: CsvLayout
  historyPreviewCount: number
}

export interface WorkoutBackup {
  version: 1
  exportedAt: string
  preferences: AppPreferences
  data: WorkoutSnapshot
}
