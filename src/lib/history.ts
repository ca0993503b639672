import type { ExerciseRecord, WorkoutStore } from './store'
import type { WorkoutTemplate } from '../types'

export interface ProgressPoint {
  index: number
  date: string
  maxWeight: number
}

export interface ExerciseHistorySection {
  exerciseId: string
  exerciseName: string
  templateRecords: ExerciseRecord[]
  allRecords: ExerciseRecord[]
  previewRecords: ExerciseRecord[]
  hiddenCount: number
  chart: ProgressPoint[]
}

/** Heaviest set per session, oldest session first. */
export function buildExerciseProgress(records: ExerciseRecord[]): ProgressPoint[] {
  return records
    .slice()
    .sort((a, b) => Date.parse(a.session.date) - Date.parse(b.session.date))
    .map((record, index) => ({
      index: index + 1,
      date: record.session.date,
      maxWeight: record.exercise.sets.reduce((max, set) => Math.max(max, set.weight), 0),
    }))
}

export function chartWeightRange(points: ProgressPoint[]): [number, number] {
  if (points.length === 0) {
    return [0, 100]
  }

  const weights = points.map((point) => point.maxWeight)
  const minWeight = Math.min(...weights)
  const maxWeight = Math.max(...weights)
  const spread = maxWeight - minWeight
  const padding = spread > 0 ? spread * 0.1 : 5

  return [Math.max(0, minWeight - padding), maxWeight + padding]
}

export function buildTemplateHistory(
  store: WorkoutStore,
  template: WorkoutTemplate,
  previewCount: number,
): ExerciseHistorySection[] {
  const templateSessions = store.sessionsForTemplate(template.id)

  return template.exercises.map((entry) => {
    const templateRecords = templateSessions.flatMap((session) =>
      session.exercises
        .filter((exercise) => exercise.exerciseId === entry.exerciseId)
        .map((exercise) => ({ session, exercise })),
    )
    // Progress spans every template that logged this exercise.
    const allRecords = store.sessionsForExercise(entry.exerciseId)

    return {
      exerciseId: entry.exerciseId,
      exerciseName: entry.name,
      templateRecords,
      allRecords,
      previewRecords: allRecords.slice(0, previewCount),
      hiddenCount: Math.max(0, allRecords.length - previewCount),
      chart: buildExerciseProgress(allRecords),
    }
  })
}
