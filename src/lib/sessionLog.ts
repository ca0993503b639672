// ABOUTME: Builds and cleans sessions logged against a template.
// ABOUTME: Looks up the previous workout of an exercise for the "last workout" hint.
import { createId } from './ids'
import type { WorkoutStore } from './store'
import type {
  Exercise,
  ExerciseForm,
  ExerciseLibraryItem,
  ExerciseSet,
  WorkoutSession,
  WorkoutTemplate,
} from '../types'

export type SetPatch = Partial<Pick<ExerciseSet, 'reps' | 'weight'>>

export function buildSessionFromTemplate(
  template: WorkoutTemplate,
  date: Date = new Date(),
): WorkoutSession {
  return {
    id: createId(),
    templateId: template.id,
    date: date.toISOString(),
    exercises: template.exercises.map((entry): Exercise => ({
      id: createId(),
      exerciseId: entry.exerciseId,
      name: entry.name,
      sets: [{ id: createId(), reps: 0, weight: 0 }],
      form: 'Good',
    })),
  }
}

/** Drops blank sets, then exercises left without sets. Null when nothing is left to save. */
export function cleanSession(session: WorkoutSession): WorkoutSession | null {
  const exercises = session.exercises
    .map((exercise) => ({
      ...exercise,
      sets: exercise.sets.filter((set) => set.reps > 0 || set.weight > 0),
    }))
    .filter((exercise) => exercise.sets.length > 0)

  if (exercises.length === 0) {
    return null
  }

  return {
    ...session,
    exercises,
  }
}

export function previousExerciseData(
  store: WorkoutStore,
  exerciseId: string,
  before?: string,
): Exercise | undefined {
  const records = store.sessionsForExercise(exerciseId)
  if (!before) {
    return records[0]?.exercise
  }

  const cutoff = Date.parse(before)
  return records.find((record) => Date.parse(record.session.date) < cutoff)?.exercise
}

function mapExercise(
  session: WorkoutSession,
  exerciseId: string,
  update: (exercise: Exercise) => Exercise,
): WorkoutSession {
  return {
    ...session,
    exercises: session.exercises.map((exercise) =>
      exercise.exerciseId === exerciseId ? update(exercise) : exercise,
    ),
  }
}

export function addSessionExercise(
  session: WorkoutSession,
  item: ExerciseLibraryItem,
): WorkoutSession {
  if (session.exercises.some((exercise) => exercise.exerciseId === item.id)) {
    return session
  }

  return {
    ...session,
    exercises: [
      ...session.exercises,
      {
        id: createId(),
        exerciseId: item.id,
        name: item.name,
        sets: [{ id: createId(), reps: 0, weight: 0 }],
        form: 'Good',
      },
    ],
  }
}

/** New sets start from the previous set's values. */
export function addSessionSet(session: WorkoutSession, exerciseId: string): WorkoutSession {
  return mapExercise(session, exerciseId, (exercise) => {
    const last = exercise.sets.at(-1)
    return {
      ...exercise,
      sets: [
        ...exercise.sets,
        { id: createId(), reps: last?.reps ?? 0, weight: last?.weight ?? 0 },
      ],
    }
  })
}

export function updateSessionSet(
  session: WorkoutSession,
  exerciseId: string,
  setId: string,
  patch: SetPatch,
): WorkoutSession {
  return mapExercise(session, exerciseId, (exercise) => ({
    ...exercise,
    sets: exercise.sets.map((set) => (set.id === setId ? { ...set, ...patch } : set)),
  }))
}

export function removeSessionSet(
  session: WorkoutSession,
  exerciseId: string,
  setId: string,
): WorkoutSession {
  return mapExercise(session, exerciseId, (exercise) => ({
    ...exercise,
    sets: exercise.sets.filter((set) => set.id !== setId),
  }))
}

export function setSessionExerciseForm(
  session: WorkoutSession,
  exerciseId: string,
  form: ExerciseForm,
): WorkoutSession {
  return mapExercise(session, exerciseId, (exercise) => ({ ...exercise, form }))
}
