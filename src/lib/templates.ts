// ABOUTME: Edits the ordered exercise list of a workout template.
// ABOUTME: Each helper returns a new template; an unchanged template is returned as is.
import { createId } from './ids'
import type { ExerciseLibraryItem, WorkoutTemplate } from '../types'

export function addTemplateExercise(
  template: WorkoutTemplate,
  item: ExerciseLibraryItem,
): WorkoutTemplate {
  if (template.exercises.some((entry) => entry.exerciseId === item.id)) {
    return template
  }

  return {
    ...template,
    exercises: [...template.exercises, { id: createId(), exerciseId: item.id, name: item.name }],
  }
}

export function moveTemplateExercise(
  template: WorkoutTemplate,
  entryId: string,
  direction: -1 | 1,
): WorkoutTemplate {
  const index = template.exercises.findIndex((entry) => entry.id === entryId)
  if (index < 0) {
    return template
  }

  const nextIndex = index + direction
  if (nextIndex < 0 || nextIndex >= template.exercises.length) {
    return template
  }

  const exercises = [...template.exercises]
  ;[exercises[index], exercises[nextIndex]] = [exercises[nextIndex], exercises[index]]

  return { ...template, exercises }
}

export function removeTemplateExercise(
  template: WorkoutTemplate,
  entryId: string,
): WorkoutTemplate {
  if (!template.exercises.some((entry) => entry.id === entryId)) {
    return template
  }

  return {
    ...template,
    exercises: template.exercises.filter((entry) => entry.id !== entryId),
  }
}
