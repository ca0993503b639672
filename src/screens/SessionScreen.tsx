import { useCallback, useEffect, useMemo, useState } from 'react'
import { Link, useNavigate, useParams } from 'react-router-dom'
import { getWorkoutStore } from '../lib/db'
import { formatDateTime, formatSetsSummary, parseRepsInput, parseWeightInput } from '../lib/format'
import {
  addSessionExercise,
  addSessionSet,
  buildSessionFromTemplate,
  cleanSession,
  previousExerciseData,
  removeSessionSet,
  setSessionExerciseForm,
  updateSessionSet,
} from '../lib/sessionLog'
import type { WorkoutStore } from '../lib/store'
import { exerciseForms } from '../types'
import type { Exercise, ExerciseLibraryItem, WorkoutSession, WorkoutTemplate } from '../types'

export function SessionScreen() {
  const params = useParams<{ templateId: string }>()
  const navigate = useNavigate()
  const templateId = params.templateId ?? ''

  const [store, setStore] = useState<WorkoutStore>()
  const [template, setTemplate] = useState<WorkoutTemplate>()
  const [session, setSession] = useState<WorkoutSession>()
  const [library, setLibrary] = useState<ExerciseLibraryItem[]>([])
  const [exerciseToAdd, setExerciseToAdd] = useState('')
  const [resumedDraft, setResumedDraft] = useState(false)
  const [error, setError] = useState('')

  const loadSession = useCallback(async () => {
    const loadedStore = await getWorkoutStore()
    const loadedTemplate = loadedStore.getTemplate(templateId)
    if (!loadedTemplate) {
      navigate('/templates')
      return
    }

    const draft = loadedStore.loadDraft(templateId)
    setStore(loadedStore)
    setTemplate(loadedTemplate)
    setSession(draft ?? buildSessionFromTemplate(loadedTemplate))
    setResumedDraft(Boolean(draft))
    setLibrary(loadedStore.listExerciseLibrary())
  }, [navigate, templateId])

  useEffect(() => {
    void loadSession().catch(() => {
      setError('Unable to load session.')
    })
  }, [loadSession])

  const previousByExercise = useMemo<Record<string, Exercise | undefined>>(() => {
    if (!store || !session) {
      return {}
    }

    return Object.fromEntries(
      session.exercises.map((exercise) => [
        exercise.exerciseId,
        previousExerciseData(store, exercise.exerciseId, session.date),
      ]),
    )
  }, [store, session])

  // Every edit replaces the template's draft.
  function applyChange(next: WorkoutSession): void {
    setSession(next)
    if (store) {
      void store.saveDraft(next).catch(() => setError('Unable to save draft.'))
    }
  }

  async function handleFinish(): Promise<void> {
    if (!store || !session || !template) {
      return
    }

    const cleaned = cleanSession(session)
    if (!cleaned) {
      setError('Log at least one set before saving.')
      return
    }

    await store.createSession(cleaned)
    navigate(`/templates/${template.id}/history`)
  }

  async function handleDiscard(): Promise<void> {
    if (!store || !template) {
      return
    }

    if (!window.confirm('Discard this session?')) {
      return
    }

    await store.clearDraft(template.id)
    navigate('/templates')
  }

  function handleAddExercise(): void {
    const item = library.find((candidate) => candidate.id === exerciseToAdd)
    if (!session || !item) {
      return
    }

    applyChange(addSessionExercise(session, item))
    setExerciseToAdd('')
  }

  if (!session || !template) {
    return (
      <section className="page">
        {error ? <p className="error-banner">{error}</p> : <p className="muted">Loading…</p>}
      </section>
    )
  }

  const availableExercises = library.filter(
    (item) => !session.exercises.some((exercise) => exercise.exerciseId === item.id),
  )

  return (
    <section className="page">
      <header className="page-header">
        <h1>{template.name}</h1>
        <p>
          Started {formatDateTime(session.date)}
          {resumedDraft ? ' · Resumed draft' : ''}
        </p>
      </header>

      {error ? <p className="error-banner">{error}</p> : null}

      {session.exercises.map((exercise) => {
        const previous = previousByExercise[exercise.exerciseId]

        return (
          <article key={exercise.id} className="panel stack">
            <h2>{exercise.name}</h2>
            <p className="muted">
              Last time: {previous ? formatSetsSummary(previous.sets) : '-'}
            </p>

            {exercise.sets.map((set, index) => (
              <div key={set.id} className="button-row">
                <span>Set {index + 1}</span>
                <label className="stack stack--tight">
                  <span>Weight (kg)</span>
                  <input
                    type="number"
                    min="0"
                    step="0.5"
                    inputMode="decimal"
                    value={set.weight}
                    onChange={(event) =>
                      applyChange(
                        updateSessionSet(session, exercise.exerciseId, set.id, {
                          weight: parseWeightInput(event.target.value),
                        }),
                      )
                    }
                  />
                </label>
                <label className="stack stack--tight">
                  <span>Reps</span>
                  <input
                    type="number"
                    min="0"
                    step="1"
                    inputMode="numeric"
                    value={set.reps}
                    onChange={(event) =>
                      applyChange(
                        updateSessionSet(session, exercise.exerciseId, set.id, {
                          reps: parseRepsInput(event.target.value),
                        }),
                      )
                    }
                  />
                </label>
                <button
                  type="button"
                  className="button button--danger"
                  onClick={() => applyChange(removeSessionSet(session, exercise.exerciseId, set.id))}
                >
                  ✕
                </button>
              </div>
            ))}

            <div className="button-row">
              <button
                type="button"
                className="button"
                onClick={() => applyChange(addSessionSet(session, exercise.exerciseId))}
              >
                Add set
              </button>
              <select
                aria-label={`${exercise.name} form`}
                value={exercise.form}
                onChange={(event) => {
                  const form = exerciseForms.find((candidate) => candidate === event.target.value)
                  if (form) {
                    applyChange(setSessionExerciseForm(session, exercise.exerciseId, form))
                  }
                }}
              >
                {exerciseForms.map((form) => (
                  <option key={form} value={form}>
                    {form}
                  </option>
                ))}
              </select>
            </div>
          </article>
        )
      })}

      {availableExercises.length > 0 ? (
        <div className="panel stack">
          <label className="stack stack--tight">
            <span>Add exercise to this session</span>
            <select value={exerciseToAdd} onChange={(event) => setExerciseToAdd(event.target.value)}>
              <option value="">Select exercise</option>
              {availableExercises.map((item) => (
                <option key={item.id} value={item.id}>
                  {item.name}
                </option>
              ))}
            </select>
          </label>
          <button type="button" className="button" onClick={handleAddExercise}>
            Add
          </button>
        </div>
      ) : null}

      <div className="button-row">
        <button
          type="button"
          className="button button--primary"
          onClick={() => void handleFinish().catch(() => setError('Unable to save session.'))}
        >
          Finish session
        </button>
        <button
          type="button"
          className="button button--danger"
          onClick={() => void handleDiscard().catch(() => setError('Unable to discard draft.'))}
        >
          Discard
        </button>
        <Link className="button" to="/templates">
          Back
        </Link>
      </div>
    </section>
  )
}
