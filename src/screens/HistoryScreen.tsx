import { useCallback, useEffect, useState } from 'react'
import { Link, useParams } from 'react-router-dom'
import { getWorkoutStore } from '../lib/db'
import { formatDateTime, formatSetsSummary, formatWeight } from '../lib/format'
import { buildTemplateHistory, chartWeightRange } from '../lib/history'
import type { ExerciseHistorySection, ProgressPoint } from '../lib/history'
import { readPreferences } from '../lib/preferences'
import type { WorkoutTemplate } from '../types'

const chartWidth = 300
const chartHeight = 100

export function HistoryScreen() {
  const { templateId = '' } = useParams()
  const [template, setTemplate] = useState<WorkoutTemplate | undefined>()
  const [sections, setSections] = useState<ExerciseHistorySection[]>([])
  const [notesByExercise, setNotesByExercise] = useState<Record<string, string>>({})
  const [expanded, setExpanded] = useState<Record<string, boolean>>({})
  const [message, setMessage] = useState('')
  const [error, setError] = useState('')

  const load = useCallback(async () => {
    const store = await getWorkoutStore()
    const found = store.getTemplate(templateId)
    setTemplate(found)
    if (!found) {
      setSections([])
      return
    }

    const nextSections = buildTemplateHistory(store, found, readPreferences().historyPreviewCount)
    setSections(nextSections)
    setNotesByExercise(
      Object.fromEntries(
        nextSections.map((section) => [section.exerciseId, store.getExerciseNotes(section.exerciseId)]),
      ),
    )
  }, [templateId])

  useEffect(() => {
    void load().catch(() => setError('Could not load history.'))
  }, [load])

  async function handleSaveNotes(exerciseId: string): Promise<void> {
    const store = await getWorkoutStore()
    await store.updateExerciseNotes(exerciseId, notesByExercise[exerciseId] ?? '')
    setMessage('Notes saved.')
    setError('')
  }

  async function handleDeleteSession(sessionId: string): Promise<void> {
    if (!window.confirm('Delete this whole session?')) {
      return
    }

    const store = await getWorkoutStore()
    await store.deleteSession(sessionId)
    setMessage('Session deleted.')
    await load()
  }

  if (!template) {
    return (
      <section className="page">
        {error ? <p className="error-banner">{error}</p> : <p className="muted">Template not found.</p>}
        <Link to="/templates">Back to templates</Link>
      </section>
    )
  }

  return (
    <section className="page">
      <header className="page-header">
        <h1>{template.name}</h1>
        <p>Per-exercise history across every template.</p>
      </header>

      {message ? <p className="success-banner">{message}</p> : null}
      {error ? <p className="error-banner">{error}</p> : null}

      {sections.map((section) => {
        const records = expanded[section.exerciseId] ? section.allRecords : section.previewRecords

        return (
          <article key={section.exerciseId} className="panel stack">
            <h2>{section.exerciseName}</h2>
            <p className="muted">
              {section.templateRecords.length} in this template, {section.allRecords.length} overall
            </p>

            <ProgressChart points={section.chart} />

            {records.length === 0 ? <p className="muted">Not logged yet.</p> : null}
            <ul className="stack stack--tight">
              {records.map((record) => (
                <li key={record.exercise.id}>
                  <strong>{formatDateTime(record.session.date)}</strong> ({record.exercise.form})
                  <br />
                  {formatSetsSummary(record.exercise.sets)}{' '}
                  <button
                    type="button"
                    className="button button--danger"
                    onClick={() =>
                      void handleDeleteSession(record.session.id).catch(() =>
                        setError('Could not delete session.'),
                      )
                    }
                  >
                    Delete session
                  </button>
                </li>
              ))}
            </ul>

            {section.hiddenCount > 0 ? (
              <button
                type="button"
                className="button"
                onClick={() =>
                  setExpanded((current) => ({
                    ...current,
                    [section.exerciseId]: !current[section.exerciseId],
                  }))
                }
              >
                {expanded[section.exerciseId] ? 'Show less' : `Show ${section.hiddenCount} more`}
              </button>
            ) : null}

            <label className="stack stack--tight">
              <span>Notes</span>
              <textarea
                value={notesByExercise[section.exerciseId] ?? ''}
                onChange={(event) =>
                  setNotesByExercise((current) => ({
                    ...current,
                    [section.exerciseId]: event.target.value,
                  }))
                }
              />
            </label>
            <button
              type="button"
              className="button"
              onClick={() =>
                void handleSaveNotes(section.exerciseId).catch(() => setError('Could not save notes.'))
              }
            >
              Save notes
            </button>
          </article>
        )
      })}

      <Link to="/templates">Back to templates</Link>
    </section>
  )
}

function ProgressChart({ points }: { points: ProgressPoint[] }) {
  if (points.length === 0) {
    return null
  }

  const [low, high] = chartWeightRange(points)
  const span = high - low
  const step = points.length > 1 ? chartWidth / (points.length - 1) : 0
  const coordinates = points
    .map((point, index) => {
      const x = points.length > 1 ? index * step : chartWidth / 2
      const y = chartHeight - ((point.maxWeight - low) / span) * chartHeight
      return `${x.toFixed(1)},${y.toFixed(1)}`
    })
    .join(' ')
  const latest = points[points.length - 1]

  return (
    <figure className="stack stack--tight">
      <svg
        className="chart"
        viewBox={`0 0 ${chartWidth} ${chartHeight}`}
        preserveAspectRatio="none"
        role="img"
        aria-label="Heaviest set per session"
      >
        <polyline points={coordinates} />
      </svg>
      <figcaption className="muted">
        {formatWeight(low)} to {formatWeight(high)} • latest {formatWeight(latest.maxWeight)}
      </figcaption>
    </figure>
  )
}
