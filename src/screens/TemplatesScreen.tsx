import { useCallback, useEffect, useState } from 'react'
import type { FormEvent } from 'react'
import { Link } from 'react-router-dom'
import { getWorkoutStore } from '../lib/db'
import { formatDateTime } from '../lib/format'
import { addTemplateExercise, moveTemplateExercise, removeTemplateExercise } from '../lib/templates'
import type { ExerciseLibraryItem, WorkoutTemplate } from '../types'

interface TemplateRow {
  template: WorkoutTemplate
  sessionCount: number
  lastDate: string | undefined
  hasDraft: boolean
}

export function TemplatesScreen() {
  const [rows, setRows] = useState<TemplateRow[]>([])
  const [library, setLibrary] = useState<ExerciseLibraryItem[]>([])
  const [newName, setNewName] = useState('')
  const [exerciseNames, setExerciseNames] = useState<Record<string, string>>({})
  const [error, setError] = useState('')

  const load = useCallback(async () => {
    const store = await getWorkoutStore()
    setRows(
      store
        .listTemplates()
        .sort((a, b) => a.name.localeCompare(b.name))
        .map((template) => {
          const sessions = store.sessionsForTemplate(template.id)
          return {
            template,
            sessionCount: sessions.length,
            lastDate: sessions[0]?.date,
            hasDraft: store.loadDraft(template.id) !== undefined,
          }
        }),
    )
    setLibrary(store.listExerciseLibrary())
  }, [])

  useEffect(() => {
    void load().catch(() => setError('Could not load templates.'))
  }, [load])

  async function handleCreate(event: FormEvent<HTMLFormElement>): Promise<void> {
    event.preventDefault()
    const name = newName.trim()
    if (!name) {
      return
    }

    const store = await getWorkoutStore()
    if (store.findTemplateByName(name)) {
      setError(`A template named ${name} already exists.`)
      return
    }

    await store.createTemplate(name)
    setNewName('')
    setError('')
    await load()
  }

  // Edits start from the stored template; the copy rendered here may be stale.
  async function editTemplate(
    templateId: string,
    edit: (template: WorkoutTemplate) => WorkoutTemplate,
  ): Promise<void> {
    const store = await getWorkoutStore()
    const current = store.getTemplate(templateId)
    if (!current) {
      await load()
      return
    }

    const next = edit(current)
    if (next !== current) {
      await store.updateTemplate(next)
    }
    await load()
  }

  async function handleAddExercise(templateId: string): Promise<void> {
    const name = (exerciseNames[templateId] ?? '').trim()
    if (!name) {
      return
    }

    const store = await getWorkoutStore()
    const item = await store.getOrCreateExerciseByName(name)
    await editTemplate(templateId, (template) => addTemplateExercise(template, item))
    setExerciseNames((current) => ({ ...current, [templateId]: '' }))
  }

  async function handleDelete(template: WorkoutTemplate): Promise<void> {
    if (!window.confirm(`Delete ${template.name} and all of its sessions?`)) {
      return
    }

    const store = await getWorkoutStore()
    await store.deleteTemplate(template.id)
    await load()
  }

  async function handleDeleteExercise(item: ExerciseLibraryItem): Promise<void> {
    if (!window.confirm(`Delete ${item.name} from every template and session?`)) {
      return
    }

    const store = await getWorkoutStore()
    await store.deleteExercise(item.id)
    await load()
  }

  function reportFailure(promise: Promise<void>): void {
    void promise.catch((caughtError: unknown) => {
      setError(caughtError instanceof Error ? caughtError.message : 'Could not save changes.')
    })
  }

  return (
    <section className="page">
      <header className="page-header">
        <h1>Templates</h1>
        <p>Workout templates and the exercises they contain.</p>
      </header>

      {error ? <p className="error-banner">{error}</p> : null}

      <form className="panel stack" onSubmit={(event) => reportFailure(handleCreate(event))}>
        <label className="stack stack--tight">
          <span>New template</span>
          <input
            value={newName}
            placeholder="Push Day"
            onChange={(event) => setNewName(event.target.value)}
          />
        </label>
        <button type="submit" className="button button--primary">
          Create template
        </button>
      </form>

      {rows.length === 0 ? <p className="muted">No templates yet. Create one or import a CSV.</p> : null}

      {rows.map(({ template, sessionCount, lastDate, hasDraft }) => (
        <article key={template.id} className="panel stack">
          <header>
            <h2>{template.name}</h2>
            <p className="muted">
              {sessionCount} session{sessionCount === 1 ? '' : 's'}
              {lastDate ? ` • last ${formatDateTime(lastDate)}` : ''}
            </p>
          </header>

          <ol className="stack stack--tight">
            {template.exercises.map((entry) => (
              <li key={entry.id}>
                <div className="button-row">
                  <span>{entry.name}</span>
                  <button
                    type="button"
                    className="button"
                    aria-label={`Move ${entry.name} up`}
                    onClick={() =>
                      reportFailure(
                        editTemplate(template.id, (current) =>
                          moveTemplateExercise(current, entry.id, -1),
                        ),
                      )
                    }
                  >
                    ↑
                  </button>
                  <button
                    type="button"
                    className="button"
                    aria-label={`Move ${entry.name} down`}
                    onClick={() =>
                      reportFailure(
                        editTemplate(template.id, (current) =>
                          moveTemplateExercise(current, entry.id, 1),
                        ),
                      )
                    }
                  >
                    ↓
                  </button>
                  <button
                    type="button"
                    className="button button--danger"
                    aria-label={`Remove ${entry.name}`}
                    onClick={() =>
                      reportFailure(
                        editTemplate(template.id, (current) =>
                          removeTemplateExercise(current, entry.id),
                        ),
                      )
                    }
                  >
                    ✕
                  </button>
                </div>
              </li>
            ))}
          </ol>

          <div className="button-row">
            <input
              value={exerciseNames[template.id] ?? ''}
              placeholder="Add exercise"
              onChange={(event) =>
                setExerciseNames((current) => ({ ...current, [template.id]: event.target.value }))
              }
            />
            <button
              type="button"
              className="button"
              onClick={() => reportFailure(handleAddExercise(template.id))}
            >
              Add
            </button>
          </div>

          <div className="button-row">
            <Link className="button button--primary" to={`/templates/${template.id}/session`}>
              {hasDraft ? 'Resume session' : 'Log session'}
            </Link>
            <Link className="button" to={`/templates/${template.id}/history`}>
              History
            </Link>
            <button
              type="button"
              className="button button--danger"
              onClick={() => reportFailure(handleDelete(template))}
            >
              Delete
            </button>
          </div>
        </article>
      ))}

      {library.length > 0 ? (
        <div className="panel stack">
          <h2>Exercise library</h2>
          <ul className="stack stack--tight">
            {library.map((item) => (
              <li key={item.id} className="button-row">
                <span>{item.name}</span>
                <button
                  type="button"
                  className="button button--danger"
                  onClick={() => reportFailure(handleDeleteExercise(item))}
                >
                  Delete
                </button>
              </li>
            ))}
          </ul>
        </div>
      ) : null}
    </section>
  )
}
