import { useState } from 'react'
import type { ChangeEvent } from 'react'
import { getWorkoutStore } from '../lib/db'
import {
  applyJsonBackup,
  buildCsvExport,
  buildExportFileName,
  buildJsonBackup,
  triggerDownload,
} from '../lib/exportImport'
import { CsvReadError, describeImportStats, importCsvFile } from '../lib/importCsv'
import { readPreferences, writePreferences } from '../lib/preferences'
import type { AppPreferences, CsvLayout } from '../types'

export function DataScreen() {
  const [preferences, setPreferences] = useState<AppPreferences>(readPreferences())
  const [message, setMessage] = useState('')
  const [error, setError] = useState('')
  const [isImporting, setIsImporting] = useState(false)

  function handleSavePreferences(): void {
    writePreferences(preferences)
    setMessage('Settings saved.')
    setError('')
  }

  async function handleExportCsv(): Promise<void> {
    const store = await getWorkoutStore()
    await triggerDownload(
      buildExportFileName('csv'),
      buildCsvExport(store, preferences.csvLayout),
      'text/csv;charset=utf-8',
    )
  }

  async function handleExportJson(): Promise<void> {
    const store = await getWorkoutStore()
    await triggerDownload(
      buildExportFileName('json'),
      buildJsonBackup(store, preferences),
      'application/json;charset=utf-8',
    )
  }

  async function handleImportCsv(event: ChangeEvent<HTMLInputElement>): Promise<void> {
    const file = event.target.files?.[0]
    if (!file) {
      return
    }

    setIsImporting(true)
    setMessage('')
    setError('')

    try {
      const store = await getWorkoutStore()
      const stats = await importCsvFile(store, file)
      setMessage(describeImportStats(stats))
    } catch (caughtError) {
      if (caughtError instanceof CsvReadError) {
        setError(`Error reading file: ${caughtError.message}`)
      } else {
        setError(
          caughtError instanceof Error
            ? `Import failed: ${caughtError.message}`
            : 'Import failed for an unknown reason.',
        )
      }
    } finally {
      setIsImporting(false)
      event.target.value = ''
    }
  }

  async function handleImportJson(event: ChangeEvent<HTMLInputElement>): Promise<void> {
    const file = event.target.files?.[0]
    if (!file) {
      return
    }

    if (!window.confirm('Restoring a backup replaces all current data. Continue?')) {
      event.target.value = ''
      return
    }

    setIsImporting(true)
    setMessage('')
    setError('')

    try {
      const store = await getWorkoutStore()
      await applyJsonBackup(store, await file.text())
      setPreferences(readPreferences())
      setMessage('Backup restored.')
    } catch (caughtError) {
      setError(
        caughtError instanceof Error ? caughtError.message : 'Import failed for an unknown reason.',
      )
    } finally {
      setIsImporting(false)
      event.target.value = ''
    }
  }

  function reportExportFailure(promise: Promise<void>): void {
    void promise.catch(() => setError('Export failed.'))
  }

  return (
    <section className="page">
      <header className="page-header">
        <h1>Data</h1>
        <p>CSV import and export, full backups, and display defaults.</p>
      </header>

      {message ? <p className="success-banner">{message}</p> : null}
      {error ? <p className="error-banner">{error}</p> : null}

      <div className="panel stack">
        <h2>Defaults</h2>
        <label className="stack stack--tight">
          <span>CSV export layout</span>
          <select
            value={preferences.csvLayout}
            onChange={(event) =>
              setPreferences((current) => ({
                ...current,
                csvLayout: toCsvLayout(event.target.value),
              }))
            }
          >
            <option value="legacy">Without exercise order</option>
            <option value="ordered">With exercise order</option>
          </select>
        </label>

        <label className="stack stack--tight">
          <span>Sessions shown per exercise in history</span>
          <input
            type="number"
            min="1"
            value={preferences.historyPreviewCount}
            onChange={(event) =>
              setPreferences((current) => ({
                ...current,
                historyPreviewCount: Math.max(1, Math.floor(Number(event.target.value)) || 1),
              }))
            }
          />
        </label>

        <button type="button" className="button button--primary" onClick={handleSavePreferences}>
          Save defaults
        </button>
      </div>

      <div className="panel stack">
        <h2>Export</h2>
        <div className="button-row">
          <button type="button" className="button" onClick={() => reportExportFailure(handleExportCsv())}>
            Export CSV
          </button>
          <button type="button" className="button" onClick={() => reportExportFailure(handleExportJson())}>
            Export JSON backup
          </button>
        </div>
      </div>

      <div className="panel stack">
        <h2>Import</h2>
        <label className="stack stack--tight">
          <span>Import CSV (rows already logged are skipped)</span>
          <input
            type="file"
            accept=".csv,text/csv"
            onChange={(event) => void handleImportCsv(event)}
            disabled={isImporting}
          />
        </label>
        <label className="stack stack--tight">
          <span>Restore JSON backup</span>
          <input
            type="file"
            accept="application/json"
            onChange={(event) => void handleImportJson(event)}
            disabled={isImporting}
          />
        </label>
      </div>
    </section>
  )
}

function toCsvLayout(value: string): CsvLayout {
  return value === 'ordered' ? 'ordered' : 'legacy'
}
