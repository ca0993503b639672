// ABOUTME: Sets up app routing for the workout log.
// ABOUTME: Defines bottom navigation for templates, session logging and data screens.
import { HashRouter, NavLink, Navigate, Route, Routes } from 'react-router-dom'
import { DataScreen } from './screens/DataScreen'
import { HistoryScreen } from './screens/HistoryScreen'
import { SessionScreen } from './screens/SessionScreen'
import { TemplatesScreen } from './screens/TemplatesScreen'

function App() {
  return (
    <HashRouter>
      <div className="app-shell">
        <div className="screen-area">
          <Routes>
            <Route path="/" element={<TemplatesScreen />} />
            <Route path="/templates" element={<TemplatesScreen />} />
            <Route path="/templates/:templateId/session" element={<SessionScreen />} />
            <Route path="/templates/:templateId/history" element={<HistoryScreen />} />
            <Route path="/data" element={<DataScreen />} />
            <Route path="*" element={<Navigate to="/templates" replace />} />
          </Routes>
        </div>

        <nav className="bottom-nav" aria-label="Primary navigation">
          <NavLink
            to="/templates"
            className={({ isActive }) => navClassName(isActive)}
          >
            Templates
          </NavLink>
          <NavLink
            to="/data"
            className={({ isActive }) => navClassName(isActive)}
          >
            Data
          </NavLink>
        </nav>
      </div>
    </HashRouter>
  )
}

function navClassName(isActive: boolean): string {
  return isActive ? 'nav-link nav-link--active' : 'nav-link'
}

export default App
