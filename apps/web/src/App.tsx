import { BrowserRouter, Routes, Route } from 'react-router-dom'
import Teams from './pages/Teams'
import Evaluate from './pages/Evaluate'
import Results from './pages/Results'
import TabNav from './components/TabNav'
import ErrorBoundary from './components/ErrorBoundary'

export default function App() {
  return (
    <BrowserRouter>
      <div className="min-h-screen bg-white max-w-screen-xl mx-auto px-6 pt-10 pb-16">
        <h1 className="text-2xl font-semibold text-gray-900 mb-6">
          🏆 Competition Judging &amp; Evaluation System
        </h1>
        <TabNav />
        <ErrorBoundary>
          <Routes>
            <Route path="/" element={<Teams />} />
            <Route path="/evaluate" element={<Evaluate />} />
            <Route path="/results" element={<Results />} />
          </Routes>
        </ErrorBoundary>
      </div>
    </BrowserRouter>
  )
}
