import { useEffect, useState } from 'react'
import { exportUrl, getResults, type Results as ResultsData } from '../api/client'
import ScoreChart from '../components/ScoreChart'
import { formatScore } from '../utils/format'

export default function Results() {
  const [results, setResults] = useState<ResultsData | null>(null)
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    getResults()
      .then(setResults)
      .catch((err) => setError(err instanceof Error ? err.message : 'Could not load results'))
      .finally(() => setLoading(false))
  }, [])

  if (loading) {
    return <div className="text-gray-500">Loading...</div>
  }

  if (error || !results) {
    return <div className="text-red-600">Error: {error ?? 'No results'}</div>
  }

  return (
    <section className="space-y-8">
      <h2 className="text-xl font-semibold">3️⃣ Results &amp; Analytics</h2>

      {results.summary.length === 0 ? (
        <div className="p-4 bg-blue-50 text-blue-700 rounded-lg">No evaluations available yet.</div>
      ) : (
        <>
          <div>
            <h3 className="text-lg font-semibold mb-3">📋 Final Scores</h3>
            <table className="w-full text-sm border">
              <thead className="bg-gray-50 text-left text-gray-600">
                <tr>
                  <th className="p-3 font-medium">Team Name</th>
                  {results.criteria.map(criterion => (
                    <th key={criterion.key} className="p-3 font-medium text-right">{criterion.column}</th>
                  ))}
                  <th className="p-3 font-medium text-right">Total Score</th>
                </tr>
              </thead>
              <tbody>
                {results.summary.map(row => (
                  <tr key={row.teamName} className="border-t">
                    <td className="p-3">{row.teamName}</td>
                    {results.criteria.map(criterion => (
                      <td key={criterion.key} className="p-3 text-right tabular-nums">
                        {formatScore(row[criterion.key])}
                      </td>
                    ))}
                    <td className="p-3 text-right font-medium tabular-nums">{formatScore(row.totalScore)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>

          <ScoreChart summary={results.summary} maxScore={results.maxTotalScore} />

          <div>
            <h3 className="text-lg font-semibold mb-3">⬇️ Export Results</h3>
            <div className="flex gap-3">
              <a
                href={exportUrl('xlsx')}
                download
                className="py-3 px-6 bg-blue-600 text-white rounded-lg hover:bg-blue-700 transition-colors"
              >
                📥 Download Excel
              </a>
              <a
                href={exportUrl('pdf')}
                download
                className="py-3 px-6 bg-gray-100 text-gray-700 rounded-lg hover:bg-gray-200 transition-colors"
              >
                📄 Download PDF
              </a>
            </div>
          </div>
        </>
      )}
    </section>
  )
}
