import { useEffect, useState } from 'react'
import { CRITERIA, getTeams, submitEvaluation, type CriterionScores, type Team } from '../api/client'
import TeamsNotice from '../components/TeamsNotice'
import { SCORE_OPTIONS } from '../utils/format'

const INITIAL_SCORES: CriterionScores = {
  novelty: 1,
  scalability: 1,
  socialImpact: 1,
  feasibility: 1,
}

export default function Evaluate() {
  const [teams, setTeams] = useState<Team[]>([])
  const [loading, setLoading] = useState(true)
  const [loadError, setLoadError] = useState<string | null>(null)
  const [isSubmitting, setIsSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const [success, setSuccess] = useState<string | null>(null)

  const [teamName, setTeamName] = useState('')
  const [scores, setScores] = useState<CriterionScores>(INITIAL_SCORES)

  useEffect(() => {
    getTeams()
      .then((loaded) => {
        setTeams(loaded)
        if (loaded.length > 0) setTeamName(loaded[0].teamName)
      })
      .catch((err) => setLoadError(err instanceof Error ? err.message : 'Unknown error'))
      .finally(() => setLoading(false))
  }, [])

  async function handleSubmit(e: React.FormEvent<HTMLFormElement>) {
    e.preventDefault()
    setError(null)
    setSuccess(null)
    setIsSubmitting(true)

    try {
      const evaluation = await submitEvaluation({ teamName, ...scores })
      setSuccess(`Evaluation submitted for ${evaluation.teamName}`)
      setScores(INITIAL_SCORES)
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Something went wrong')
    } finally {
      setIsSubmitting(false)
    }
  }

  if (loading) {
    return <div className="text-gray-500">Loading...</div>
  }

  return (
    <section className="max-w-2xl">
      <h2 className="text-xl font-semibold mb-4">2️⃣ Judge Evaluation</h2>

      {loadError || teams.length === 0 ? (
        <TeamsNotice loadError={loadError} />
      ) : (
        <form onSubmit={handleSubmit} className="space-y-6 bg-white p-8 rounded-lg border">
          <div>
            <label htmlFor="team" className="block text-sm font-medium text-gray-700 mb-2">
              Select Team
            </label>
            <select
              id="team"
              value={teamName}
              onChange={(e) => setTeamName(e.target.value)}
              className="w-full p-3 border rounded-lg focus:ring-2 focus:ring-blue-500 focus:border-blue-500"
            >
              {teams.map(team => (
                <option key={team.teamName} value={team.teamName}>{team.teamName}</option>
              ))}
            </select>
          </div>

          {CRITERIA.map(criterion => (
            <fieldset key={criterion.key}>
              <legend className="text-sm font-medium text-gray-700 mb-2">{criterion.label}</legend>
              <div className="flex gap-4">
                {SCORE_OPTIONS.map(option => (
                  <label key={option} className="inline-flex items-center gap-1.5 text-sm cursor-pointer">
                    <input
                      type="radio"
                      name={criterion.key}
                      value={option}
                      checked={scores[criterion.key] === option}
                      onChange={() => setScores(prev => ({ ...prev, [criterion.key]: option }))}
                    />
                    {option}
                  </label>
                ))}
              </div>
            </fieldset>
          ))}

          {error && <div className="p-4 bg-red-50 text-red-700 rounded-lg">{error}</div>}
          {success && <div className="p-4 bg-green-50 text-green-700 rounded-lg">{success}</div>}

          <button
            type="submit"
            disabled={isSubmitting}
            className="py-3 px-6 bg-blue-600 text-white rounded-lg hover:bg-blue-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
          >
            {isSubmitting ? 'Submitting...' : 'Submit Evaluation'}
          </button>
        </form>
      )}
    </section>
  )
}
