import { useEffect, useState } from 'react'
import { createTeam, getTeams, type Team } from '../api/client'
import { clampTeamSize, TEAM_SIZE } from '../utils/format'

export default function Teams() {
  const [teams, setTeams] = useState<Team[]>([])
  const [loading, setLoading] = useState(true)
  const [isSubmitting, setIsSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const [success, setSuccess] = useState<string | null>(null)

  const [teamName, setTeamName] = useState('')
  const [teamSize, setTeamSize] = useState<number>(TEAM_SIZE.min)
  const [description, setDescription] = useState('')

  useEffect(() => {
    getTeams()
      .then(setTeams)
      .catch((err) => setError(err instanceof Error ? err.message : 'Could not load teams'))
      .finally(() => setLoading(false))
  }, [])

  async function handleSubmit(e: React.FormEvent<HTMLFormElement>) {
    e.preventDefault()
    setError(null)
    setSuccess(null)

    if (!teamName.trim()) {
      setError('Team name is required.')
      return
    }

    setIsSubmitting(true)
    try {
      const team = await createTeam({ teamName, teamSize, description })
      setTeams(prev => [...prev, team])
      setSuccess(`Team ${team.teamName} added successfully!`)
      setTeamName('')
      setTeamSize(TEAM_SIZE.min)
      setDescription('')
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Something went wrong')
    } finally {
      setIsSubmitting(false)
    }
  }

  return (
    <div className="space-y-10">
      <section className="max-w-2xl">
        <h2 className="text-xl font-semibold mb-4">1️⃣ Participant Team Information</h2>

        <form onSubmit={handleSubmit} className="space-y-6 bg-white p-8 rounded-lg border">
          <div>
            <label htmlFor="teamName" className="block text-sm font-medium text-gray-700 mb-2">
              Team Name
            </label>
            <input
              type="text"
              id="teamName"
              value={teamName}
              onChange={(e) => setTeamName(e.target.value)}
              className="w-full p-3 border rounded-lg focus:ring-2 focus:ring-blue-500 focus:border-blue-500"
            />
          </div>

          <div>
            <label htmlFor="teamSize" className="block text-sm font-medium text-gray-700 mb-2">
              Team Size
            </label>
            <input
              type="number"
              id="teamSize"
              min={TEAM_SIZE.min}
              max={TEAM_SIZE.max}
              step={1}
              value={teamSize}
              onChange={(e) => setTeamSize(clampTeamSize(e.target.valueAsNumber))}
              className="w-32 p-3 border rounded-lg focus:ring-2 focus:ring-blue-500 focus:border-blue-500"
            />
          </div>

          <div>
            <label htmlFor="description" className="block text-sm font-medium text-gray-700 mb-2">
              Project Description
            </label>
            <textarea
              id="description"
              rows={5}
              value={description}
              onChange={(e) => setDescription(e.target.value)}
              className="w-full p-3 border rounded-lg focus:ring-2 focus:ring-blue-500 focus:border-blue-500"
            />
          </div>

          {error && <div className="p-4 bg-red-50 text-red-700 rounded-lg">{error}</div>}
          {success && <div className="p-4 bg-green-50 text-green-700 rounded-lg">{success}</div>}

          <button
            type="submit"
            disabled={isSubmitting}
            className="py-3 px-6 bg-blue-600 text-white rounded-lg hover:bg-blue-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
          >
            {isSubmitting ? 'Adding...' : 'Add Team'}
          </button>
        </form>
      </section>

      {loading ? (
        <div className="text-gray-500">Loading...</div>
      ) : teams.length > 0 && (
        <section>
          <h3 className="text-lg font-semibold mb-3">📋 Registered Teams</h3>
          <table className="w-full text-sm border">
            <thead className="bg-gray-50 text-left text-gray-600">
              <tr>
                <th className="p-3 font-medium">Team Name</th>
                <th className="p-3 font-medium">Team Size</th>
                <th className="p-3 font-medium">Description</th>
              </tr>
            </thead>
            <tbody>
              {teams.map(team => (
                <tr key={team.teamName} className="border-t">
                  <td className="p-3">{team.teamName}</td>
                  <td className="p-3">{team.teamSize}</td>
                  <td className="p-3 text-gray-700 whitespace-pre-line">{team.description}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </section>
      )}
    </div>
  )
}
