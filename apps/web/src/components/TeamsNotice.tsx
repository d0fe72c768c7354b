import { Link } from 'react-router-dom'

interface Props {
  loadError: string | null
}

// Shown instead of the evaluation form when there is no team to score
export default function TeamsNotice({ loadError }: Props) {
  if (loadError) {
    return (
      <div role="alert" className="p-4 bg-red-50 text-red-700 rounded-lg">
        {`Could not load teams: ${loadError}`}
      </div>
    )
  }

  return (
    <div className="p-4 bg-amber-50 text-amber-700 rounded-lg">
      Please add teams first.{' '}
      <Link to="/" className="underline">Register a team</Link>
    </div>
  )
}
