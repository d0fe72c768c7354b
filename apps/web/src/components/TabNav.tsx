import { NavLink } from 'react-router-dom'

const TABS = [
  { to: '/', label: '👥 Participant Information' },
  { to: '/evaluate', label: '📝 Evaluation' },
  { to: '/results', label: '📊 Results & Export' },
]

export default function TabNav() {
  return (
    <nav className="flex gap-6 border-b mb-8">
      {TABS.map(tab => (
        <NavLink
          key={tab.to}
          to={tab.to}
          end
          className={({ isActive }) =>
            `pb-3 text-sm font-medium border-b-2 -mb-px transition-colors ${
              isActive
                ? 'border-blue-600 text-blue-700'
                : 'border-transparent text-gray-500 hover:text-gray-700'
            }`
          }
        >
          {tab.label}
        </NavLink>
      ))}
    </nav>
  )
}
