import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { SummaryRow } from '../api/client'
import { formatScore } from '../utils/format'

interface ScoreChartProps {
  summary: SummaryRow[]
  maxScore: number
  height?: number
}

const BAR_COLOR = '#6495ed'

export default function ScoreChart({ summary, maxScore, height = 320 }: ScoreChartProps) {
  return (
    <div className="bg-white rounded-lg border p-4">
      <h3 className="text-sm font-medium text-gray-700 mb-3">Total Score by Team</h3>
      <ResponsiveContainer width="100%" height={height}>
        <BarChart data={summary} margin={{ top: 5, right: 20, left: 10, bottom: 40 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" vertical={false} />
          <XAxis dataKey="teamName" fontSize={12} angle={-45} textAnchor="end" interval={0} />
          <YAxis
            domain={[0, maxScore]}
            fontSize={12}
            label={{ value: 'Score', angle: -90, position: 'insideLeft' }}
          />
          <Tooltip formatter={(value) => (typeof value === 'number' ? formatScore(value) : value)} />
          <Bar dataKey="totalScore" name="Total Score" fill={BAR_COLOR} />
        </BarChart>
      </ResponsiveContainer>
    </div>
  )
}
