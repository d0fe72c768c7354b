import { Component, type ErrorInfo, type ReactNode } from 'react'
import { useLocation } from 'react-router-dom'

interface TabBoundaryProps {
  tab: string
  children: ReactNode
}

interface TabBoundaryState {
  message: string | null
}

class TabBoundary extends Component<TabBoundaryProps, TabBoundaryState> {
  state: TabBoundaryState = { message: null }

  static getDerivedStateFromError(error: unknown): TabBoundaryState {
    return { message: error instanceof Error ? error.message : String(error) }
  }

  componentDidCatch(error: unknown, info: ErrorInfo) {
    console.error(`[WEB] Render error on ${this.props.tab}:`, error, info.componentStack)
  }

  render() {
    if (this.state.message === null) {
      return this.props.children
    }

    return (
      <div role="alert" className="mt-6 p-6 bg-red-50 text-red-700 rounded-lg max-w-2xl">
        <p className="font-medium">This tab could not be displayed.</p>
        <p className="mt-1 text-sm">
          Submitted teams and scores are already in the spreadsheet. Pick another tab or reload the page.
        </p>
        <pre className="mt-3 text-xs whitespace-pre-wrap">{this.state.message}</pre>
      </div>
    )
  }
}

/**
 * Keeps a render error in one tab from blanking the whole app.
 * Keyed by path, so switching tabs starts from a clean boundary.
 */
export default function ErrorBoundary({ children }: { children: ReactNode }) {
  const { pathname } = useLocation()
  return <TabBoundary key={pathname} tab={pathname}>{children}</TabBoundary>
}
