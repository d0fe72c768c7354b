import type { Context } from 'hono'
import type { ZodError } from 'zod'

/**
 * zValidator hook: answer with the first issue as `{ error }`
 */
export function firstIssue(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    return c.json({ error: result.error.issues[0]?.message ?? 'Invalid request' }, 400)
  }
}
