import type { Request, Response, NextFunction, RequestHandler } from 'express'

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Requires one of `tokens` in `x-api-key`, `Authorization: Bearer`, or the
 * `key` / `api_key` query parameter. Health checks pass without a key.
 */
export function createApiKeyAuth(tokens: string[]): RequestHandler {
  const allowed = new Set(tokens)

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.method === 'GET' && req.path.startsWith('/health')) {
      return next()
    }
    if (allowed.size === 0) {
      // no tokens configured: deny by default
      return res.status(401).json({ success: false, error: 'API not configured: missing API_TOKENS' })
    }
    const presented =
      req.header('x-api-key') ||
      req.header('authorization')?.replace(/^Bearer\s+/i, '') ||
      queryValue(req.query.key) ||
      queryValue(req.query.api_key)
    if (!presented || !allowed.has(presented)) {
      return res.status(401).json({ success: false, error: 'Invalid or missing API key' })
    }
    return next()
  }
}
