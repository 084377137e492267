import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

type RouteLogLevel = 'error' | 'warn' | 'info'

export interface RouteErrorOptions {
  /** Log message; defaults to `Error in route <METHOD> <url>` */
  message?: string
  level?: RouteLogLevel
  context?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Logs a failure inside a route handler with the route and any extra
 * context fields attached.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  const logData = {
    error,
    route,
    ...fields,
    ...context,
  }

  log[level](logData, message ?? `Error in route ${route}`)
}
