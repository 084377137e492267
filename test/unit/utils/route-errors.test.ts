import { logRouteError } from '@utils/route-errors.js'
import type { FastifyRequest } from 'fastify'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('route-errors', () => {
  describe('logRouteError', () => {
    it('should log error with default message and route', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'POST',
        url: '/v1/sync',
        routeOptions: { url: '/v1/sync/' },
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error)

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'POST /v1/sync/' },
        'Error in route POST /v1/sync/',
      )
    })

    it('should use custom message when provided', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/v1/collections/category',
        routeOptions: { url: '/v1/collections/:entityType' },
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error, {
        message: 'Failed to list collection',
      })

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'GET /v1/collections/:entityType' },
        'Failed to list collection',
      )
    })

    it('should merge direct fields and context', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/v1/sync/status',
        routeOptions: { url: '/v1/sync/status' },
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error, {
        entityType: 'recipe',
        context: { position: '12' },
      })

      expect(mockLogger.error).toHaveBeenCalledWith(
        {
          error,
          route: 'GET /v1/sync/status',
          entityType: 'recipe',
          position: '12',
        },
        'Error in route GET /v1/sync/status',
      )
    })

    it('should use warn level when specified', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/v1/sync/status',
        routeOptions: { url: '/v1/sync/status' },
      } as unknown as FastifyRequest

      logRouteError(mockLogger, mockRequest, new Error('Test error'), {
        level: 'warn',
      })

      expect(mockLogger.warn).toHaveBeenCalledTimes(1)
      expect(mockLogger.error).not.toHaveBeenCalled()
      expect(mockLogger.info).not.toHaveBeenCalled()
    })

    it('should use info level when specified', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/v1/sync/status',
        routeOptions: { url: '/v1/sync/status' },
      } as unknown as FastifyRequest

      logRouteError(mockLogger, mockRequest, new Error('Test error'), {
        level: 'info',
      })

      expect(mockLogger.info).toHaveBeenCalledTimes(1)
      expect(mockLogger.error).not.toHaveBeenCalled()
      expect(mockLogger.warn).not.toHaveBeenCalled()
    })

    it('should fall back to request.url when routeOptions is missing', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/v1/unknown',
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error)

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'GET /v1/unknown' },
        'Error in route GET /v1/unknown',
      )
    })
  })
})
