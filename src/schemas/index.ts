import { z } from 'zod'
import { BadRequestError, BackendUnavailableError } from '../errors.js'
import { Tier } from '../types/gateway.js'

export const generateKeyBodySchema = z
  .object({
    tier: z.nativeEnum(Tier, {
      errorMap: () => ({ message: 'Invalid tier. Must be: free, pro, or enterprise' }),
    }).default(Tier.FREE),
  })
  .default({})

/** Status of one chain connection as reported by the backend. */
export const chainStatusSchema = z
  .object({
    status: z.string(),
    peers: z.number().int(),
    message: z.string(),
    ready: z.boolean().optional(),
    last_attempt: z.string().optional(),
    connection_status: z.string().optional(),
    protocol_note: z.string().optional(),
    bootstrap_nodes: z.array(z.unknown()).optional(),
  })
  .passthrough()

export const backendStatusSchema = z.object({
  status: z.string().default('unknown'),
  uptime: z.union([z.string(), z.number()]).default('unknown'),
  chains: z.record(chainStatusSchema).default({}),
  sla_assessment: z.record(z.unknown()).default({}),
  system_health: z.record(z.unknown()).default({}),
})

export const backendReadinessSchema = z.record(z.unknown())

/**
 * Parses a request body, turning validation failures into a 400.
 */
export function parseRequestBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new BadRequestError(result.error.issues.map((issue) => issue.message).join('; '))
  }
  return result.data
}

/**
 * Parses a backend document. A backend that answers with the wrong shape is
 * treated like one that did not answer.
 */
export function parseBackendDocument<T extends z.ZodTypeAny>(schema: T, document: unknown, path: string): z.output<T> {
  const result = schema.safeParse(document)
  if (!result.success) {
    throw new BackendUnavailableError(`Backend returned an unexpected document for ${path}`, { cause: result.error })
  }
  return result.data
}
