import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.literal('healthy'),
  timestamp: z.string().datetime(),
  uptimeSeconds: z.number().nonnegative(),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
