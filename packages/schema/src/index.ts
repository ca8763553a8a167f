import { z } from 'zod'

// Common schemas
export const usernameSchema = z.string().min(1).max(100)
export const passwordSchema = z.string().min(1).max(255)
export const sessionNameSchema = z.string().min(1).max(255)

export const pairingStrategySchema = z.enum(['greedy', 'exact'])

// Session creation: one shared password for everyone
export const sharedPasswordRosterSchema = z.object({
  sessionName: sessionNameSchema,
  usernames: z.array(usernameSchema).min(2, 'At least 2 users required'),
  password: passwordSchema,
})

// Session creation: a password per participant
export const individualPasswordRosterSchema = z.object({
  sessionName: sessionNameSchema,
  users: z
    .array(
      z.object({
        username: usernameSchema,
        password: passwordSchema,
      }),
    )
    .min(2, 'At least 2 users required'),
})

export const createSessionSchema = z.union([sharedPasswordRosterSchema, individualPasswordRosterSchema])

export const loginSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
})

/**
 * Scores are only checked for being numbers here. Range, integrality and
 * self-ratings are filtered entry by entry when the submission is recorded.
 */
export const submitRatingsSchema = z.object({
  username: usernameSchema,
  ratings: z.record(z.string(), z.number()),
})

export const resultsQuerySchema = z.object({
  strategy: pairingStrategySchema.default('greedy'),
})

// Pairing results
export const pairRecordSchema = z.object({
  pair: z.tuple([z.string(), z.string()]),
  compatibility: z.number().min(0).max(100),
  ratings: z.record(z.string(), z.number().int().min(0).max(100)),
})

export const pairingResultsSchema = z.object({
  strategy: pairingStrategySchema,
  pairs: z.array(pairRecordSchema),
  unpaired: z.string().nullable(),
  totalCompatibility: z.number().min(0),
  averageCompatibility: z.number().min(0).max(100),
  numPairs: z.number().int().min(0),
})

export const submissionStatusSchema = z.object({
  sessionId: z.string(),
  sessionName: z.string(),
  totalUsers: z.number().int().min(0),
  submittedUsers: z.number().int().min(0),
  allSubmitted: z.boolean(),
  users: z.array(
    z.object({
      username: z.string(),
      hasSubmitted: z.boolean(),
    }),
  ),
})

// API Response schemas
export const apiResponseSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    success: z.boolean(),
    data: dataSchema.optional(),
    error: z
      .object({
        code: z.string(),
        message: z.string(),
        details: z.unknown().optional(),
      })
      .optional(),
    meta: z.object({
      requestId: z.string(),
      timestamp: z.string().datetime(),
    }),
  })

export type PairingStrategy = z.infer<typeof pairingStrategySchema>
export type CreateSessionInput = z.infer<typeof createSessionSchema>
export type PairRecord = z.infer<typeof pairRecordSchema>
export type PairingResults = z.infer<typeof pairingResultsSchema>
export type SubmissionStatus = z.infer<typeof submissionStatusSchema>
