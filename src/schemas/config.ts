import { z } from 'zod'

import { MAX_INSTANCE_ID, MIN_INSTANCE_ID } from '../types/instance-id.js'

// Object store type enum
export const objectStoreTypeSchema = z.enum(['memory', 'mongodb', 'redis', 's3'])

const optionalString = z
  .string()
  .trim()
  .transform((val) => (val === '' ? undefined : val))
  .optional()

// Environment variables read at startup
export const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(51818),
    INSTANCE_STORE: objectStoreTypeSchema.default('memory'),
    INSTANCE_NAMESPACE: z.string().trim().min(1, 'Namespace cannot be empty').default('application-instance-ids'),
    INSTANCE_ID: z
      .string()
      .trim()
      .regex(/^[1-9][0-9]*$/, 'INSTANCE_ID must be a positive integer without leading zeros')
      .transform(Number)
      .pipe(z.number().int().min(MIN_INSTANCE_ID).max(MAX_INSTANCE_ID))
      .optional(),
    APP_NAME: optionalString,
    SERVER_NAME: optionalString,
    MONGODB_URL: optionalString,
    REDIS_URL: optionalString,
    S3_REGION: z.string().trim().min(1).default('us-east-1'),
    S3_ENDPOINT: z
      .string()
      .trim()
      .refine(
        (val) => {
          try {
            new URL(val)
            return true
          } catch {
            return false
          }
        },
        { message: 'Invalid URL format' }
      )
      .optional(),
    S3_ACCESS_KEY_ID: optionalString,
    S3_SECRET_ACCESS_KEY: optionalString,
    ADMIN_APIKEYS: optionalString
  })
  .superRefine((env, ctx) => {
    // A fixed ID needs no store
    if (env.INSTANCE_ID !== undefined) return

    if (env.INSTANCE_STORE === 'mongodb' && !env.MONGODB_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MONGODB_URL'], message: 'MONGODB_URL is required for the mongodb store' })
    }
    if (env.INSTANCE_STORE === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'REDIS_URL is required for the redis store' })
    }
    if (env.INSTANCE_STORE === 's3') {
      if (!env.S3_ACCESS_KEY_ID) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['S3_ACCESS_KEY_ID'], message: 'S3_ACCESS_KEY_ID is required for the s3 store' })
      }
      if (!env.S3_SECRET_ACCESS_KEY) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['S3_SECRET_ACCESS_KEY'], message: 'S3_SECRET_ACCESS_KEY is required for the s3 store' })
      }
    }
  })

// Admin query for listing claimed IDs
export const claimsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0)
})
