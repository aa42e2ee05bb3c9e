/**
 * Zod validation schemas for local input files, API responses and environment
 *
 * Usage:
 * ```typescript
 * import { OutputDocumentSchema } from '../validations/schemas'
 *
 * const result = OutputDocumentSchema.safeParse(parseJsonText(text))
 * if (!result.success) {
 *   throw new InputError('INVALID_FORMAT', formatZodError(result.error))
 * }
 * // Use result.data (typed and validated)
 * ```
 */

import { z, type ZodError } from 'zod'

// =============================================================================
// Output Document (`terraform output -json`)
// =============================================================================

export const OutputEntrySchema = z.object({
  sensitive: z.boolean({
    required_error: 'sensitive flag is required',
    invalid_type_error: 'sensitive must be a boolean',
  }),
  // `type` is Terraform's type constraint expression; not needed for export
  type: z.unknown().optional(),
  value: z.unknown(),
})

export const OutputDocumentSchema = z.record(z.string(), OutputEntrySchema)

export type OutputEntry = z.infer<typeof OutputEntrySchema>

// =============================================================================
// Workspace Variables API
// =============================================================================

export const VariableAttributesSchema = z.object({
  key: z.string().min(1, 'Variable key is required'),
  // Sensitive variables are echoed with a null value
  value: z.string().nullable().optional().transform((v) => v ?? ''),
  description: z.string().nullable().optional().transform((v) => v ?? ''),
  category: z.string().optional(),
  hcl: z.boolean().optional().default(false),
  sensitive: z.boolean().optional().default(false),
})

export const VariableResourceSchema = z.object({
  id: z.string().min(1, 'Variable id is required'),
  type: z.string().optional(),
  attributes: VariableAttributesSchema,
})

export const LinksSchema = z
  .object({
    next: z.string().nullable().optional(),
  })
  .passthrough()

export const VariableListResponseSchema = z.object({
  data: z.array(VariableResourceSchema),
  links: LinksSchema.optional(),
})

export const VariableResponseSchema = z.object({
  data: VariableResourceSchema,
})

export type VariableResource = z.infer<typeof VariableResourceSchema>
export type VariableListResponse = z.infer<typeof VariableListResponseSchema>

// =============================================================================
// Projects & Workspaces API
// =============================================================================

export const PaginationMetaSchema = z
  .object({
    pagination: z
      .object({
        'current-page': z.number().int().optional(),
        'next-page': z.number().int().nullable().optional(),
        'total-pages': z.number().int().optional(),
        'total-count': z.number().int().optional(),
      })
      .optional(),
  })
  .passthrough()

export const ProjectResourceSchema = z.object({
  id: z.string().min(1),
  attributes: z.object({
    name: z.string(),
  }),
})

export const ProjectListResponseSchema = z.object({
  data: z.array(ProjectResourceSchema),
  meta: PaginationMetaSchema.optional(),
})

export const WorkspaceResourceSchema = z.object({
  id: z.string().min(1),
  attributes: z.object({
    name: z.string(),
  }),
  relationships: z
    .object({
      project: z
        .object({
          data: z.object({ id: z.string() }).nullable().optional(),
        })
        .optional(),
    })
    .optional(),
})

export const WorkspaceListResponseSchema = z.object({
  data: z.array(WorkspaceResourceSchema),
  meta: PaginationMetaSchema.optional(),
})

export type ProjectListResponse = z.infer<typeof ProjectListResponseSchema>
export type WorkspaceListResponse = z.infer<typeof WorkspaceListResponseSchema>

// =============================================================================
// Environment
// =============================================================================

export const EnvironmentSchema = z.object({
  TFVE_ORGANIZATION_NAME: z
    .string({ required_error: 'TFVE_ORGANIZATION_NAME environment variable is required' })
    .min(1, 'TFVE_ORGANIZATION_NAME environment variable is required'),
  TFVE_TOKEN: z
    .string({ required_error: 'TFVE_TOKEN environment variable is required' })
    .min(1, 'TFVE_TOKEN environment variable is required'),
  TFVE_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int('TFVE_REQUEST_TIMEOUT_MS must be an integer')
    .positive('TFVE_REQUEST_TIMEOUT_MS must be positive')
    .optional(),
})

export const BaseUrlSchema = z
  .string()
  .url('Base URL must be a valid URL')
  .refine((url) => /^https?:\/\//.test(url), 'Base URL must use http or https')

// =============================================================================
// Helpers
// =============================================================================

/**
 * One line per issue, `path: message`.
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
