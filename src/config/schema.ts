/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of the provider configuration snapshot.
 * Unknown keys pass through untouched: provider constructors may read
 * settings this module knows nothing about.
 */

import { z } from 'zod';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const ProviderNameSchema = z.string().trim().min(1, 'provider name must not be empty');

// =============================================================================
// Main Config Schema
// =============================================================================

export const ProviderConfigSchema = z
  .object({
    // Financial data
    data_provider: ProviderNameSchema,
    data_dir: z.string(),
    twelvedata_base_url: z.string().url(),

    // Language models
    llm_provider: ProviderNameSchema,
    deep_think_llm: z.string().min(1),
    quick_think_llm: z.string().min(1),
    backend_url: z.string().url(),
    embedding_model: z.string().min(1).optional(),
    embedding_backend_url: z.string().url().optional(),
    anthropic_base_url: z.string().url().optional(),
    google_base_url: z.string().url().optional(),

    // Credentials
    openai_api_key: z.string().optional(),
    anthropic_api_key: z.string().optional(),
    google_api_key: z.string().optional(),
    openrouter_api_key: z.string().optional(),
    twelvedata_api_key: z.string().optional(),
  })
  .passthrough();

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult =
  | { success: true; config: ProviderConfig; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = ProviderConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, config: result.data, errors: [] };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}
