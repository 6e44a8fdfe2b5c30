import { z } from 'zod'

/**
 * Severity levels
 */
export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info'])

const isValidPattern = (source: string): boolean => {
  try {
    new RegExp(source, 'i')
    return true
  } catch {
    return false
  }
}

const PatternSchema = z.string()
  .min(1, 'Pattern must not be empty')
  .refine(isValidPattern, { message: 'Invalid regular expression' })

const ExtensionListSchema = z.array(
  z.string()
    .min(1, 'Extension must not be empty')
    .transform(ext => ext.replace(/^\./, '').toLowerCase())
)

/**
 * File access restrictions
 */
export const AccessSchema = z.object({
  check_symlinks: z.boolean()
    .default(true)
    .describe('Reject symbolic links before reading'),
  allowed_roots: z.array(z.string().min(1))
    .nullable()
    .default(null)
    .describe('Directories uploads must live under; null uses the system defaults, [] allows all'),
  storage_root: z.string()
    .min(1)
    .optional()
    .describe('Application storage directory added to the default roots')
})

/**
 * Caller-supplied magic byte signature
 */
export const CustomSignatureSchema = z.object({
  signature: z.string()
    .regex(/^(?:[0-9a-fA-F]{2})+$/, 'Signature must be an even-length hex string')
    .transform(hex => hex.toLowerCase()),
  media_type: z.string()
    .min(1, 'Media type is required'),
  offset: z.number()
    .int()
    .min(0, 'Offset must be >= 0')
    .default(0)
})

/**
 * Media type checks applied by the engine
 */
export const MimeSchema = z.object({
  strict_extension_match: z.boolean()
    .default(true)
    .describe('Require the declared extension to agree with the detected type'),
  block_dangerous: z.boolean()
    .default(true),
  allow_unknown: z.boolean()
    .default(true)
    .describe('Accept files whose type cannot be identified'),
  allowed_types: z.array(z.string().min(1))
    .default([])
    .describe('Accepted media types; type/* wildcards allowed, empty accepts all'),
  dangerous_types: z.array(z.string().min(1))
    .describe('Media types rejected outright'),
  custom_signatures: z.array(CustomSignatureSchema)
    .default([])
    .describe('Signatures checked before the built-in table')
})

/**
 * Per-scanner enable flags
 */
export const ScannersSchema = z.object({
  code_injection: z.boolean().default(true),
  markup_injection: z.boolean().default(true),
  document_action: z.boolean().default(true),
  macro: z.boolean().default(true),
  metadata: z.boolean().default(true),
  archive: z.boolean().default(true)
})

export const CodeInjectionSchema = z.object({
  mode: z.enum(['default', 'strict', 'custom'])
    .default('default')
    .describe('default: built-in list; strict: most dangerous only; custom: exactly `functions`'),
  functions: z.array(z.string().min(1)).default([]),
  additional_functions: z.array(z.string().min(1)).default([]),
  exclude_functions: z.array(z.string().min(1)).default([]),
  additional_patterns: z.array(PatternSchema).default([]),
  exclude_patterns: z.array(z.string()).default([])
}).refine(
  data => data.mode !== 'custom' || data.functions.length > 0,
  { message: 'Custom mode requires at least one function', path: ['functions'] }
)

export const MarkupInjectionSchema = z.object({
  additional_tags: z.array(z.string().min(1)).default([]),
  exclude_tags: z.array(z.string().min(1)).default([]),
  additional_attributes: z.array(z.string().min(1)).default([]),
  exclude_attributes: z.array(z.string().min(1)).default([])
})

export const DocumentActionSchema = z.object({
  additional_actions: z.array(z.string().regex(/^\/\w+$/, 'Action must look like /Name')).default([]),
  exclude_actions: z.array(z.string().min(1)).default([]),
  block_javascript: z.boolean()
    .default(true)
    .describe('Treat embedded script as a threat'),
  block_external_links: z.boolean()
    .default(true)
    .describe('Treat external links and form targets as threats'),
  max_compressed_streams: z.number().int().min(0).default(50),
  max_hex_run_length: z.number().int().min(1).default(500)
})

export const MacroSchema = z.object({
  block_macros: z.boolean().default(true),
  block_legacy_controls: z.boolean()
    .default(true)
    .describe('Flag ActiveX controls and embedded OLE objects'),
  block_legacy_format: z.boolean()
    .default(true)
    .describe('Reject binary Office files, which cannot be checked for macros'),
  non_macro_extensions: ExtensionListSchema
    .default(['docx', 'xlsx', 'pptx', 'dotx', 'xltx', 'potx', 'ppsx']),
  allowed_macro_extensions: ExtensionListSchema.default([])
})

export const MetadataSchema = z.object({
  block_gps: z.boolean()
    .default(false)
    .describe('Treat embedded GPS coordinates as a threat'),
  strip_metadata: z.boolean()
    .default(false)
    .describe('Rewrite safe JPEG and PNG files without their metadata'),
  trailing_data_threshold: z.number()
    .int()
    .min(0)
    .default(100)
    .describe('Bytes tolerated after the image end marker'),
  scanned_fields: z.array(z.string().min(1))
    .describe('Free-text metadata fields checked for injected code')
})

export const ArchiveSchema = z.object({
  max_compression_ratio: z.number()
    .positive('Compression ratio must be > 0')
    .default(100),
  max_uncompressed_size: z.number()
    .int()
    .positive()
    .default(524288000),
  max_files_count: z.number()
    .int()
    .positive()
    .default(10000),
  max_nesting_depth: z.number()
    .int()
    .min(1, 'Nesting depth must be >= 1')
    .default(3),
  max_nested_archive_size: z.number()
    .int()
    .positive()
    .default(52428800)
    .describe('Largest nested archive read into memory for recursive inspection'),
  inspect_nested: z.boolean()
    .default(true),
  unavailable_backend: z.enum(['fail-closed', 'fail-open'])
    .default('fail-closed')
    .describe('Outcome for archive formats without an inspection backend'),
  blocked_extensions: ExtensionListSchema,
  additional_blocked_extensions: ExtensionListSchema.default([]),
  exclude_extensions: ExtensionListSchema.default([]),
  archive_extensions: ExtensionListSchema
})

export const EventsSchema = z.object({
  enabled: z.boolean().default(true),
  include_hash: z.boolean()
    .default(true)
    .describe('Add a SHA-256 digest of the file to event context')
})

/**
 * Complete policy schema
 */
export const PolicySchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Policy version in semver format'),

  name: z.string()
    .min(1, 'Policy name is required')
    .max(50, 'Policy name too long')
    .describe('Unique identifier for this policy'),

  description: z.string()
    .optional()
    .describe('Human-readable description of policy purpose'),

  extends: z.string()
    .optional()
    .describe('Base policy to extend'),

  access: AccessSchema.default({}),
  mime: MimeSchema,
  scanners: ScannersSchema.default({}),
  code_injection: CodeInjectionSchema.default({}),
  markup_injection: MarkupInjectionSchema.default({}),
  document_action: DocumentActionSchema.default({}),
  macro: MacroSchema.default({}),
  metadata: MetadataSchema,
  archive: ArchiveSchema,
  events: EventsSchema.default({})
})

export type Policy = z.infer<typeof PolicySchema>

/**
 * Validate policy content
 */
export function validatePolicy(data: unknown): Policy {
  return PolicySchema.parse(data)
}

/**
 * Validate policy with detailed errors
 */
export function validatePolicySafe(data: unknown):
  | { success: true; data: Policy }
  | { success: false; errors: z.ZodError } {
  const result = PolicySchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}
