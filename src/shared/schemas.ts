import { z } from 'zod';

export const WorkspaceConfigSchema = z.object({
  workspace_id: z.string().min(1),
  template_root: z.string().min(1),
  output_root: z.string().min(1),
  created_at: z.string(),
  version: z.string(),
});

export const TEMPLATE_TIERS = ['tier0', 'tier1', 'tier2', 'tier3', 'concrete'] as const;

function compiles(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const regexString = z
  .string()
  .min(1, 'pattern must not be empty')
  .refine(compiles, (source) => ({ message: `not a valid regular expression: ${source}` }));

/**
 * A content rule a template declares for the files it produces. The pattern
 * is searched line by line (multiline mode); `forbid` inverts the check.
 */
export const ValidationRuleSchema = z.object({
  rule: z.string().regex(/^[a-z0-9_]+$/, 'rule ids use lowercase letters, digits and "_"'),
  description: z.string().optional(),
  pattern: regexString,
  forbid: z.boolean().default(false),
});

export const TemplateValidatesSchema = z.object({
  strict: z.array(ValidationRuleSchema).default([]),
  guidelines: z.array(ValidationRuleSchema).default([]),
});

export const TemplateHeaderSchema = z.object({
  id: z.string().optional(),
  version: z.coerce.string().default('0.0.0'),
  tier: z.enum(TEMPLATE_TIERS).optional(),
  extends: z.string().nullable().optional(),
  description: z.string().optional(),
  exports: z.array(z.string()).default([]),
  validates: TemplateValidatesSchema.optional(),
});

export const COMMENT_SYNTAXES = ['hash', 'double_slash', 'html_comment', 'template_comment'] as const;

export const CommentPatternSchema = z.object({
  syntax: z.enum(COMMENT_SYNTAXES),
  prefix: z.string().min(1, 'prefix must not be empty'),
  suffix: z.string().default(''),
  metadata_line_regex: regexString,
  filepath_line_regex: regexString.optional(),
  extensions: z.array(z.string().regex(/^\.\w+$/, 'extensions look like ".ext"')).default([]),
});

export const MetadataFieldSchema = z.object({
  name: z.string().min(1, 'field name must not be empty'),
  format_regex: regexString,
  required: z.boolean().default(true),
  description: z.string().optional(),
});

export const ScaffoldMetadataDocumentSchema = z
  .object({
    version: z.coerce.string().default('1.0'),
    comment_patterns: z.array(CommentPatternSchema).min(1, 'at least one comment pattern is required'),
    metadata_fields: z.array(MetadataFieldSchema).min(1, 'at least one metadata field is required'),
  })
  .superRefine((doc, ctx) => {
    const seenSyntax = new Set<string>();
    doc.comment_patterns.forEach((pattern, index) => {
      if (seenSyntax.has(pattern.syntax)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['comment_patterns', index, 'syntax'],
          message: `duplicate comment syntax: ${pattern.syntax}`,
        });
      }
      seenSyntax.add(pattern.syntax);
    });
    const seenField = new Set<string>();
    doc.metadata_fields.forEach((field, index) => {
      if (seenField.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['metadata_fields', index, 'name'],
          message: `duplicate metadata field: ${field.name}`,
        });
      }
      seenField.add(field.name);
    });
  });

export const ARTIFACT_KINDS = ['code', 'doc', 'config', 'tracking'] as const;

export const ArtifactDefinitionSchema = z.object({
  type_id: z.string().regex(/^[a-z0-9_-]+$/, 'type ids use lowercase letters, digits, "_" and "-"'),
  name: z.string().min(1),
  description: z.string().default(''),
  kind: z.enum(ARTIFACT_KINDS),
  output_type: z.enum(['file', 'ephemeral']).default('file'),
  template: z.string().min(1),
  file_extension: z.string().regex(/^\.\w+$/),
  name_suffix: z.string().default(''),
  output_dir: z.string().default('.'),
  // Context key holding the base file name; defaults to `name`.
  name_field: z.string().default('name'),
});

export const ArtifactRegistryDocumentSchema = z
  .object({
    version: z.coerce.string().default('1.0'),
    artifact_types: z.array(ArtifactDefinitionSchema).min(1, 'at least one artifact type is required'),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.artifact_types.forEach((def, index) => {
      if (seen.has(def.type_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['artifact_types', index, 'type_id'],
          message: `duplicate artifact type: ${def.type_id}`,
        });
      }
      seen.add(def.type_id);
    });
  });

export const TierVersionSchema = z.object({
  template: z.string(),
  version: z.string(),
});

export const VersionEntrySchema = z.object({
  artifact_type: z.string(),
  created: z.string(),
  tiers: z.array(TierVersionSchema),
});

export const TemplateRegistryDocumentSchema = z.object({
  version: z.coerce.string().default('1.0'),
  version_hashes: z.record(VersionEntrySchema).default({}),
  current_versions: z.record(z.string()).default({}),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
export type TemplateTier = (typeof TEMPLATE_TIERS)[number];
export type TemplateHeader = z.infer<typeof TemplateHeaderSchema>;
export type ValidationRule = z.infer<typeof ValidationRuleSchema>;
export type TemplateValidates = z.infer<typeof TemplateValidatesSchema>;
export type CommentSyntax = (typeof COMMENT_SYNTAXES)[number];
export type CommentPatternDocument = z.infer<typeof CommentPatternSchema>;
export type MetadataFieldDocument = z.infer<typeof MetadataFieldSchema>;
export type ScaffoldMetadataDocument = z.infer<typeof ScaffoldMetadataDocumentSchema>;
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];
export type ArtifactDefinition = z.infer<typeof ArtifactDefinitionSchema>;
export type ArtifactRegistryDocument = z.infer<typeof ArtifactRegistryDocumentSchema>;
export type TierVersion = z.infer<typeof TierVersionSchema>;
export type VersionEntry = z.infer<typeof VersionEntrySchema>;
export type TemplateRegistryDocument = z.infer<typeof TemplateRegistryDocumentSchema>;

/** Flattens zod issues into `path: message` lines. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
