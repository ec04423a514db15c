import matter from 'gray-matter';
import { load } from 'js-yaml';
import { TemplateSyntaxError, errorMessage } from '../shared/errors.js';
import { TemplateHeaderSchema, formatZodIssues, type TemplateHeader } from '../shared/schemas.js';

export const HEADER_OPEN = '{{!--';
export const HEADER_CLOSE = '--}}';

// Only a comment that opens on its own line is a header; `{{!-- note --}}`
// on line 1 is an ordinary comment.
const HEADER_START = /^\{\{!--\r?\n/;

function parseYaml(input: string): object {
  const doc = load(input);
  return typeof doc === 'object' && doc !== null ? doc : {};
}

export function hasTemplateHeader(source: string): boolean {
  return HEADER_START.test(source);
}

/**
 * Reads the YAML document in a template's leading `{{!-- … --}}` comment.
 * Returns null for templates without one. The comment stays in the source:
 * Handlebars drops it at render time.
 */
export function parseTemplateHeader(templateName: string, source: string): TemplateHeader | null {
  if (!hasTemplateHeader(source)) return null;

  let data: object;
  try {
    const file = matter(source, {
      delimiters: [HEADER_OPEN, HEADER_CLOSE],
      engines: { yaml: parseYaml },
    });
    data = file.data;
  } catch (err) {
    throw new TemplateSyntaxError(templateName, `unreadable template header: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = TemplateHeaderSchema.safeParse(data);
  if (!result.success) {
    throw new TemplateSyntaxError(templateName, `invalid template header: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
