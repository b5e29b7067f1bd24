import { ConfigurationError, readFileIfExists } from '@refactor-gate/common';
import type { RewriteTemplate } from '@refactor-gate/domain';
import { z } from 'zod';

const templateSchema = z.object({
  file_suffix: z.string().min(1),
  signature: z.string().min(1),
  replacement: z.union([z.string(), z.array(z.string())])
});

const templateFileSchema = z.union([z.array(templateSchema), z.object({ templates: z.array(templateSchema) })]);

export interface TemplateSource {
  path: string | null;
  templates: RewriteTemplate[];
}

/**
 * Curated function rewrites from a JSON file: a list, or `{ templates: [...] }`.
 * `replacement` may be given as lines. No path means no templates.
 */
export async function loadRewriteTemplates(path: string | null | undefined): Promise<TemplateSource> {
  if (!path) {
    return { path: null, templates: [] };
  }

  const text = await readFileIfExists(path);
  if (text === null) {
    throw new ConfigurationError(`Rewrite template file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Rewrite template file is not valid JSON: ${path}`, { cause: error });
  }

  const parsed = templateFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid rewrite template file ${path}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.templates;
  return {
    path,
    templates: entries.map((entry) => ({
      fileSuffix: entry.file_suffix,
      signature: entry.signature,
      replacement: Array.isArray(entry.replacement) ? entry.replacement.join('\n') : entry.replacement
    }))
  };
}
