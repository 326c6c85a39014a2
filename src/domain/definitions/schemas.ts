import { z } from 'zod';

/** A plugin name is one directory under the plugins root: no separators, no `..`. */
export function isPlainPluginName(name: string): boolean {
  return !/[/\\]/.test(name) && !name.includes('..');
}

/** One plugin definition file, in its on-disk (snake_case) shape. */
export const DefinitionFileSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1)
    .refine(isPlainPluginName, 'must not contain a path separator or ..')
    .optional(),
  url: z.string().trim().min(1, 'url is required'),
  local: z.boolean().default(false),
  source: z
    .union([z.string().min(1), z.array(z.string().min(1))])
    .default([])
    .transform((v) => (typeof v === 'string' ? [v] : v)),
  // unquoted `1.10` would arrive as a number and lose its trailing zero
  tag: z.string().min(1).optional(),
  skip_auto_update: z.boolean().default(false),
});

export type DefinitionFile = z.infer<typeof DefinitionFileSchema>;
