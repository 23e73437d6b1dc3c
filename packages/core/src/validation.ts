/**
 * Declaration and option schemas
 */

import { z } from 'zod';
import type { ZodError } from 'zod';

export const nameSchema = z
  .string()
  .min(1, 'must be a non-empty string')
  .refine((value) => value === value.trim(), 'must not have leading/trailing whitespace');

function duplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated: string[] = [];
  for (const name of names) {
    if (seen.has(name) && !repeated.includes(name)) repeated.push(name);
    seen.add(name);
  }
  return repeated;
}

export const needSchema = z.union([
  nameSchema,
  z.object({ name: nameSchema, optional: z.literal(true) }),
]);

export const declarationSchema = z.object({
  name: nameSchema,
  needs: z.array(needSchema).superRefine((needs, ctx) => {
    const names = needs.map((need) => (typeof need === 'string' ? need : need.name));
    for (const name of duplicates(names)) {
      ctx.addIssue({ code: 'custom', message: `duplicate need "${name}"` });
    }
  }),
  provides: z.array(nameSchema).superRefine((provides, ctx) => {
    for (const name of duplicates(provides)) {
      ctx.addIssue({ code: 'custom', message: `duplicate output "${name}"` });
    }
  }),
});

export const executeOptionsSchema = z.object({
  method: z.enum(['sequential', 'parallel']),
  maxConcurrency: z.number().int().positive(),
});

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
