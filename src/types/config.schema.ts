import * as path from 'path';
import { z } from 'zod';

const TRAILING_SEPARATORS = /[\\/]+$/;

/**
 * A tracked path must name something strictly below the home directory
 */
function staysInsideHome(normalized: string): boolean {
  return normalized !== '.' && normalized !== '..' && !normalized.startsWith(`..${path.sep}`);
}

/**
 * A tracked path, normalized (`./.vimrc` becomes `.vimrc`, trailing slashes are dropped
 * so a linked directory is never followed by accident)
 */
export const TrackedItemSchema = z.string().transform((item, ctx) => {
  if (item.trim() === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Tracked path cannot be empty' });
    return z.NEVER;
  }

  if (path.isAbsolute(item)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Tracked path must be relative to the home directory',
    });
    return z.NEVER;
  }

  const normalized = path.normalize(item).replace(TRAILING_SEPARATORS, '');
  if (!staysInsideHome(normalized)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Tracked path must stay inside the home directory',
    });
    return z.NEVER;
  }

  return normalized;
});

export const DotfilesConfigSchema = z.object({
  dotfiles: z.array(TrackedItemSchema),
});
