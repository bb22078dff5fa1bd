/**
 * Parser options, validated with zod at the API boundary
 */

import { z } from 'zod';
import { InvalidParserOptionsError } from '../errors/index.js';
import { Module, Profile } from '../profile/index.js';

export const DEFAULT_MAX_NESTING_DEPTH = 64;

export const parserOptionsSchema = z
  .object({
    /** Dialect profile; an `@profile` directive in the document overrides it */
    profile: z.enum([Profile.Litedoc, Profile.Md, Profile.MdStrict]).default(Profile.Litedoc),

    /** Extra constructs enabled for every document */
    modules: z
      .array(
        z.enum([
          Module.Tables,
          Module.Footnotes,
          Module.Math,
          Module.Tasks,
          Module.Strikethrough,
          Module.Autolink,
          Module.Html,
        ])
      )
      .default([]),

    /** Deepest container nesting before NestingDepthExceededError */
    maxNestingDepth: z.number().int().positive().default(DEFAULT_MAX_NESTING_DEPTH),

    /** Read `@profile` / `@modules` lines at the top of the document */
    honorDirectives: z.boolean().default(true),

    /** Log diagnostics and a per-parse summary to the console */
    debug: z.boolean().default(false),
  })
  .strict();

export type ParserOptions = z.input<typeof parserOptionsSchema>;
export type ResolvedParserOptions = z.output<typeof parserOptionsSchema>;

/**
 * Apply defaults. A bare profile is shorthand for `{ profile }`.
 */
export function resolveParserOptions(options?: Profile | ParserOptions): ResolvedParserOptions {
  const input = typeof options === 'string' ? { profile: options } : (options ?? {});
  const result = parserOptionsSchema.safeParse(input);

  if (!result.success) {
    throw new InvalidParserOptionsError(
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`)
    );
  }

  return result.data;
}
