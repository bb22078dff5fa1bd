/**
 * Document directives
 *
 * `@profile md` and `@modules tables, math` lines at the very top of a
 * document (blank lines allowed between them) adjust the parse for that
 * document only.
 */

import { lineEnd, trimLine, isBlank, type Line } from '../block/index.js';
import { ParseErrorKind } from '../errors/index.js';
import { moduleFromName, profileFromName, type Module, type Profile } from '../profile/index.js';
import type { RecoveryController } from '../recovery/index.js';
import type { SourceMap } from '../span/index.js';

const DIRECTIVE_LINE = /^@(profile|modules)(?:[ \t]+(.*))?$/;

export interface DocumentDirectives {
  /** Profile override, if an `@profile` line named a known profile */
  profile: Profile | null;
  modules: Module[];
  /** Index of the first line after the directives */
  next: number;
}

export function readDocumentDirectives(
  lines: readonly Line[],
  source: SourceMap,
  recovery: RecoveryController
): DocumentDirectives {
  const directives: DocumentDirectives = { profile: null, modules: [], next: 0 };

  for (let i = 0; i < lines.length; i++) {
    if (isBlank(lines[i])) continue;

    const line = trimLine(lines[i]);
    const match = DIRECTIVE_LINE.exec(line.text);
    if (!match) break;

    const [, name, value = ''] = match;
    if (name === 'profile') {
      const profile = profileFromName(value);
      if (profile) {
        directives.profile = profile;
      } else {
        recovery.report(
          ParseErrorKind.UnknownDirective,
          source.span(line.start, lineEnd(line)),
          `Unknown profile "${value.trim()}"`
        );
      }
    } else {
      // Unknown module names are ignored
      for (const moduleName of value.split(',')) {
        const module = moduleFromName(moduleName);
        if (module) directives.modules.push(module);
      }
    }

    directives.next = i + 1;
  }

  return directives;
}
