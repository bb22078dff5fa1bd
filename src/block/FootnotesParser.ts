/**
 * Footnotes Parser
 *
 * Body of a `::footnotes` directive:
 *
 *   ::footnotes
 *   [^1]: First note.
 *       Indented continuation.
 *   [^src]: Second note.
 *   ::
 */

import type { DirectiveAttributes, FootnoteDef, FootnotesBlock } from '../ast/index.js';
import { ParseErrorKind } from '../errors/index.js';
import { unhandledRecovery } from '../recovery/index.js';
import type { Span } from '../span/index.js';
import { LineGroup } from './LineGroup.js';
import { dedent, indentWidth, isBlank, lineEnd, sliceLine, trimLine, trimLineStart, type Line } from './LineScanner.js';
import type { BlockParserContext, NestedBlockParser } from './types.js';

const FOOTNOTE_DEFINITION = /^\[\^([^\]\s]+)\]:(?:[ \t]+|$)/;

interface DefinitionDraft {
  id: string;
  group: LineGroup;
}

export class FootnotesParser {
  constructor(
    private readonly context: BlockParserContext,
    private readonly blocks: NestedBlockParser
  ) {}

  parse(body: readonly Line[], attributes: DirectiveAttributes, span: Span, depth: number): FootnotesBlock {
    const definitions: FootnoteDef[] = [];
    let draft: DefinitionDraft | null = null;

    for (const line of body) {
      if (isBlank(line)) {
        draft?.group.addBlank(line);
        continue;
      }

      const indent = indentWidth(line.text);
      const stripped = trimLineStart(line);
      const match = indent < 4 ? FOOTNOTE_DEFINITION.exec(stripped.text) : null;

      if (match) {
        if (draft) definitions.push(this.closeDefinition(draft, depth));
        draft = { id: match[1], group: new LineGroup(stripped.start, sliceLine(stripped, match[0].length)) };
        continue;
      }

      if (draft && indent > 0) {
        draft.group.add(dedent(line, 4));
        continue;
      }
      if (draft && !draft.group.hasPendingBlank) {
        draft.group.add(stripped);
        continue;
      }

      const trimmed = trimLine(line);
      const strategy = this.context.recovery.report(
        ParseErrorKind.InvalidFootnoteDefinition,
        this.context.source.span(trimmed.start, lineEnd(trimmed)),
        `Expected a "[^id]: text" footnote definition, found "${trimmed.text}"`
      );
      if (strategy !== 'skip') unhandledRecovery(strategy);
    }

    if (draft) definitions.push(this.closeDefinition(draft, depth));

    return { type: 'footnotes', definitions, attributes, span };
  }

  private closeDefinition(draft: DefinitionDraft, depth: number): FootnoteDef {
    return {
      id: draft.id,
      blocks: this.blocks.parseBlocks(draft.group.lines, depth + 1),
      span: this.context.source.span(draft.group.start, draft.group.end),
    };
  }
}
