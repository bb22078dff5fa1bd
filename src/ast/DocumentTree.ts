/**
 * DocumentTree - queries over a parsed document
 *
 * Walks blocks and inlines, finds nodes by type, and resolves footnote
 * references against their definitions.
 *
 * @since 2026-10-19
 */

import type {
  Block,
  BlockType,
  Document,
  FootnoteDef,
  FootnoteRefInline,
  Inline,
  InlineType,
} from './types.js';

export type BlockOfType<T extends BlockType> = Extract<Block, { type: T }>;
export type InlineOfType<T extends InlineType> = Extract<Inline, { type: T }>;

/**
 * Blocks nested directly inside a block (through list items and footnote
 * definitions where needed)
 */
export function childBlocks(block: Block): readonly Block[] {
  switch (block.type) {
    case 'list':
      return block.items.flatMap((item) => item.blocks);
    case 'footnotes':
      return block.definitions.flatMap((definition) => definition.blocks);
    case 'callout':
    case 'quote':
    case 'figure':
      return block.blocks;
    case 'heading':
    case 'paragraph':
    case 'code_block':
    case 'table':
    case 'math':
    case 'thematic_break':
    case 'html':
    case 'raw':
      return [];
    default: {
      const unreachable: never = block;
      throw new Error(`Unknown block: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Inline content owned by the block itself (not by nested blocks)
 */
export function blockInlines(block: Block): readonly Inline[] {
  switch (block.type) {
    case 'heading':
    case 'paragraph':
      return block.content;
    case 'figure':
      return block.caption ?? [];
    case 'table':
      return block.rows.flatMap((row) => row.cells.flatMap((cell) => cell.content));
    default:
      return [];
  }
}

export function childInlines(inline: Inline): readonly Inline[] {
  switch (inline.type) {
    case 'emphasis':
    case 'strong':
    case 'strikethrough':
    case 'link':
      return inline.children;
    default:
      return [];
  }
}

/**
 * Plain text of an inline sequence. Breaks become a space or newline.
 */
export function inlineText(inlines: readonly Inline[]): string {
  let text = '';
  for (const inline of inlines) {
    switch (inline.type) {
      case 'text':
      case 'code_span':
        text += inline.content;
        break;
      case 'autolink':
        text += inline.destination;
        break;
      case 'soft_break':
        text += ' ';
        break;
      case 'hard_break':
        text += '\n';
        break;
      case 'footnote_ref':
        break;
      case 'emphasis':
      case 'strong':
      case 'strikethrough':
      case 'link':
        text += inlineText(inline.children);
        break;
      default: {
        const unreachable: never = inline;
        throw new Error(`Unknown inline: ${JSON.stringify(unreachable)}`);
      }
    }
  }
  return text;
}

export class DocumentTree {
  constructor(public readonly document: Document) {}

  /**
   * Depth-first walk over every block. Return false from the callback to stop.
   */
  walkBlocks(callback: (block: Block, depth: number) => boolean | void): void {
    for (const block of this.document.blocks) {
      if (!this.traverseBlock(block, 0, callback)) return;
    }
  }

  /**
   * Depth-first walk over every inline, in document order
   */
  walkInlines(callback: (inline: Inline) => boolean | void): void {
    let stopped = false;
    this.walkBlocks((block) => {
      for (const inline of blockInlines(block)) {
        if (!this.traverseInline(inline, callback)) {
          stopped = true;
          return false;
        }
      }
      return !stopped;
    });
  }

  findBlocks<T extends BlockType>(type: T): BlockOfType<T>[] {
    const results: BlockOfType<T>[] = [];
    this.walkBlocks((block) => {
      if (isBlockOfType(block, type)) results.push(block);
    });
    return results;
  }

  findInlines<T extends InlineType>(type: T): InlineOfType<T>[] {
    const results: InlineOfType<T>[] = [];
    this.walkInlines((inline) => {
      if (isInlineOfType(inline, type)) results.push(inline);
    });
    return results;
  }

  /**
   * Footnote definitions by id. The first definition of an id wins.
   */
  footnoteDefinitions(): Map<string, FootnoteDef> {
    const definitions = new Map<string, FootnoteDef>();
    for (const block of this.findBlocks('footnotes')) {
      for (const definition of block.definitions) {
        if (!definitions.has(definition.id)) definitions.set(definition.id, definition);
      }
    }
    return definitions;
  }

  resolveFootnote(ref: FootnoteRefInline): FootnoteDef | null {
    return this.footnoteDefinitions().get(ref.id) ?? null;
  }

  /**
   * References with no matching definition. Not an error at parse time.
   */
  danglingFootnoteRefs(): FootnoteRefInline[] {
    const definitions = this.footnoteDefinitions();
    return this.findInlines('footnote_ref').filter((ref) => !definitions.has(ref.id));
  }

  /**
   * Heading levels and texts in document order
   */
  outline(): { level: number; text: string }[] {
    return this.findBlocks('heading').map((heading) => ({
      level: heading.level,
      text: inlineText(heading.content),
    }));
  }

  /**
   * All inline text of the document, whitespace collapsed
   */
  getTextContent(): string {
    const texts: string[] = [];
    this.walkBlocks((block) => {
      const inlines = blockInlines(block);
      if (inlines.length > 0) texts.push(inlineText(inlines));
    });
    return texts.join(' ').replace(/\s+/g, ' ').trim();
  }

  private traverseBlock(
    block: Block,
    depth: number,
    callback: (block: Block, depth: number) => boolean | void
  ): boolean {
    if (callback(block, depth) === false) return false;

    for (const child of childBlocks(block)) {
      if (!this.traverseBlock(child, depth + 1, callback)) return false;
    }

    return true;
  }

  private traverseInline(inline: Inline, callback: (inline: Inline) => boolean | void): boolean {
    if (callback(inline) === false) return false;

    for (const child of childInlines(inline)) {
      if (!this.traverseInline(child, callback)) return false;
    }

    return true;
  }
}

function isBlockOfType<T extends BlockType>(block: Block, type: T): block is BlockOfType<T> {
  return block.type === type;
}

function isInlineOfType<T extends InlineType>(inline: Inline, type: T): inline is InlineOfType<T> {
  return inline.type === type;
}
