/**
 * Document Assembler
 *
 * One parse, start to finish: document directives, front matter, blocks,
 * inlines. Every call builds its own source map, policy and recovery
 * controller, so nothing carries over between documents.
 *
 * @since 2026-10-19
 */

import type { Document } from '../ast/index.js';
import { BlockParser, splitLines } from '../block/index.js';
import { InlineParser } from '../inline/index.js';
import { MetadataExtractor } from '../metadata/index.js';
import { ProfilePolicy } from '../profile/index.js';
import { RecoveryController } from '../recovery/index.js';
import { SourceMap } from '../span/index.js';
import { readDocumentDirectives } from './directives.js';
import type { ResolvedParserOptions } from './options.js';

export interface Assembly {
  document: Document;
  recovery: RecoveryController;
}

export class DocumentAssembler {
  constructor(private readonly options: ResolvedParserOptions) {}

  assemble(text: string): Assembly {
    const { options } = this;
    const source = new SourceMap(text);
    const lines = splitLines(text);
    const recovery = new RecoveryController(options.profile, source, { debug: options.debug });

    let policy = new ProfilePolicy(options.profile, options.modules);
    let cursor = 0;

    if (options.honorDirectives) {
      const directives = readDocumentDirectives(lines, source, recovery);
      if (directives.profile) {
        policy = policy.withProfile(directives.profile);
        recovery.useProfile(directives.profile);
      }
      if (directives.modules.length > 0) {
        policy = policy.withModules(directives.modules);
      }
      cursor = directives.next;
    }

    const { metadata, next } = new MetadataExtractor(source, recovery).extract(lines, cursor);

    const blocks = new BlockParser({
      source,
      policy,
      recovery,
      inline: new InlineParser(source, policy.inlineFeatures()),
      maxNestingDepth: options.maxNestingDepth,
    }).parse(lines.slice(next));

    const document: Document = Object.freeze({
      profile: policy.profile,
      modules: policy.modules,
      metadata,
      blocks: Object.freeze(blocks),
      span: source.span(0, text.length),
    });

    return { document, recovery };
  }
}
