/**
 * Profile Policy
 *
 * Static tables deciding which constructs a profile recognises and how
 * strictly it treats failures. Modules enabled for a document switch extra
 * constructs on. Every lookup is a pure function of profile, modules and
 * construct.
 *
 * @since 2026-10-19
 */

import {
  Profile,
  Module,
  type Construct,
  type DirectiveName,
  type InlineFeatures,
  type ProfileRules,
} from './types.js';

const CORE_CONSTRUCTS: readonly Construct[] = [
  'list_directive',
  'quote_directive',
  'table_directive',
  'pipe_table',
];

const PROFILE_RULES: Readonly<Record<Profile, ProfileRules>> = Object.freeze({
  [Profile.Litedoc]: {
    constructs: new Set<Construct>([
      ...CORE_CONSTRUCTS,
      'callout_directive',
      'figure_directive',
      'footnotes_directive',
      'math_directive',
      'html_directive',
      'task_item',
      'wiki_link',
      'footnote_ref',
      'strikethrough',
      'bare_autolink',
    ]),
    unknownDirectives: 'report',
    strict: false,
  },
  [Profile.Md]: {
    constructs: new Set<Construct>([
      ...CORE_CONSTRUCTS,
      'html_block',
      'task_item',
      'strikethrough',
      'bare_autolink',
    ]),
    unknownDirectives: 'tolerate',
    strict: false,
  },
  [Profile.MdStrict]: {
    constructs: new Set<Construct>([...CORE_CONSTRUCTS, 'html_block']),
    unknownDirectives: 'report',
    strict: true,
  },
});

const MODULE_CONSTRUCTS: Readonly<Record<Module, readonly Construct[]>> = Object.freeze({
  [Module.Tables]: ['table_directive', 'pipe_table'],
  [Module.Footnotes]: ['footnotes_directive', 'footnote_ref'],
  [Module.Math]: ['math_directive'],
  [Module.Tasks]: ['task_item'],
  [Module.Strikethrough]: ['strikethrough'],
  [Module.Autolink]: ['bare_autolink'],
  [Module.Html]: ['html_directive', 'html_block'],
});

const DIRECTIVE_CONSTRUCTS: Readonly<Record<DirectiveName, Construct>> = Object.freeze({
  list: 'list_directive',
  callout: 'callout_directive',
  quote: 'quote_directive',
  figure: 'figure_directive',
  table: 'table_directive',
  footnotes: 'footnotes_directive',
  math: 'math_directive',
  html: 'html_directive',
});

const PROFILE_NAMES: ReadonlyMap<string, Profile> = new Map(
  Object.values(Profile).map((profile) => [profile, profile] as const)
);

const MODULE_NAMES: ReadonlyMap<string, Module> = new Map(
  Object.values(Module).map((module) => [module, module] as const)
);

export function isDirectiveName(name: string): name is DirectiveName {
  return Object.prototype.hasOwnProperty.call(DIRECTIVE_CONSTRUCTS, name);
}

/**
 * Resolve a profile name as written in an `@profile` directive
 */
export function profileFromName(name: string): Profile | undefined {
  return PROFILE_NAMES.get(name.trim().toLowerCase());
}

/**
 * Resolve a module name as written in an `@modules` directive
 */
export function moduleFromName(name: string): Module | undefined {
  return MODULE_NAMES.get(name.trim().toLowerCase());
}

export function getProfileRules(profile: Profile): ProfileRules {
  return PROFILE_RULES[profile];
}

/**
 * Policy for one parse: a profile plus the modules enabled for the document
 */
export class ProfilePolicy {
  readonly modules: readonly Module[];

  constructor(
    readonly profile: Profile,
    modules: readonly Module[] = []
  ) {
    this.modules = Object.freeze([...new Set(modules)]);
  }

  /**
   * Is this construct recognised at all?
   */
  recognizes(construct: Construct): boolean {
    if (PROFILE_RULES[this.profile].constructs.has(construct)) return true;
    return this.modules.some((module) => MODULE_CONSTRUCTS[module].includes(construct));
  }

  /**
   * Is this directive name recognised as its dedicated block kind?
   */
  recognizesDirective(name: string): name is DirectiveName {
    return isDirectiveName(name) && this.recognizes(DIRECTIVE_CONSTRUCTS[name]);
  }

  /**
   * Unknown directives become diagnostics (true) or silent raw blocks (false)
   */
  get reportsUnknownDirectives(): boolean {
    return PROFILE_RULES[this.profile].unknownDirectives === 'report';
  }

  /**
   * Every diagnostic is fatal under this profile
   */
  get isStrict(): boolean {
    return PROFILE_RULES[this.profile].strict;
  }

  inlineFeatures(): InlineFeatures {
    return {
      wikiLinks: this.recognizes('wiki_link'),
      footnoteRefs: this.recognizes('footnote_ref'),
      strikethrough: this.recognizes('strikethrough'),
      bareAutolinks: this.recognizes('bare_autolink'),
    };
  }

  /**
   * Same modules, different profile (used when `@profile` overrides the default)
   */
  withProfile(profile: Profile): ProfilePolicy {
    return new ProfilePolicy(profile, this.modules);
  }

  withModules(modules: readonly Module[]): ProfilePolicy {
    return new ProfilePolicy(this.profile, [...this.modules, ...modules]);
  }
}
