/**
 * Tests for profile rules and modules
 */
import { describe, it, expect } from 'vitest';
import {
  Module,
  Profile,
  ProfilePolicy,
  getProfileRules,
  isDirectiveName,
  moduleFromName,
  profileFromName,
} from '../src/profile/index.js';

describe('ProfilePolicy', () => {
  it('should recognise LiteDoc directives only under litedoc', () => {
    expect(new ProfilePolicy(Profile.Litedoc).recognizesDirective('callout')).toBe(true);
    expect(new ProfilePolicy(Profile.Md).recognizesDirective('callout')).toBe(false);
    expect(new ProfilePolicy(Profile.MdStrict).recognizesDirective('callout')).toBe(false);
  });

  it('should recognise core directives in every profile', () => {
    for (const profile of Object.values(Profile)) {
      const policy = new ProfilePolicy(profile);
      expect(policy.recognizesDirective('list')).toBe(true);
      expect(policy.recognizesDirective('table')).toBe(true);
    }
  });

  it('should enable constructs through modules', () => {
    const policy = new ProfilePolicy(Profile.Md, [Module.Footnotes]);

    expect(policy.recognizesDirective('footnotes')).toBe(true);
    expect(policy.recognizes('footnote_ref')).toBe(true);
    expect(policy.recognizesDirective('math')).toBe(false);
  });

  it('should report unknown directives except under md', () => {
    expect(new ProfilePolicy(Profile.Litedoc).reportsUnknownDirectives).toBe(true);
    expect(new ProfilePolicy(Profile.Md).reportsUnknownDirectives).toBe(false);
    expect(new ProfilePolicy(Profile.MdStrict).reportsUnknownDirectives).toBe(true);
  });

  it('should mark only md-strict as strict', () => {
    expect(new ProfilePolicy(Profile.MdStrict).isStrict).toBe(true);
    expect(new ProfilePolicy(Profile.Md).isStrict).toBe(false);
  });

  it('should derive inline features from the profile', () => {
    expect(new ProfilePolicy(Profile.MdStrict).inlineFeatures()).toEqual({
      wikiLinks: false,
      footnoteRefs: false,
      strikethrough: false,
      bareAutolinks: false,
    });
    expect(new ProfilePolicy(Profile.Md).inlineFeatures()).toEqual({
      wikiLinks: false,
      footnoteRefs: false,
      strikethrough: true,
      bareAutolinks: true,
    });
  });

  it('should deduplicate modules and keep them when the profile changes', () => {
    const policy = new ProfilePolicy(Profile.Litedoc, [Module.Math, Module.Math])
      .withModules([Module.Tables, Module.Math])
      .withProfile(Profile.Md);

    expect(policy.profile).toBe('md');
    expect(policy.modules).toEqual(['math', 'tables']);
  });
});

describe('getProfileRules', () => {
  it('should tolerate unknown directives only under md', () => {
    expect(getProfileRules(Profile.Md).unknownDirectives).toBe('tolerate');
    expect(getProfileRules(Profile.Litedoc).unknownDirectives).toBe('report');
    expect(getProfileRules(Profile.MdStrict).constructs.has('html_block')).toBe(true);
  });
});

describe('profile and module names', () => {
  it('should know the dedicated directive names', () => {
    expect(isDirectiveName('figure')).toBe(true);
    expect(isDirectiveName('toString')).toBe(false);
  });

  it('should resolve names case-insensitively', () => {
    expect(profileFromName(' MD-Strict ')).toBe('md-strict');
    expect(moduleFromName('Tables')).toBe('tables');
  });

  it('should return undefined for unknown names', () => {
    expect(profileFromName('fancy')).toBeUndefined();
    expect(moduleFromName('charts')).toBeUndefined();
  });
});
