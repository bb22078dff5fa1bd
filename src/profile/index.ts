/**
 * Profile policy
 *
 * Dialect profiles (Litedoc, Md, MdStrict), optional modules, and the
 * static tables that gate constructs per profile.
 */

export {
  ProfilePolicy,
  getProfileRules,
  isDirectiveName,
  moduleFromName,
  profileFromName,
} from './ProfilePolicy.js';
export { Profile, Module } from './types.js';
export type {
  Construct,
  DirectiveName,
  InlineFeatures,
  ProfileRules,
  UnknownDirectiveHandling,
} from './types.js';
