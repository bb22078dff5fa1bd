/**
 * Types for front matter
 */

/**
 * A front matter value. Lists may hold any value, including lists.
 */
export type MetadataValue = string | number | boolean | readonly MetadataValue[];

/**
 * Outcome of reading one value
 */
export interface ParsedValue {
  value: MetadataValue;
  /** False when the raw text did not follow the value grammar and was kept as-is */
  valid: boolean;
}
