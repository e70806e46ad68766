/**
 * Helpers for turning SDK output shapes into plain output documents
 */

import type { DescribedResource } from '../../types/resource.js';

/**
 * Copy an SDK record into a plain document, dropping response metadata and unset attributes
 */
export function toDescribedResource(record: object): DescribedResource {
  return Object.fromEntries(
    Object.entries(record).filter(
      ([key, value]) => key !== '$metadata' && value !== undefined
    )
  );
}

/**
 * Keep only the listed attributes of a record
 */
export function pickAttributes(
  record: object,
  attributes: ReadonlySet<string>
): DescribedResource {
  return Object.fromEntries(
    Object.entries(toDescribedResource(record)).filter(([key]) =>
      attributes.has(key)
    )
  );
}
