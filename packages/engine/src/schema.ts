/**
 * Tag vocabulary of the network description format.
 */

/** Child tag whose text is a node's local name */
export const NAME_TAG = 'SHORT-NAME';

/** Attribute holding a node's globally unique identity */
export const IDENTITY_ATTRIBUTE = 'UUID';

/** Attribute on a reference naming the tag of the node it points at */
export const REFERENCE_DEST_ATTRIBUTE = 'DEST';

export const PACKAGE_TAG = 'AR-PACKAGE';
export const PACKAGES_TAG = 'AR-PACKAGES';
export const ELEMENTS_TAG = 'ELEMENTS';

/**
 * Containers that only group their children. Attaching one splices its
 * children into the receiving parent instead of nesting it.
 */
export const TRANSPARENT_TAGS = [
  ELEMENTS_TAG,
  'SOCKET-ADDRESSS', // sic: the format pluralizes ADDRESS this way
  'DATA-TRANSFORMATIONS',
  'TRANSFORMATION-TECHNOLOGYS',
  'CONNECTION-BUNDLES',
] as const;

export type TransparentTag = (typeof TRANSPARENT_TAGS)[number];

const transparentTags: ReadonlySet<string> = new Set(TRANSPARENT_TAGS);

export function isTransparentTag(tag: string): tag is TransparentTag {
  return transparentTags.has(tag);
}

/**
 * Reference tags that point into a port interface: `/<port>/<interface>/<element>`
 */
export const DATA_ELEMENT_REFERENCE_TAGS = ['ROOT-DATA-PROTOTYPE-REF', 'DATA-ELEMENT-REF'] as const;

/**
 * Reference tags that point at a port interface: `/<package>/<interface>`
 */
export const INTERFACE_REFERENCE_TAGS = ['REQUIRED-INTERFACE-TREF', 'PROVIDED-INTERFACE-TREF'] as const;

export function isReferenceTag(tag: string): boolean {
  return tag.endsWith('-REF') || tag.endsWith('-TREF');
}
