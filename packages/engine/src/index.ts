/**
 * @netmerge/engine
 * Hierarchical document merge and reference relocation for network description files
 */

// Model
export {
  createNode,
  createLeaf,
  createNamedNode,
  localName,
  findChild,
  findDescendants,
  walk,
  cloneNode,
  nodesEqual,
  type TreeNode,
  type NodeInit,
} from './model/node.js';
export { MergeDocument } from './model/document.js';

// Schema
export {
  NAME_TAG,
  IDENTITY_ATTRIBUTE,
  REFERENCE_DEST_ATTRIBUTE,
  PACKAGE_TAG,
  PACKAGES_TAG,
  ELEMENTS_TAG,
  TRANSPARENT_TAGS,
  DATA_ELEMENT_REFERENCE_TAGS,
  INTERFACE_REFERENCE_TAGS,
  isTransparentTag,
  isReferenceTag,
  type TransparentTag,
} from './schema.js';

// Paths
export {
  absolutePath,
  scopePath,
  resolvePath,
  requireNode,
  joinPath,
  splitPath,
  lastSegment,
  parentPath,
  childPath,
  accumulatePathMap,
  type PathMap,
} from './paths.js';

// References
export {
  textReference,
  attributeReference,
  readReference,
  referenceTarget,
  collectReferences,
  relocate,
  relocatePrefix,
  type ReferenceField,
  type RelocationReport,
} from './references.js';
export { validateReferences, type ReferenceIssue } from './validation.js';

// Structure
export {
  attach,
  insertAt,
  detach,
  isTransparent,
  ensureContainers,
  createContainer,
  createPackage,
  type ContainerSpec,
  type ContainerSchema,
} from './structure.js';

// Identities
export {
  collectIdentities,
  replaceIdentity,
  ensureUniqueIdentities,
  type IdentityGenerator,
  type IdentityReplacement,
} from './identity.js';

// Merge
export * from './merge/index.js';

// Codec
export { parseDocument, serializeDocument, readDocument, writeDocument } from './xml.js';

// Errors and logging
export {
  NetmergeError,
  PathResolutionError,
  PathNotFoundError,
  MissingRequiredContainerError,
  PrefixNotFoundError,
  UnmappedReferenceError,
  DuplicateSourceKeyError,
  TransparentInsertError,
  InvalidPackageError,
  InvalidReferenceTagError,
  DocumentParseError,
  IdentityExhaustedError,
  MergeStepError,
  type NetmergeErrorCode,
} from './errors.js';
export { silentLogger, type MergeLogger } from './logger.js';
