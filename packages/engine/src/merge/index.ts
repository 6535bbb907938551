/**
 * @netmerge/engine merge module
 * Merge source nodes, package trees and whole documents into a destination
 */

// Merger
export {
  mergeDocuments,
  type MergeInput,
  type MergeOptions,
  type MergeResult,
  type PrefixRule,
} from './merger.js';

// Node-list merge
export {
  extend,
  type ExtendOptions,
  type KeyFn,
  type DuplicateSourcePolicy,
} from './extend.js';

// Clash tracking
export {
  NameClashSet,
  formatClashes,
  type ClashEvent,
  type MissingSourceEvent,
  type MergeMode,
} from './clashes.js';

// Package trees
export {
  copyPackage,
  copyRootPackages,
  readPackage,
  type PackageParts,
  type PackageCopyOptions,
  type RootCopyOptions,
  type RootPackageSpec,
} from './packages.js';

// Naming utilities
export {
  prefixName,
  prefixElementsOfType,
  prefixReferencesOfType,
  prefixDocumentElements,
} from './naming.js';
