/**
 * Core merge logic for combining several source documents into one destination
 */

import { MergeDocument } from '../model/document.js';
import { cloneNode } from '../model/node.js';
import { accumulatePathMap, type PathMap } from '../paths.js';
import { collectReferences, relocate, type RelocationReport } from '../references.js';
import { ensureUniqueIdentities, type IdentityGenerator, type IdentityReplacement } from '../identity.js';
import { silentLogger, type MergeLogger } from '../logger.js';
import { NameClashSet } from './clashes.js';
import type { DuplicateSourcePolicy } from './extend.js';
import { copyRootPackages, type RootPackageSpec } from './packages.js';
import { prefixDocumentElements } from './naming.js';

/**
 * Rename elements of one type (and the references to them) in a source
 * before it is merged
 */
export interface PrefixRule {
  prefix: string;
  tag: string;
  referenceTags: string[];
}

/**
 * Input for a single source document to merge
 */
export interface MergeInput {
  doc: MergeDocument;
  packages: RootPackageSpec[];
  tolerateMissing?: string[];
  prefix?: PrefixRule;
}

/**
 * Options for merging documents
 */
export interface MergeOptions {
  /** Repair repeated identities once all sources are merged (default true) */
  uniqueIdentities?: boolean;
  onDuplicateSourceKey?: DuplicateSourcePolicy;
  /** Attach copies and leave the sources untouched (default true) */
  clone?: boolean;
  generate?: IdentityGenerator;
  logger?: MergeLogger;
}

/**
 * Result of merging documents
 */
export interface MergeResult {
  success: boolean;
  clashes: NameClashSet;
  pathMap: PathMap;
  relocation: RelocationReport;
  identities: IdentityReplacement[];
}

/**
 * Merge the listed packages of every input into `destination`, in order.
 *
 * The run fails on any strict clash or missing source package; the
 * destination is then partially merged and must not be written. On success
 * the destination's references are relocated with the accumulated path map
 * and repeated identities are repaired.
 */
export function mergeDocuments(
  destination: MergeDocument,
  inputs: readonly MergeInput[],
  options: MergeOptions = {}
): MergeResult {
  const { uniqueIdentities = true, clone = true, generate, logger = silentLogger } = options;
  const clashes = new NameClashSet();
  const pathMap: PathMap = new Map();

  for (const input of inputs) {
    let source = input.doc;
    if (input.prefix) {
      // Renaming rewrites names, references and identities in place
      if (clone) {
        source = MergeDocument.fromTree(input.doc.name, cloneNode(input.doc.root));
      }
      const { prefix, tag, referenceTags } = input.prefix;
      const renamed = prefixDocumentElements(source, prefix, tag, referenceTags, generate);
      logger.info(`Prefixed ${renamed.elements} <${tag}> and ${renamed.references} reference(s) with "${prefix}"`, {
        source: source.name,
      });
    }

    accumulatePathMap(
      pathMap,
      copyRootPackages(source, destination, input.packages, {
        clashes,
        tolerateMissing: input.tolerateMissing,
        onDuplicateSourceKey: options.onDuplicateSourceKey,
        clone,
        generate,
        logger,
      })
    );
  }

  if (clashes.anyStrictClash() || clashes.anyMissingSource()) {
    logger.error('Merge aborted', {
      strictClashes: clashes.strict.length,
      missingSources: clashes.missingSources.length,
    });
    return { success: false, clashes, pathMap, relocation: { rewritten: 0, unmapped: [] }, identities: [] };
  }

  const relocation = relocate(collectReferences(destination.root), pathMap);
  const identities = uniqueIdentities ? ensureUniqueIdentities(destination, { generate, logger }) : [];

  return { success: true, clashes, pathMap, relocation, identities };
}
