/**
 * Package-tree copying: merge whole named package hierarchies from a source
 * document into a destination document.
 */

import { v4 as uuid } from 'uuid';
import type { MergeDocument } from '../model/document.js';
import { findChild, localName, type TreeNode } from '../model/node.js';
import { absolutePath, accumulatePathMap, type PathMap } from '../paths.js';
import {
  attach,
  createContainer,
  createPackage,
  ensureContainers,
  type ContainerSchema,
} from '../structure.js';
import { ELEMENTS_TAG, NAME_TAG, PACKAGES_TAG, PACKAGE_TAG } from '../schema.js';
import { InvalidPackageError, MergeStepError, MissingRequiredContainerError } from '../errors.js';
import type { IdentityGenerator } from '../identity.js';
import { silentLogger, type MergeLogger } from '../logger.js';
import { extend, type DuplicateSourcePolicy } from './extend.js';
import type { NameClashSet } from './clashes.js';

/**
 * Child order of a package
 */
const PACKAGE_SCHEMA: ContainerSchema = [
  { tag: NAME_TAG },
  { tag: ELEMENTS_TAG, create: createContainer(ELEMENTS_TAG) },
];

const PACKAGE_WITH_SUBPACKAGES_SCHEMA: ContainerSchema = [
  ...PACKAGE_SCHEMA,
  { tag: PACKAGES_TAG, create: createContainer(PACKAGES_TAG) },
];

const PACKAGE_CHILD_TAGS: ReadonlySet<string> = new Set([NAME_TAG, ELEMENTS_TAG, PACKAGES_TAG]);

export interface PackageParts {
  name: string;
  elements: TreeNode;
  subPackages?: TreeNode;
}

export interface PackageCopyOptions {
  clashes: NameClashSet;
  /**
   * Package names merged gracefully. When empty or absent every package is
   * merged gracefully; otherwise packages not listed merge strictly.
   */
  graceful?: readonly string[];
  onDuplicateSourceKey?: DuplicateSourcePolicy;
  clone?: boolean;
  generate?: IdentityGenerator;
  logger?: MergeLogger;
}

export interface RootPackageSpec {
  name: string;
  graceful?: readonly string[];
}

export interface RootCopyOptions extends Omit<PackageCopyOptions, 'graceful'> {
  /** Packages whose absence from the source is not an error */
  tolerateMissing?: readonly string[];
}

/**
 * Check that `pkg` is a package and split it into its parts.
 * A package holds a name, exactly one ELEMENTS and at most one AR-PACKAGES.
 */
export function readPackage(pkg: TreeNode): PackageParts {
  if (pkg.tag !== PACKAGE_TAG) {
    throw new InvalidPackageError(`Expected <${PACKAGE_TAG}>, found <${pkg.tag}>`);
  }

  const name = localName(pkg);
  if (name === undefined) {
    throw new InvalidPackageError(`<${PACKAGE_TAG}> without ${NAME_TAG}`);
  }

  const counts = new Map<string, number>();
  for (const child of pkg.children) {
    if (!PACKAGE_CHILD_TAGS.has(child.tag)) {
      throw new InvalidPackageError(`Unhandled <${child.tag}> in package "${name}"`);
    }
    const count = (counts.get(child.tag) ?? 0) + 1;
    if (count > 1) {
      throw new InvalidPackageError(`Package "${name}" has more than one <${child.tag}>`);
    }
    counts.set(child.tag, count);
  }

  const elements = findChild(pkg, ELEMENTS_TAG);
  if (!elements) {
    throw new InvalidPackageError(`Package "${name}" has no <${ELEMENTS_TAG}>`);
  }

  return {
    name,
    elements,
    subPackages: findChild(pkg, PACKAGES_TAG),
  };
}

/**
 * Copy the package tree `src` under `dstParent` (an AR-PACKAGES container of
 * the destination). A package missing from the destination is created; an
 * existing one is extended with the source elements. Sub-packages are copied
 * recursively.
 */
export function copyPackage(
  src: TreeNode,
  dstParent: TreeNode,
  srcDoc: MergeDocument,
  dstDoc: MergeDocument,
  options: PackageCopyOptions
): PathMap {
  const { clashes, graceful = [], generate = uuid, logger = silentLogger } = options;
  const source = readPackage(src);

  let dst = dstParent.children.find(child => child.tag === PACKAGE_TAG && localName(child) === source.name);
  if (!dst) {
    const path = absolutePath(src, srcDoc) ?? `/${source.name}`;
    dst = createPackage(source.name, generate() + path.replaceAll('/', '-'));
    attach(dstParent, dst, dstDoc);
    logger.info(`Created package ${path} in ${dstDoc.name}`);
  }

  const containers = ensureContainers(
    dst,
    source.subPackages ? PACKAGE_WITH_SUBPACKAGES_SCHEMA : PACKAGE_SCHEMA,
    dstDoc,
    logger
  );

  const pathMap = extend(
    source.elements.children,
    requireContainer(containers, ELEMENTS_TAG, dst),
    srcDoc,
    dstDoc,
    {
      clashes,
      mode: graceful.length === 0 || graceful.includes(source.name) ? 'graceful' : 'strict',
      onDuplicateSourceKey: options.onDuplicateSourceKey,
      clone: options.clone,
      logger,
    }
  );

  if (source.subPackages) {
    const dstSubPackages = requireContainer(containers, PACKAGES_TAG, dst);
    for (const pkg of source.subPackages.children) {
      accumulatePathMap(pathMap, copyPackage(pkg, dstSubPackages, srcDoc, dstDoc, options));
    }
  }

  return pathMap;
}

/**
 * Copy the named top-level packages of `srcDoc` into `dstDoc`.
 *
 * A package missing from the source is recorded on the clash set unless it
 * is listed in `tolerateMissing`. Failures are wrapped in MergeStepError
 * naming the source document and package.
 */
export function copyRootPackages(
  srcDoc: MergeDocument,
  dstDoc: MergeDocument,
  packages: readonly RootPackageSpec[],
  options: RootCopyOptions
): PathMap {
  const { clashes, tolerateMissing = [], logger = silentLogger } = options;
  const pathMap: PathMap = new Map();
  const srcRoots = findChild(srcDoc.root, PACKAGES_TAG);

  for (const { name, graceful } of packages) {
    logger.info(`Copying package ${name}`, { source: srcDoc.name });

    const src = srcRoots?.children.find(child => child.tag === PACKAGE_TAG && localName(child) === name);
    if (!src) {
      if (!tolerateMissing.includes(name)) {
        logger.warn(`Package ${name} is missing in ${srcDoc.name}`);
        clashes.recordMissingSource({ pkg: name, source: srcDoc.name });
      }
      continue;
    }

    try {
      const dstRoots = requireContainer(
        ensureContainers(dstDoc.root, [{ tag: PACKAGES_TAG, create: createContainer(PACKAGES_TAG) }], dstDoc, logger),
        PACKAGES_TAG,
        dstDoc.root
      );
      accumulatePathMap(pathMap, copyPackage(src, dstRoots, srcDoc, dstDoc, { ...options, graceful }));
    } catch (err) {
      throw new MergeStepError(srcDoc.name, name, err);
    }
  }

  return pathMap;
}

function requireContainer(containers: ReadonlyMap<string, TreeNode>, tag: string, parent: TreeNode): TreeNode {
  const container = containers.get(tag);
  if (!container) {
    throw new MissingRequiredContainerError(tag, parent.tag);
  }
  return container;
}
