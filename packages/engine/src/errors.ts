/**
 * Error types raised by the merge engine.
 *
 * Every error carries a stable `code` so orchestration can branch on the
 * failure kind without matching messages. Name clashes are not errors: they
 * are recorded on a NameClashSet.
 */

export type NetmergeErrorCode =
  | 'PATH_RESOLUTION'
  | 'PATH_NOT_FOUND'
  | 'MISSING_REQUIRED_CONTAINER'
  | 'PREFIX_NOT_FOUND'
  | 'UNMAPPED_REFERENCE'
  | 'DUPLICATE_SOURCE_KEY'
  | 'TRANSPARENT_INSERT'
  | 'INVALID_PACKAGE'
  | 'INVALID_REFERENCE_TAG'
  | 'DOCUMENT_PARSE'
  | 'IDENTITY_EXHAUSTED'
  | 'MERGE_STEP';

/**
 * Base class for all engine errors
 */
export class NetmergeError extends Error {
  code: NetmergeErrorCode;

  constructor(message: string, code: NetmergeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetmergeError';
    this.code = code;
  }
}

/**
 * A node (or one of its ancestors) was attached outside the engine, so the
 * parent index has no link for it.
 */
export class PathResolutionError extends NetmergeError {
  tag: string;

  constructor(tag: string, documentName: string) {
    super(
      `Cannot resolve the path of <${tag}> in ${documentName}: an ancestor is missing from the parent index`,
      'PATH_RESOLUTION'
    );
    this.name = 'PathResolutionError';
    this.tag = tag;
  }
}

export class PathNotFoundError extends NetmergeError {
  path: string;

  constructor(path: string, documentName: string, segment: string) {
    super(`Path ${path} does not resolve in ${documentName}: "${segment}" not found`, 'PATH_NOT_FOUND');
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

export class MissingRequiredContainerError extends NetmergeError {
  tag: string;
  parentTag: string;

  constructor(tag: string, parentTag: string) {
    super(`Required container <${tag}> is missing from <${parentTag}> and cannot be synthesized`, 'MISSING_REQUIRED_CONTAINER');
    this.name = 'MissingRequiredContainerError';
    this.tag = tag;
    this.parentTag = parentTag;
  }
}

export class PrefixNotFoundError extends NetmergeError {
  prefix: string;
  reference: string;

  constructor(prefix: string, reference: string) {
    super(`The path ${reference} does not contain subpath ${prefix}`, 'PREFIX_NOT_FOUND');
    this.name = 'PrefixNotFoundError';
    this.prefix = prefix;
    this.reference = reference;
  }
}

export class UnmappedReferenceError extends NetmergeError {
  references: string[];

  constructor(references: string[]) {
    super(
      `${references.length} reference(s) have no relocation target: ${references.join(', ')}`,
      'UNMAPPED_REFERENCE'
    );
    this.name = 'UnmappedReferenceError';
    this.references = references;
  }
}

export class DuplicateSourceKeyError extends NetmergeError {
  key: string;

  constructor(key: string, scope: string) {
    super(`Source nodes in ${scope} share the key "${key}"`, 'DUPLICATE_SOURCE_KEY');
    this.name = 'DuplicateSourceKeyError';
    this.key = key;
  }
}

export class TransparentInsertError extends NetmergeError {
  constructor(tag: string) {
    super(`<${tag}> is a transparent container and cannot be inserted at an index`, 'TRANSPARENT_INSERT');
    this.name = 'TransparentInsertError';
  }
}

export class InvalidPackageError extends NetmergeError {
  constructor(message: string) {
    super(message, 'INVALID_PACKAGE');
    this.name = 'InvalidPackageError';
  }
}

export class InvalidReferenceTagError extends NetmergeError {
  constructor(tag: string) {
    super(`<${tag}> is not a reference tag (expected a -REF or -TREF suffix)`, 'INVALID_REFERENCE_TAG');
    this.name = 'InvalidReferenceTagError';
  }
}

export class DocumentParseError extends NetmergeError {
  constructor(documentName: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot parse ${documentName}: ${reason}`, 'DOCUMENT_PARSE', options);
    this.name = 'DocumentParseError';
  }
}

export class IdentityExhaustedError extends NetmergeError {
  attempts: number;

  constructor(previous: string, attempts: number) {
    super(`No fresh identity for "${previous}" after ${attempts} attempts`, 'IDENTITY_EXHAUSTED');
    this.name = 'IdentityExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Context wrapper: which source document and which package was being merged
 * when a step failed.
 */
export class MergeStepError extends NetmergeError {
  source: string;
  pkg: string;

  constructor(source: string, pkg: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Merging package "${pkg}" from ${source} failed: ${reason}`, 'MERGE_STEP', { cause });
    this.name = 'MergeStepError';
    this.source = source;
    this.pkg = pkg;
  }
}
