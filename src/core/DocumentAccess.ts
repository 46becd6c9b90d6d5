import type { BaseContext, QualifiedPath } from "../types/internal.js";
import type { XmlElement } from "../parsing/xml.js";
import { MalformedPathError, PathKindMismatchError } from "./Errors.js";
import {
  ElementPolicy,
  ExistsPolicy,
  ReadPolicy,
  WritePolicy,
  baseOrFirst,
  createElement,
  firstCandidate,
  traverse,
  type TraversalResult,
} from "./Traversal.js";

// --------------------
// Whole-tree access (basic rules)
// --------------------

/** Text or attribute value at `path`; `""` when any step is missing. */
export function readSource(root: XmlElement, path: QualifiedPath): string {
  const r = traverse(root, path, new ReadPolicy(firstCandidate));
  return r.found ? r.result : "";
}

/** Write `value` at `path`, creating the root and any missing steps. Returns the root. */
export function writeDestination(
  root: XmlElement | undefined,
  path: QualifiedPath,
  value: string,
): XmlElement {
  return written(traverse(root, path, new WritePolicy(firstCandidate, value)), path);
}

export function pathExists(root: XmlElement, path: QualifiedPath): boolean {
  const r = traverse(root, path, new ExistsPolicy());
  return r.found && r.result;
}

// --------------------
// Base-scoped access (inside iterations)
// --------------------

export function readBaseSource(
  root: XmlElement,
  path: QualifiedPath,
  bases: BaseContext,
): string {
  const r = traverse(root, path, new ReadPolicy(baseOrFirst(bases)));
  return r.found ? r.result : "";
}

export function writeBaseDestination(
  root: XmlElement | undefined,
  path: QualifiedPath,
  value: string,
  bases: BaseContext,
): XmlElement {
  return written(traverse(root, path, new WritePolicy(baseOrFirst(bases), value)), path);
}

/**
 * Every element matching the last step of `path`, below the parent chosen
 * through `bases`. A single-step path matches the root itself.
 */
export function readAmbiguousElements(
  root: XmlElement,
  path: QualifiedPath,
  bases: BaseContext,
): XmlElement[] {
  const { parent, last } = splitLast(path);
  if (!parent) return root.tag === last ? [root] : [];

  const r = traverse(root, parent, new ElementPolicy(baseOrFirst(bases), false));
  return r.found ? r.result.childrenNamed(last) : [];
}

/**
 * Append a fresh element for the last step of `path` below the parent chosen
 * through `bases`, creating the parent chain (and root) as needed.
 */
export function writeNewAmbiguousElement(
  root: XmlElement | undefined,
  path: QualifiedPath,
  bases: BaseContext,
): { root: XmlElement; element: XmlElement } {
  const { parent, last } = splitLast(path);
  if (!parent) {
    if (root) throw new MalformedPathError(path.source, "cannot create a second root element");
    const element = createElement(last, path);
    return { root: element, element };
  }

  const r = traverse(root, parent, new ElementPolicy(baseOrFirst(bases), true));
  if (!r.found) throw new MalformedPathError(path.source, "parent element could not be created");
  const element = r.result.append(createElement(last, path));
  return { root: r.root, element };
}

function splitLast(path: QualifiedPath): { parent?: QualifiedPath; last: string } {
  if (path.attribute !== undefined) throw new PathKindMismatchError(path.source, path.attribute);

  const last = path.segments[path.segments.length - 1];
  if (last === undefined) throw new MalformedPathError(path.source, "path has no element steps");
  if (path.segments.length === 1) return { last };
  return { parent: { ...path, segments: path.segments.slice(0, -1) }, last };
}

function written(
  r: TraversalResult<XmlElement>,
  path: QualifiedPath,
): XmlElement {
  if (!r.root) throw new MalformedPathError(path.source, "destination could not be created");
  return r.root;
}
