import type { BaseContext, QualifiedPath } from "../types/internal.js";
import { XmlElement } from "../parsing/xml.js";
import { MalformedPathError, PathKindMismatchError } from "./Errors.js";

/**
 * The four decisions a walk along a path has to make. One implementation
 * per access mode; `traverse` itself never reads or writes content.
 */
export interface TraversalPolicy<R> {
  /** only called when there is no tree yet; `undefined` aborts */
  onMissingRoot(name: string, path: QualifiedPath): XmlElement | undefined;
  /** more than one sibling matches the next step */
  onAmbiguous(candidates: ReadonlyArray<XmlElement>): XmlElement;
  /** no sibling matches the next step; `undefined` aborts */
  onMissingChild(name: string, current: XmlElement, path: QualifiedPath): XmlElement | undefined;
  /** all steps consumed */
  onFinish(element: XmlElement, attribute: string | undefined, path: QualifiedPath): R;
}

export type TraversalResult<R> =
  | { found: true; root: XmlElement; result: R }
  | { found: false; root: XmlElement | undefined };

/**
 * Walk `path` from `root`. The first step names the root itself; when it
 * does not, it is looked up among the root's children like any other step.
 */
export function traverse<R>(
  root: XmlElement | undefined,
  path: QualifiedPath,
  policy: TraversalPolicy<R>,
): TraversalResult<R> {
  if (path.segments.length === 0) {
    throw new MalformedPathError(path.source, "path has no element steps");
  }

  let tree = root;
  let current: XmlElement | undefined = root;

  for (const [i, name] of path.segments.entries()) {
    if (i === 0) {
      if (!current) {
        tree = current = policy.onMissingRoot(name, path);
        if (!current) return { found: false, root: tree };
        continue;
      }
      if (current.tag === name) continue;
    }

    const candidates = current.childrenNamed(name);
    const next =
      candidates.length === 0
        ? policy.onMissingChild(name, current, path)
        : candidates.length === 1
          ? candidates[0]
          : policy.onAmbiguous(candidates);

    if (!next) return { found: false, root: tree };
    current = next;
  }

  if (!tree || !current) return { found: false, root: tree };
  return { found: true, root: tree, result: policy.onFinish(current, path.attribute, path) };
}

// --------------------
// Ambiguity resolution
// --------------------

export type AmbiguityResolver = (candidates: ReadonlyArray<XmlElement>) => XmlElement;

export const firstCandidate: AmbiguityResolver = (candidates) => pick(candidates, 0);

/**
 * Pick the candidate that is an active iteration anchor, else the first
 * candidate. Writers never create a new sibling to resolve ambiguity.
 */
export function baseOrFirst(bases: BaseContext): AmbiguityResolver {
  const active = new Set(bases);
  return (candidates) => candidates.find((c) => active.has(c)) ?? pick(candidates, 0);
}

function pick(candidates: ReadonlyArray<XmlElement>, i: number): XmlElement {
  const c = candidates[i];
  if (!c) throw new RangeError("no candidate to choose from");
  return c;
}

// --------------------
// Policies
// --------------------

/** Elements created on the destination side declare the path's namespaces. */
export function createElement(name: string, path: QualifiedPath): XmlElement {
  const { xml: _xml, ...declared } = path.prefixMap;
  return new XmlElement(name, declared);
}

/** Reads text or an attribute value; aborts on the first missing step. */
export class ReadPolicy implements TraversalPolicy<string> {
  constructor(readonly onAmbiguous: AmbiguityResolver) {}

  onMissingRoot(): undefined {
    return undefined;
  }

  onMissingChild(): undefined {
    return undefined;
  }

  onFinish(element: XmlElement, attribute: string | undefined): string {
    if (attribute !== undefined) return element.attributes.get(attribute) ?? "";
    return element.text ?? "";
  }
}

/** Creates whatever is missing, then assigns text or an attribute. */
export class WritePolicy implements TraversalPolicy<XmlElement> {
  constructor(
    readonly onAmbiguous: AmbiguityResolver,
    private readonly value: string,
  ) {}

  onMissingRoot(name: string, path: QualifiedPath): XmlElement {
    return createElement(name, path);
  }

  onMissingChild(name: string, current: XmlElement, path: QualifiedPath): XmlElement {
    return current.append(createElement(name, path));
  }

  onFinish(element: XmlElement, attribute: string | undefined): XmlElement {
    if (attribute !== undefined) element.attributes.set(attribute, this.value);
    else element.text = this.value;
    return element;
  }
}

/** Returns the element at the end of the path; `create` decides what happens to gaps. */
export class ElementPolicy implements TraversalPolicy<XmlElement> {
  constructor(
    readonly onAmbiguous: AmbiguityResolver,
    private readonly create: boolean,
  ) {}

  onMissingRoot(name: string, path: QualifiedPath): XmlElement | undefined {
    return this.create ? createElement(name, path) : undefined;
  }

  onMissingChild(name: string, current: XmlElement, path: QualifiedPath): XmlElement | undefined {
    return this.create ? current.append(createElement(name, path)) : undefined;
  }

  onFinish(element: XmlElement, attribute: string | undefined, path: QualifiedPath): XmlElement {
    if (attribute !== undefined) throw new PathKindMismatchError(path.source, attribute);
    return element;
  }
}

/** Reports whether the element (and attribute, if named) exists. */
export class ExistsPolicy implements TraversalPolicy<boolean> {
  readonly onAmbiguous = firstCandidate;

  onMissingRoot(): undefined {
    return undefined;
  }

  onMissingChild(): undefined {
    return undefined;
  }

  onFinish(element: XmlElement, attribute: string | undefined): boolean {
    return attribute === undefined || element.attributes.has(attribute);
  }
}
