import type { XmlElement } from "../parsing/xml.js";
import type { PathResolver } from "../resolvers/PathResolver.js";
import { RequiredPathError } from "./Errors.js";
import { pathExists, readSource } from "./DocumentAccess.js";

export interface RequiredPaths {
  /** must resolve to an element, or an attribute that is present */
  required?: ReadonlyArray<string>;
  /** must read as non-empty text */
  nonempty?: ReadonlyArray<string>;
}

/** Throws on the first required path that is missing or empty. */
export function checkRequiredPaths(
  root: XmlElement,
  paths: RequiredPaths,
  resolver: PathResolver,
  filename?: string,
): void {
  const suffix = filename ? ` in XML file '${filename}'` : "";

  for (const req of paths.required ?? []) {
    if (!pathExists(root, resolver.resolve(req))) {
      throw new RequiredPathError(`Path ${req} does not exist${suffix}`, req, filename);
    }
  }

  for (const req of paths.nonempty ?? []) {
    if (readSource(root, resolver.resolve(req)) === "") {
      throw new RequiredPathError(`Path ${req} is empty${suffix}; must contain value`, req, filename);
    }
  }
}
