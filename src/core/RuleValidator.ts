import type { ForeachPair } from "../types/internal.js";
import type { RuleEntryV1 } from "../types/document.js";
import {
  DestinationCountError,
  DuplicateRuleError,
  ForeachArityError,
  ForeachNestingError,
  InvalidRuleDocumentError,
  MissingDestinationError,
} from "./Errors.js";
import { isBasePrefix } from "../resolvers/PathResolver.js";

export interface ValidatedRuleShape {
  name: string;
  sources: ReadonlyArray<string>;
  destination: string;
  foreach: ReadonlyArray<ForeachPair>;
  order?: number;
}

/**
 * Check every entry before anything runs; the first violation aborts.
 * Names must be unique across the whole list.
 */
export function validateRules(entries: ReadonlyArray<RuleEntryV1>): ValidatedRuleShape[] {
  const seen = new Map<string, number>();
  entries.forEach((entry, i) => {
    const first = seen.get(entry.name);
    if (first !== undefined) throw new DuplicateRuleError(entry.name, first, i);
    seen.set(entry.name, i);
  });

  return entries.map(validateRule);
}

export function validateRule(entry: RuleEntryV1): ValidatedRuleShape {
  const { name } = entry;

  if (entry.destination === undefined) throw new MissingDestinationError(name);
  const destinations =
    typeof entry.destination === "string" ? [entry.destination] : entry.destination;
  const destination = destinations[0];
  if (destinations.length !== 1 || destination === undefined) {
    throw new DestinationCountError(name, destinations.length);
  }

  if (entry.order !== undefined && !Number.isInteger(entry.order)) {
    throw new InvalidRuleDocumentError(`Rule ${name}: order must be an integer, got ${entry.order}`);
  }

  return {
    name,
    sources: entry.sources ?? [],
    destination,
    foreach: entry.foreach === undefined ? [] : validateForeach(name, entry.foreach),
    order: entry.order,
  };
}

function validateForeach(
  name: string,
  foreach: ReadonlyArray<ReadonlyArray<string>>,
): ForeachPair[] {
  if (foreach.length === 0) {
    throw new ForeachArityError(
      name,
      `A foreach rule requires at least one [source, destination] pair. ${name} has 0`,
    );
  }

  const pairs = foreach.map((pair): ForeachPair => {
    const [src, dst] = pair;
    if (pair.length !== 2 || src === undefined || dst === undefined) {
      throw new ForeachArityError(
        name,
        `foreach pairs must have exactly two entries. ${name} has ${pair.length}`,
      );
    }
    return [src, dst];
  });

  // outermost first: each source base must be a prefix of the next one
  pairs.reduce((outer, inner) => {
    if (!isBasePrefix(outer[0], inner[0])) {
      throw new ForeachNestingError(name, outer[0], inner[0]);
    }
    return inner;
  });

  return pairs;
}
