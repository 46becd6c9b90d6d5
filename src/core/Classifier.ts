import type {
  BasicRuleNode,
  ClassifiedProgram,
  ForeachPair,
  ForeachRuleLeaf,
  IterationNode,
  OrderKey,
  Rule,
} from "../types/internal.js";
import { isBasePrefix } from "../resolvers/PathResolver.js";

const UNORDERED: OrderKey = [Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY];

/**
 * Order keys in declaration order: explicit `order` where given, otherwise
 * counting up from the highest explicit order. The declaration index breaks
 * ties between equal explicit orders.
 */
export function assignOrderKeys(rules: ReadonlyArray<Rule>): Map<Rule, OrderKey> {
  let next = rules.reduce((max, r) => (r.order !== undefined && r.order > max ? r.order : max), 0);
  const keys = new Map<Rule, OrderKey>();
  rules.forEach((rule, i) => keys.set(rule, [rule.order ?? ++next, i]));
  return keys;
}

export function compareOrder(a: OrderKey, b: OrderKey): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * Group distinct foreach bases into a forest. Bases are visited sorted by
 * source path; each descends into the first node whose source base is a
 * prefix of its own and becomes a new node where no such node exists.
 * Shared prefixes therefore collapse into one node whatever the
 * declaration order.
 */
export function buildIterationForest(pairs: ReadonlyArray<ForeachPair>): IterationNode[] {
  const unique = new Map<string, ForeachPair>();
  for (const pair of pairs) unique.set(`${pair[0]}\u0000${pair[1]}`, pair);

  const sorted = [...unique.values()].sort(
    (a, b) => compareText(a[0], b[0]) || compareText(a[1], b[1]),
  );

  const forest: IterationNode[] = [];
  for (const [sourceBase, destinationBase] of sorted) {
    let level: Array<IterationNode | ForeachRuleLeaf> = forest;
    for (;;) {
      const parent = level.find(
        (n): n is IterationNode => n.kind === "iteration" && encloses(n, sourceBase),
      );
      if (!parent) {
        level.push({ kind: "iteration", sourceBase, destinationBase, children: [], order: UNORDERED });
        break;
      }
      level = parent.children;
    }
  }
  return forest;
}

/** A base with the same source but another destination is a sibling, not a child. */
function encloses(node: IterationNode, sourceBase: string): boolean {
  return node.sourceBase !== sourceBase && isBasePrefix(node.sourceBase, sourceBase);
}

function findIteration(
  forest: ReadonlyArray<IterationNode>,
  [sourceBase, destinationBase]: ForeachPair,
): IterationNode | undefined {
  let level: ReadonlyArray<IterationNode | ForeachRuleLeaf> = forest;
  for (;;) {
    const nodes = level.filter((n): n is IterationNode => n.kind === "iteration");
    const exact = nodes.find(
      (n) => n.sourceBase === sourceBase && n.destinationBase === destinationBase,
    );
    if (exact) return exact;
    const parent = nodes.find((n) => encloses(n, sourceBase));
    if (!parent) return undefined;
    level = parent.children;
  }
}

/**
 * Split rules into basic rules and the iteration forest, attach every
 * foreach rule under the node of its innermost pair, and sort each sibling
 * list by order key. An iteration sorts by the smallest key below it.
 */
export function classifyRules(rules: ReadonlyArray<Rule>): ClassifiedProgram {
  const keys = assignOrderKeys(rules);
  const keyOf = (rule: Rule): OrderKey => keys.get(rule) ?? UNORDERED;

  const basic: BasicRuleNode[] = [];
  const foreach: Rule[] = [];
  for (const rule of rules) {
    if (rule.foreach.length === 0) basic.push({ kind: "basic", rule, order: keyOf(rule) });
    else foreach.push(rule);
  }

  const forest = buildIterationForest(foreach.flatMap((r) => r.foreach));

  for (const rule of foreach) {
    const innermost = rule.foreach[rule.foreach.length - 1];
    const node = innermost && findIteration(forest, innermost);
    if (!node) throw new Error(`No iteration node for rule ${rule.name}`);
    node.children.push({ kind: "foreach-rule", rule, order: keyOf(rule) });
  }

  forest.forEach(settleOrder);

  const program: Array<BasicRuleNode | IterationNode> = [...basic, ...forest];
  return program.sort((a, b) => compareOrder(a.order, b.order));
}

/** Sort children, then take the smallest child key as the node's own. */
function settleOrder(node: IterationNode): OrderKey {
  for (const child of node.children) {
    if (child.kind === "iteration") settleOrder(child);
  }
  node.children.sort((a, b) => compareOrder(a.order, b.order));
  node.order = node.children[0]?.order ?? UNORDERED;
  return node.order;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
