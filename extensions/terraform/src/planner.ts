/**
 * Planner — diffs desired resources against refreshed live state.
 *
 * Changes come back in dependency order. Apply walks the list backwards for
 * deletes and forwards for creates and updates.
 */

import {
  DependencyOrderError,
  type ChangeAction,
  type DesiredResource,
  type PlannedChange,
  type PlanSummary,
  type ResourceAttributes,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { changedRoots, diffAttributes } from "./diff.js";
import type { StateResource } from "./types.js";

type Node = { address: string; dependsOn: string[] };

/**
 * Topological order (Kahn), stable with respect to input order.
 * Unknown dependencies and cycles are dependency errors.
 */
export function orderByDependencies<T extends Node>(nodes: T[], options: { ignoreUnknown?: boolean } = {}): T[] {
  const byAddress = new Map(nodes.map((n) => [n.address, n]));
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const node of nodes) {
    let count = 0;
    for (const dep of node.dependsOn) {
      if (!byAddress.has(dep)) {
        if (options.ignoreUnknown) continue;
        throw new DependencyOrderError(
          `Reference to undeclared resource: ${node.address} depends on ${dep}, which is not declared`,
          node.address,
          dep,
        );
      }
      count++;
      dependents.set(dep, [...(dependents.get(dep) ?? []), node.address]);
    }
    indegree.set(node.address, count);
  }

  const ordered: T[] = [];
  const ready = nodes.filter((n) => indegree.get(n.address) === 0).map((n) => n.address);
  while (ready.length > 0) {
    const address = ready.shift();
    if (address === undefined) break;
    const node = byAddress.get(address);
    if (node) ordered.push(node);
    for (const dependent of dependents.get(address) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) ready.push(dependent);
    }
  }

  if (ordered.length !== nodes.length) {
    const cycle = nodes.filter((n) => (indegree.get(n.address) ?? 0) > 0).map((n) => n.address);
    throw new DependencyOrderError(`Cycle: ${cycle.join(", ")}`, cycle[0] ?? "", cycle[1] ?? cycle[0] ?? "");
  }
  return ordered;
}

export type PlanInput = {
  desired: DesiredResource[];
  /** Resources tracked in state before the plan. */
  prior: StateResource[];
  /** Refreshed live attributes of each tracked resource, by address (null = gone). */
  live: Map<string, ResourceAttributes | null>;
  handler: (type: string) => ResourceHandler;
  destroy?: boolean;
};

function change(
  base: { address: string; type: string; name: string; id: string; dependsOn: string[] },
  actions: ChangeAction[],
  before: ResourceAttributes | null,
  after: ResourceAttributes | null,
  changedAttributes: string[] = [],
): PlannedChange {
  return { ...base, actions, before, after, changedAttributes };
}

export const isReplace = (c: PlannedChange) => c.actions.length === 2 && c.actions[0] === "delete" && c.actions[1] === "create";

/** Compute the changes that bring live state to the desired state. */
export function computeChanges(input: PlanInput): PlannedChange[] {
  const prior = new Map(input.prior.map((r) => [r.address, r]));
  const desired = input.destroy ? [] : input.desired;
  const desiredAddresses = new Set(desired.map((d) => d.address));

  const nodes: Node[] = [
    ...desired.map((d) => ({ address: d.address, dependsOn: d.dependsOn })),
    ...input.prior.filter((r) => !desiredAddresses.has(r.address)).map((r) => ({ address: r.address, dependsOn: r.dependencies })),
  ];
  const order = orderByDependencies(nodes, { ignoreUnknown: true }).map((n) => n.address);
  const byAddress = new Map<string, PlannedChange>();

  for (const resource of desired) {
    const handler = input.handler(resource.type);
    const tracked = prior.get(resource.address);
    const id = handler.idOf(resource.attributes);
    const base = { address: resource.address, type: resource.type, name: resource.name, id, dependsOn: resource.dependsOn };
    const live = tracked ? (input.live.get(resource.address) ?? null) : null;

    if (!tracked || !live) {
      byAddress.set(resource.address, change(base, ["create"], null, resource.attributes));
      continue;
    }

    const diffs = diffAttributes(live, resource.attributes);
    const roots = changedRoots(diffs);
    if (roots.length === 0 && tracked.id === id) {
      byAddress.set(resource.address, change({ ...base, id: tracked.id }, ["no-op"], live, resource.attributes));
    } else if (tracked.id !== id || roots.some((r) => handler.forceNew.includes(r))) {
      byAddress.set(resource.address, change({ ...base, id: tracked.id }, ["delete", "create"], live, resource.attributes, roots));
    } else {
      byAddress.set(resource.address, change({ ...base, id: tracked.id }, ["update"], live, resource.attributes, roots));
    }
  }

  for (const resource of input.prior) {
    if (desiredAddresses.has(resource.address)) continue;
    const base = { address: resource.address, type: resource.type, name: resource.name, id: resource.id, dependsOn: resource.dependencies };
    byAddress.set(resource.address, change(base, ["delete"], input.live.get(resource.address) ?? null, null));
  }

  cascadeReplacements(byAddress, order);
  return order.flatMap((address) => {
    const planned = byAddress.get(address);
    return planned ? [planned] : [];
  });
}

/** A replaced resource gets a new identity, so everything depending on it is replaced too. */
function cascadeReplacements(changes: Map<string, PlannedChange>, order: string[]): void {
  const replaced = new Set<string>();
  for (const address of order) {
    const planned = changes.get(address);
    if (!planned) continue;
    if (isReplace(planned)) {
      replaced.add(address);
      continue;
    }
    const trigger = planned.dependsOn.find((dep) => replaced.has(dep));
    if (trigger && planned.before && (planned.actions[0] === "no-op" || planned.actions[0] === "update")) {
      planned.actions = ["delete", "create"];
      replaced.add(address);
    }
  }
}

/** Count changes by kind. */
export function summarizeChanges(changes: PlannedChange[]): PlanSummary {
  let creates = 0;
  let updates = 0;
  let deletes = 0;
  let replaces = 0;
  let noOps = 0;
  const affectedAddresses: string[] = [];

  for (const c of changes) {
    if (isReplace(c)) replaces++;
    else if (c.actions[0] === "create") creates++;
    else if (c.actions[0] === "update") updates++;
    else if (c.actions[0] === "delete") deletes++;
    else noOps++;
    if (c.actions[0] !== "no-op") affectedAddresses.push(c.address);
  }

  return {
    totalChanges: creates + updates + deletes + replaces,
    creates,
    updates,
    deletes,
    replaces,
    noOps,
    affectedAddresses,
    hasDestructiveChanges: deletes + replaces > 0,
  };
}

/** One line per change, in `terraform plan` notation. */
export function formatChanges(changes: PlannedChange[]): string[] {
  const symbol = (c: PlannedChange) => {
    if (isReplace(c)) return "-/+";
    switch (c.actions[0]) {
      case "create":
        return "  +";
      case "update":
        return "  ~";
      case "delete":
        return "  -";
      default:
        return null;
    }
  };
  const lines: string[] = [];
  for (const c of changes) {
    const s = symbol(c);
    if (!s) continue;
    const detail = c.changedAttributes.length > 0 ? ` (${c.changedAttributes.join(", ")})` : "";
    lines.push(`${s} ${c.address}${detail}`);
  }
  return lines;
}
