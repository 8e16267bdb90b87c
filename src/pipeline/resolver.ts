/**
 * Dependency resolution into concurrency waves.
 *
 * A wave is a maximal set of modules whose dependencies all sit in
 * strictly earlier waves, so every module in it may run concurrently.
 * Waves are computed with Kahn's algorithm:
 *
 *   1. Count the in-degree (number of dependencies) of every module.
 *   2. Seed the first wave with every module of in-degree zero.
 *   3. Drain the wave: decrement the in-degree of each dependent; modules
 *      that reach zero form the next wave.
 *   4. Repeat until no wave is produced.
 *
 * Within a wave, ids are ordered by descending priority, then ascending
 * id, so the dispatch order is reproducible.
 *
 * If any module never reaches in-degree zero, resolution fails with a
 * CyclicDependencyError. The error names exactly the modules that sit on
 * a cycle (found as strongly connected components of the leftover graph)
 * and, separately, every module left unresolved. Nothing is dropped
 * silently.
 *
 * A plan is a pure function of its descriptor set, so plans are memoized
 * by a fingerprint of that set.
 */

import type { ModuleDescriptor } from "../types/module.js";
import type { WavePlan } from "../types/pipeline.js";
import {
  CyclicDependencyError,
  DuplicateModuleError,
  UnknownDependencyError,
} from "./errors.js";
import { hashText, stableStringify } from "./fingerprint.js";

/** The descriptor fields that influence a wave plan. */
export type PlanInput = Pick<ModuleDescriptor, "id" | "priority" | "dependencies">;

function compareForDispatch(a: PlanInput, b: PlanInput): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Fingerprint of the plan-relevant part of a descriptor set. Independent
 * of the order in which descriptors are listed.
 */
export function planFingerprint(descriptors: readonly PlanInput[]): string {
  const normalized = descriptors
    .map((d) => ({ id: d.id, priority: d.priority, dependencies: [...d.dependencies].sort() }))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return hashText(stableStringify(normalized));
}

/**
 * Compute waves for a closed descriptor set (every dependency must be a
 * member of the set).
 *
 * @throws DuplicateModuleError   if an id appears twice
 * @throws UnknownDependencyError if a dependency is not in the set
 * @throws CyclicDependencyError  if the dependency graph has a cycle
 */
export function computeWaves(descriptors: readonly PlanInput[]): string[][] {
  const byId = new Map<string, PlanInput>();
  for (const descriptor of descriptors) {
    if (byId.has(descriptor.id)) {
      throw new DuplicateModuleError(descriptor.id);
    }
    byId.set(descriptor.id, descriptor);
  }

  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const descriptor of descriptors) {
    inDegree.set(descriptor.id, descriptor.dependencies.length);
    for (const dep of descriptor.dependencies) {
      if (!byId.has(dep)) {
        throw new UnknownDependencyError(descriptor.id, dep);
      }
      const list = dependents.get(dep) ?? [];
      list.push(descriptor.id);
      dependents.set(dep, list);
    }
  }

  const waves: string[][] = [];
  let ready = descriptors.filter((d) => d.dependencies.length === 0);
  let resolved = 0;

  while (ready.length > 0) {
    const wave = [...ready].sort(compareForDispatch).map((d) => d.id);
    waves.push(wave);
    resolved += wave.length;

    const next: PlanInput[] = [];
    for (const id of wave) {
      for (const dependent of dependents.get(id) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        const descriptor = byId.get(dependent);
        if (remaining === 0 && descriptor) {
          next.push(descriptor);
        }
      }
    }
    ready = next;
  }

  if (resolved < descriptors.length) {
    const unresolved = descriptors
      .filter((d) => (inDegree.get(d.id) ?? 0) > 0)
      .map((d) => d.id)
      .sort();
    throw new CyclicDependencyError(findCycleMembers(unresolved, byId), unresolved);
  }

  return waves;
}

/**
 * Ids that lie on at least one cycle: members of a strongly connected
 * component with more than one node, or with a self-edge. Uses Tarjan's
 * algorithm restricted to `candidates`.
 */
export function findCycleMembers(
  candidates: readonly string[],
  byId: ReadonlyMap<string, PlanInput>
): string[] {
  const inScope = new Set(candidates);
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const members: string[] = [];
  let counter = 0;

  const visit = (id: string): void => {
    index.set(id, counter);
    lowLink.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);

    for (const dep of byId.get(id)?.dependencies ?? []) {
      if (!inScope.has(dep)) continue;
      if (!index.has(dep)) {
        visit(dep);
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(dep) ?? 0));
      } else if (onStack.has(dep)) {
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, index.get(dep) ?? 0));
      }
    }

    if (lowLink.get(id) === index.get(id)) {
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== id);

      const selfLoop = byId.get(id)?.dependencies.includes(id) ?? false;
      if (component.length > 1 || selfLoop) {
        members.push(...component);
      }
    }
  };

  for (const id of candidates) {
    if (!index.has(id)) visit(id);
  }

  return members.sort();
}

/**
 * Memoizing front end for computeWaves().
 */
export class DependencyResolver {
  private readonly plans = new Map<string, WavePlan>();

  resolve(descriptors: readonly PlanInput[]): WavePlan {
    const key = planFingerprint(descriptors);
    const cachedPlan = this.plans.get(key);
    if (cachedPlan) return cachedPlan;

    const waves = computeWaves(descriptors);
    const plan: WavePlan = Object.freeze({
      waves: Object.freeze(waves.map((wave) => Object.freeze(wave))),
      fingerprint: key,
    });
    this.plans.set(key, plan);
    return plan;
  }

  get cachedPlanCount(): number {
    return this.plans.size;
  }

  clear(): void {
    this.plans.clear();
  }
}
