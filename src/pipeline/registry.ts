/**
 * Module registry.
 *
 * Holds frozen module descriptors and lazily created singleton module
 * instances. Every registration validates the complete descriptor set
 * (existing plus new) before anything is committed:
 *
 *   - descriptor shape (zod schema)
 *   - unique module ids
 *   - every dependency resolves to a registered or co-registered module
 *   - at most one producer per shared-state key
 *   - the dependency graph is acyclic
 *   - a consumed key produced by another module is produced by one of the
 *     consumer's transitive dependencies, so a wave barrier separates the
 *     write from the read
 *
 * A failed registration leaves the registry unchanged.
 *
 * Instances are shared by every run; they must keep per-run data in the
 * ModuleContext passed to `execute`, never on themselves.
 */

import {
  ModuleDescriptorSchema,
  type ModuleDescriptorInput,
} from "../config/pipeline/schema.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type {
  ModuleDescriptor,
  ModuleFactory,
  PromptModule,
} from "../types/module.js";
import {
  DescriptorValidationError,
  DuplicateKeyProducerError,
  DuplicateModuleError,
  KeyOrderingError,
  UnknownDependencyError,
  UnknownModuleError,
} from "./errors.js";
import { computeWaves } from "./resolver.js";
import { deepFreeze } from "../config/pipeline/loader.js";

export interface ModuleDefinition {
  readonly descriptor: ModuleDescriptorInput | ModuleDescriptor;
  readonly factory: ModuleFactory;
}

export interface ModuleSummary {
  readonly id: string;
  readonly name: string;
  readonly priority: number;
  readonly dependencies: readonly string[];
  readonly required: boolean;
  readonly instantiated: boolean;
}

interface Registration {
  readonly descriptor: ModuleDescriptor;
  readonly factory: ModuleFactory;
  readonly index: number;
  instance?: PromptModule;
}

/**
 * Parse a raw descriptor, applying schema defaults.
 *
 * @throws DescriptorValidationError if the descriptor is malformed
 */
export function parseDescriptor(
  input: ModuleDescriptorInput | ModuleDescriptor
): ModuleDescriptor {
  const result = ModuleDescriptorSchema.safeParse(input);
  if (!result.success) {
    const id = typeof input.id === "string" ? input.id : undefined;
    throw new DescriptorValidationError(
      id,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return deepFreeze(result.data);
}

/**
 * Validate a complete descriptor set. The order of `descriptors` is the
 * registration order.
 */
export function validateDescriptorSet(descriptors: readonly ModuleDescriptor[]): void {
  const ids = new Set<string>();
  for (const descriptor of descriptors) {
    if (ids.has(descriptor.id)) {
      throw new DuplicateModuleError(descriptor.id);
    }
    ids.add(descriptor.id);
  }

  for (const descriptor of descriptors) {
    for (const dep of descriptor.dependencies) {
      if (!ids.has(dep)) {
        throw new UnknownDependencyError(descriptor.id, dep);
      }
    }
  }

  const producers = new Map<string, string>();
  for (const descriptor of descriptors) {
    for (const key of descriptor.producedKeys) {
      const existing = producers.get(key);
      if (existing !== undefined) {
        throw new DuplicateKeyProducerError(key, [existing, descriptor.id]);
      }
      producers.set(key, descriptor.id);
    }
  }

  // Throws CyclicDependencyError; also yields a topological order for
  // the ancestor pass below.
  const waves = computeWaves(descriptors);

  const byId = new Map(descriptors.map((d) => [d.id, d]));
  const ancestors = new Map<string, Set<string>>();
  for (const wave of waves) {
    for (const id of wave) {
      const set = new Set<string>();
      for (const dep of byId.get(id)?.dependencies ?? []) {
        set.add(dep);
        for (const transitive of ancestors.get(dep) ?? []) {
          set.add(transitive);
        }
      }
      ancestors.set(id, set);
    }
  }

  for (const descriptor of descriptors) {
    for (const key of descriptor.consumedKeys) {
      const producer = producers.get(key);
      if (producer === undefined) continue;
      if (!ancestors.get(descriptor.id)?.has(producer)) {
        throw new KeyOrderingError(key, descriptor.id, producer);
      }
    }
  }
}

export class ModuleRegistry {
  private readonly registrations = new Map<string, Registration>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Register one module. Its dependencies must already be registered.
   *
   * @returns The parsed, frozen descriptor
   */
  register(
    descriptor: ModuleDescriptorInput | ModuleDescriptor,
    factory: ModuleFactory
  ): ModuleDescriptor {
    return this.registerAll([{ descriptor, factory }])[0];
  }

  /**
   * Register a batch atomically. Members may depend on each other; the
   * batch is rejected as a whole if the combined set is invalid.
   */
  registerAll(definitions: readonly ModuleDefinition[]): ModuleDescriptor[] {
    const parsed = definitions.map((d) => parseDescriptor(d.descriptor));
    validateDescriptorSet([...this.descriptors(), ...parsed]);

    parsed.forEach((descriptor, i) => {
      this.registrations.set(descriptor.id, {
        descriptor,
        factory: definitions[i].factory,
        index: this.registrations.size,
      });
      this.logger.debug("Module registered", {
        moduleId: descriptor.id,
        dependencies: descriptor.dependencies.length,
        priority: descriptor.priority,
      });
    });

    return parsed;
  }

  has(id: string): boolean {
    return this.registrations.has(id);
  }

  get size(): number {
    return this.registrations.size;
  }

  /** @throws UnknownModuleError */
  descriptor(id: string): ModuleDescriptor {
    return this.registration(id).descriptor;
  }

  /** All descriptors in registration order. */
  descriptors(): ModuleDescriptor[] {
    return [...this.registrations.values()].map((r) => r.descriptor);
  }

  /** Position of a module in registration order (assembly tie-breaker). */
  registrationIndex(id: string): number {
    return this.registration(id).index;
  }

  /** Id of the module that declares `key` in its produced keys. */
  producerOf(key: string): string | undefined {
    for (const { descriptor } of this.registrations.values()) {
      if (descriptor.producedKeys.includes(key)) return descriptor.id;
    }
    return undefined;
  }

  /**
   * The singleton instance for `id`, created by its factory on first use.
   *
   * @throws UnknownModuleError
   */
  instance(id: string): PromptModule {
    const registration = this.registration(id);
    if (!registration.instance) {
      registration.instance = registration.factory();
      this.logger.debug("Module instantiated", { moduleId: id });
    }
    return registration.instance;
  }

  /**
   * Descriptors for `ids` plus all their transitive dependencies, in
   * registration order.
   *
   * @throws UnknownModuleError listing every unknown id
   */
  closure(ids: readonly string[]): ModuleDescriptor[] {
    const unknown = ids.filter((id) => !this.registrations.has(id));
    if (unknown.length > 0) {
      throw new UnknownModuleError([...new Set(unknown)].sort());
    }

    const selected = new Set<string>();
    const pending = [...ids];
    while (pending.length > 0) {
      const id = pending.pop();
      if (id === undefined || selected.has(id)) continue;
      selected.add(id);
      pending.push(...this.descriptor(id).dependencies);
    }

    return this.descriptors().filter((d) => selected.has(d.id));
  }

  /**
   * Module summaries ordered by ascending priority, then id.
   */
  summaries(): ModuleSummary[] {
    return [...this.registrations.values()]
      .map(({ descriptor, instance }) => ({
        id: descriptor.id,
        name: descriptor.name,
        priority: descriptor.priority,
        dependencies: descriptor.dependencies,
        required: descriptor.required,
        instantiated: instance !== undefined,
      }))
      .sort((a, b) =>
        a.priority !== b.priority ? a.priority - b.priority : a.id < b.id ? -1 : a.id > b.id ? 1 : 0
      );
  }

  private registration(id: string): Registration {
    const registration = this.registrations.get(id);
    if (!registration) {
      throw new UnknownModuleError([id]);
    }
    return registration;
  }
}
