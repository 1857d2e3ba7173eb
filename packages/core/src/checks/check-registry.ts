/**
 * Check Registry
 *
 * Explicit table of check implementations keyed by check type. Built once
 * at startup and injected into the invoker, so tests can run the engine
 * against fake checks.
 */

import { z } from "zod";
import type { ICheck } from "./check.interface";
import { DuplicateCheckError } from "../errors";

export interface CheckDescription {
  checkType: string;
  name: string;
  description: string;
  /** Top-level configuration keys, when the schema is an object schema */
  configKeys: string[];
}

export class CheckRegistry {
  private readonly checks = new Map<string, ICheck<unknown>>();

  /**
   * Create a registry with no checks.
   */
  static createEmpty(): CheckRegistry {
    return new CheckRegistry();
  }

  /**
   * Create a registry with specific checks.
   */
  static withChecks(checks: ReadonlyArray<ICheck<unknown>>): CheckRegistry {
    const registry = new CheckRegistry();
    for (const check of checks) {
      registry.register(check);
    }
    return registry;
  }

  /**
   * Register a check.
   *
   * @throws DuplicateCheckError if the check type is already registered
   */
  register(check: ICheck<unknown>): void {
    const existing = this.checks.get(check.checkType);
    if (existing) {
      throw new DuplicateCheckError(check.checkType, existing.name);
    }
    this.checks.set(check.checkType, check);
  }

  unregister(checkType: string): boolean {
    return this.checks.delete(checkType);
  }

  get(checkType: string): ICheck<unknown> | undefined {
    return this.checks.get(checkType);
  }

  getCheckTypes(): string[] {
    return Array.from(this.checks.keys());
  }

  /**
   * Describe every registered check, in registration order.
   */
  describe(): CheckDescription[] {
    return Array.from(this.checks.values()).map((check) => ({
      checkType: check.checkType,
      name: check.name,
      description: check.description,
      configKeys: configKeysOf(check.configSchema),
    }));
  }

  get size(): number {
    return this.checks.size;
  }
}

function configKeysOf(schema: z.ZodTypeAny): string[] {
  if (schema instanceof z.ZodObject) {
    return Object.keys(schema.shape);
  }
  if (schema instanceof z.ZodEffects) {
    return configKeysOf(schema.innerType());
  }
  return [];
}
