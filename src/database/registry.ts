/**
 * Target registry
 * Maps logical database names to connection targets
 */

import { UnknownTargetError } from '../errors.js';
import { Target } from '../types/index.js';
import { logger } from '../utils/logger.js';

export class TargetRegistry {
  private readonly targets = new Map<string, Target>();

  constructor(targets: readonly Target[]) {
    if (targets.length === 0) {
      throw new Error('At least one database target must be configured');
    }
    for (const target of targets) {
      if (this.targets.has(target.name)) {
        logger.warn(`Duplicate database target '${target.name}' ignored; the first entry is used`);
        continue;
      }
      this.targets.set(target.name, Object.freeze({ ...target }));
    }
  }

  /**
   * Resolve a database name; empty names fall back to the first target
   */
  resolve(name?: string | null): Target {
    if (!name) return this.first();
    const target = this.targets.get(name);
    if (!target) throw new UnknownTargetError(name);
    return target;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  list(): Target[] {
    return Array.from(this.targets.values());
  }

  /**
   * Configured passwords, for scrubbing driver messages
   */
  secrets(): string[] {
    return this.list()
      .map(t => t.password)
      .filter(Boolean);
  }

  private first(): Target {
    const [target] = this.targets.values();
    return target;
  }
}
