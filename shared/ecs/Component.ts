// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - sparse storage for one component type.
 * Keyed by the full EntityId so a recycled slot never inherits stale data.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  get size(): number {
    return this.data.size;
  }
}
