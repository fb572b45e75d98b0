// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import {
  entityGeneration,
  entityIndex,
  makeEntityId,
  INDEX_SPACE,
  type EntityId,
} from './types';

type StoreMap<C> = { [K in keyof C]?: ComponentStore<C[K]> };

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy, deferred destroy)
 * - Component storage (add, get, remove), typed by the component map C
 * - Queries (find entities with / without specific components)
 * - Tags (lightweight entity classification)
 *
 * Entities live in an arena: a freed slot is reused with a bumped
 * generation, so ids held after destruction stay invalid.
 */
export class World<C extends object> {
  private generations: number[] = [];
  private alive: boolean[] = [];
  private freeSlots: number[] = [];
  private entities = new Set<EntityId>();
  private stores: StoreMap<C> = {};
  private storeKeys: Array<keyof C> = [];
  private entityTags = new Map<EntityId, Set<string>>();
  private destroyQueue: EntityId[] = [];
  private pendingDestroy = new Set<EntityId>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  createEntity(): EntityId {
    let index = this.freeSlots.pop();
    if (index === undefined) {
      index = this.generations.length;
      if (index >= INDEX_SPACE) {
        throw new Error(`WorldFull: entity arena exhausted at ${INDEX_SPACE} slots`);
      }
      this.generations.push(0);
      this.alive.push(false);
    }
    this.alive[index] = true;

    const id = makeEntityId(index, this.generations[index] ?? 0);
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity immediately, removing all components and tags.
   * Stale or unknown ids are ignored.
   */
  destroyEntity(id: EntityId): void {
    if (!this.hasEntity(id)) return;

    const index = entityIndex(id);
    this.entities.delete(id);
    this.alive[index] = false;
    this.generations[index] = entityGeneration(id) + 1;
    this.freeSlots.push(index);

    for (const key of this.storeKeys) {
      this.stores[key]?.delete(id);
    }
    this.entityTags.delete(id);
    this.pendingDestroy.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    const index = entityIndex(id);
    return this.alive[index] === true && this.generations[index] === entityGeneration(id);
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Deferred Destruction
  // ============================================

  /**
   * Queue an entity for destruction at end of frame.
   * Repeated requests for the same entity are collapsed.
   */
  requestDestroy(id: EntityId): void {
    if (!this.hasEntity(id) || this.pendingDestroy.has(id)) return;
    this.pendingDestroy.add(id);
    this.destroyQueue.push(id);
  }

  isPendingDestroy(id: EntityId): boolean {
    return this.pendingDestroy.has(id);
  }

  /**
   * Hand over queued ids (in request order) and reset the queue.
   * The caller destroys them.
   */
  takeDestroyQueue(): EntityId[] {
    const queued = this.destroyQueue;
    this.destroyQueue = [];
    return queued;
  }

  // ============================================
  // Component Management
  // ============================================

  registerStore<K extends keyof C>(type: K, store: ComponentStore<C[K]>): void {
    if (!this.stores[type]) {
      this.storeKeys.push(type);
    }
    this.stores[type] = store;
  }

  getStore<K extends keyof C>(type: K): ComponentStore<C[K]> | undefined {
    return this.stores[type];
  }

  /**
   * Attach a component. Throws if the type was never registered.
   */
  addComponent<K extends keyof C>(entity: EntityId, type: K, data: C[K]): void {
    const store = this.stores[type];
    if (!store) {
      throw new Error(`Component type not registered: ${String(type)}. Call world.registerStore() first.`);
    }
    if (!this.hasEntity(entity)) {
      throw new Error(`EntityNotFound: cannot add ${String(type)} to entity ${entity}`);
    }
    store.set(entity, data);
  }

  getComponent<K extends keyof C>(entity: EntityId, type: K): C[K] | undefined {
    return this.stores[type]?.get(entity);
  }

  hasComponent<K extends keyof C>(entity: EntityId, type: K): boolean {
    return this.stores[type]?.has(entity) ?? false;
  }

  removeComponent<K extends keyof C>(entity: EntityId, type: K): void {
    this.stores[type]?.delete(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * All entities holding every listed component, in creation order.
   */
  query(...types: Array<keyof C>): EntityId[] {
    return this.queryWithout(types, []);
  }

  /**
   * All entities holding every type in `types` and none in `excluded`.
   */
  queryWithout(types: Array<keyof C>, excluded: Array<keyof C>): EntityId[] {
    const result: EntityId[] = [];
    for (const entity of this.entities) {
      if (
        types.every((type) => this.hasComponent(entity, type)) &&
        !excluded.some((type) => this.hasComponent(entity, type))
      ) {
        result.push(entity);
      }
    }
    return result;
  }

  // ============================================
  // Tags
  // ============================================

  addTag(entity: EntityId, tag: string): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  hasTag(entity: EntityId, tag: string): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  getEntitiesWithTag(tag: string): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  /**
   * Iterate a snapshot of tagged entities, so callbacks may add or
   * destroy entities without disturbing the loop.
   */
  forEachWithTag(tag: string, callback: (entity: EntityId) => void): void {
    for (const entity of this.getEntitiesWithTag(tag)) {
      callback(entity);
    }
  }

  // ============================================
  // Utilities
  // ============================================

  getStats(): { entities: number; pendingDestroy: number; stores: Record<string, number> } {
    const stores: Record<string, number> = {};
    for (const key of this.storeKeys) {
      stores[String(key)] = this.stores[key]?.size ?? 0;
    }
    return {
      entities: this.entities.size,
      pendingDestroy: this.destroyQueue.length,
      stores,
    };
  }
}
