import type { EntityBase } from '../entity/entity-base';
import { stateOf } from '../entity/entity-state';
import { EntityClass, isRawEntityData } from '../entity/types';
import { EntityProperty } from './property';

/**
 * Resolved navigation data, tagged by cardinality
 */
export type NavigationCacheEntry<TTarget extends EntityBase = EntityBase> =
  | { readonly cardinality: 'single'; readonly entity: TTarget | null }
  | { readonly cardinality: 'collection'; readonly entities: TTarget[] };

/**
 * Base class for properties referencing other entities.
 *
 * The target class is resolved lazily so that entities may reference each
 * other regardless of declaration order.
 */
export abstract class NavigationProperty<TTarget extends EntityBase = EntityBase> extends EntityProperty {
  readonly kind = 'navigation' as const;

  /**
   * Whether the navigation holds many related entities
   */
  abstract readonly isCollection: boolean;

  constructor(
    name: string,
    /** @internal */
    private readonly targetFactory: () => EntityClass<TTarget>
  ) {
    super(name);
  }

  /**
   * The related entity class
   */
  get target(): EntityClass<TTarget> {
    return this.targetFactory();
  }

  /**
   * Convert an embedded or fetched payload into a cache entry
   */
  abstract cacheEntryFromData(raw: unknown): NavigationCacheEntry<TTarget>;

  /**
   * Hydrate one related entity
   */
  protected instanceFromData(raw: unknown): TTarget {
    if (!isRawEntityData(raw)) {
      throw new Error(
        `Navigation property '${this.name}' expected an object for ${this.target.name}, got ${describeValue(raw)}`
      );
    }
    return new this.target(raw);
  }
}

/**
 * Navigation property for a single reference (many-to-one or one-to-one)
 */
export class SingleNavigation<TTarget extends EntityBase = EntityBase> extends NavigationProperty<TTarget> {
  readonly isCollection = false;

  /**
   * Convert raw data into the related entity, or null when the service sent none
   */
  instancesFromData(raw: unknown): TTarget | null {
    return raw == null ? null : this.instanceFromData(raw);
  }

  cacheEntryFromData(raw: unknown): NavigationCacheEntry<TTarget> {
    return { cardinality: 'single', entity: this.instancesFromData(raw) };
  }

  /** @internal */
  defineAccessor(prototype: object, attribute: string): void {
    const property = this;
    Object.defineProperty(prototype, attribute, {
      get(this: EntityBase): TTarget | null | undefined {
        const entry = stateOf(this).getNavigation(property.name);
        if (!entry) return undefined;
        return entry.cardinality === 'single' ? narrowTarget(property, entry.entity) : undefined;
      },
      set(this: EntityBase, value: TTarget | null) {
        stateOf(this).assignNavigation(property.name, { cardinality: 'single', entity: value });
      },
      enumerable: true,
      configurable: true,
    });
  }
}

/**
 * Navigation property for a collection of related entities (one-to-many).
 *
 * The accessor returns the cached list itself, so in-place edits stay on the
 * entity; they are not marked dirty until the list is assigned again.
 */
export class CollectionNavigation<TTarget extends EntityBase = EntityBase> extends NavigationProperty<TTarget> {
  readonly isCollection = true;

  /**
   * Convert a raw list into related entities, preserving order
   */
  instancesFromData(raw: unknown): TTarget[] {
    if (raw == null) return [];
    if (!Array.isArray(raw)) {
      throw new Error(
        `Collection navigation '${this.name}' expected an array of ${this.target.name}, got ${describeValue(raw)}`
      );
    }
    return raw.map(item => this.instanceFromData(item));
  }

  cacheEntryFromData(raw: unknown): NavigationCacheEntry<TTarget> {
    return { cardinality: 'collection', entities: this.instancesFromData(raw) };
  }

  /** @internal */
  defineAccessor(prototype: object, attribute: string): void {
    const property = this;
    Object.defineProperty(prototype, attribute, {
      get(this: EntityBase): TTarget[] | undefined {
        const entry = stateOf(this).getNavigation(property.name);
        if (!entry || entry.cardinality !== 'collection') return undefined;
        const entities = entry.entities;
        if (!holdsTargets(property, entities)) {
          throw new Error(`Collection navigation '${property.name}' holds an entity that is not a ${property.target.name}`);
        }
        return entities;
      },
      set(this: EntityBase, value: readonly TTarget[]) {
        stateOf(this).assignNavigation(property.name, { cardinality: 'collection', entities: [...value] });
      },
      enumerable: true,
      configurable: true,
    });
  }
}

/**
 * Helper to create a single navigation property
 *
 * @example
 * ```typescript
 * defineEntity(Product, {
 *   properties: {
 *     category: navigation('Category', () => Category),
 *   },
 * });
 * ```
 */
export function navigation<TTarget extends EntityBase>(
  name: string,
  target: () => EntityClass<TTarget>
): SingleNavigation<TTarget> {
  return new SingleNavigation<TTarget>(name, target);
}

/**
 * Helper to create a collection navigation property
 *
 * @example
 * ```typescript
 * defineEntity(Category, {
 *   properties: {
 *     products: navigationCollection('Products', () => Product),
 *   },
 * });
 * ```
 */
export function navigationCollection<TTarget extends EntityBase>(
  name: string,
  target: () => EntityClass<TTarget>
): CollectionNavigation<TTarget> {
  return new CollectionNavigation<TTarget>(name, target);
}

/**
 * Type guard to check if a property is a navigation property
 */
export function isNavigationProperty(value: EntityProperty): value is NavigationProperty {
  return value.kind === 'navigation';
}

/**
 * Cache entries are typed against the base entity; entities assigned
 * through an accessor or hydrated by this navigation are instances of its
 * target.
 */
function narrowTarget<TTarget extends EntityBase>(
  property: NavigationProperty<TTarget>,
  entity: EntityBase | null
): TTarget | null {
  if (entity === null) return null;
  const target = property.target;
  if (!(entity instanceof target)) {
    throw new Error(`Navigation property '${property.name}' holds ${String(entity)}, not a ${target.name}`);
  }
  return entity;
}

function holdsTargets<TTarget extends EntityBase>(
  property: NavigationProperty<TTarget>,
  entities: EntityBase[]
): entities is TTarget[] {
  const target = property.target;
  return entities.every(entity => entity instanceof target);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'an array';
  if (value === null) return 'null';
  return typeof value;
}
